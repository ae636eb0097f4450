import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';

// One document per sequence, keyed by collection name
export interface ICounter {
  seq: number;
}

export interface ICounterDocument extends ICounter, Document<string> {
  _id: string;
}

export interface ICounterModel extends Model<ICounterDocument> {
  reserve(name: string, count: number): Promise<number[]>;
}

const CounterSchema = new Schema<ICounterDocument, ICounterModel>(
  {
    _id: {
      type: String,
      required: true,
    },
    seq: {
      type: Number,
      default: 0,
      min: [0, 'Sequence cannot be negative'],
    },
  },
  { versionKey: false }
);

/**
 * Reserve `count` consecutive ids from a sequence.
 * Runs outside any session: ids taken by a rolled-back load are not reused.
 */
CounterSchema.statics.reserve = async function (name: string, count: number): Promise<number[]> {
  if (count <= 0) {
    return [];
  }

  const counter = await this.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: count } },
    { new: true, upsert: true }
  ).lean();

  if (!counter) {
    throw new Error(`Sequence ${name} could not be reserved`);
  }

  const first = counter.seq - count + 1;
  return Array.from({ length: count }, (_, offset) => first + offset);
};

export const Counter = mongoose.model<ICounterDocument, ICounterModel>('Counter', CounterSchema);

export default Counter;
