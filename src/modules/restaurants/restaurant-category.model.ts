import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';

// Restaurant classification (cuisine or format), e.g. "Pizza", "Cafe"
export interface IRestaurantCategory {
  name: string;
  description?: string;
  icon?: string;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
}

export interface IRestaurantCategoryDocument extends IRestaurantCategory, Document<number> {
  _id: number;
}

export type IRestaurantCategoryModel = Model<IRestaurantCategoryDocument>;

const RestaurantCategorySchema = new Schema<IRestaurantCategoryDocument, IRestaurantCategoryModel>(
  {
    _id: {
      type: Number,
      required: true,
    },
    name: {
      type: String,
      required: [true, 'Category name is required'],
      trim: true,
      minlength: [2, 'Category name must be at least 2 characters'],
      maxlength: [100, 'Category name cannot exceed 100 characters'],
    },
    description: {
      type: String,
      trim: true,
    },
    icon: {
      type: String,
      trim: true,
      maxlength: [255, 'Icon cannot exceed 255 characters'],
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
  }
);

// Names are unique regardless of case
RestaurantCategorySchema.index(
  { name: 1 },
  {
    unique: true,
    collation: { locale: 'en', strength: 2 },
  }
);

export const RestaurantCategory = mongoose.model<IRestaurantCategoryDocument, IRestaurantCategoryModel>(
  'RestaurantCategory',
  RestaurantCategorySchema
);

export default RestaurantCategory;
