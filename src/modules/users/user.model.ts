import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';
import { USER_ROLES } from '../../config/constants.js';
import type { UserRoleType } from '../../config/constants.js';

// Base user interface
export interface IUser {
  email: string;
  fullName: string;
  phone?: string;
  role: UserRoleType;
  isActive: boolean;

  // Timestamps
  createdAt: Date;
  updatedAt: Date;
}

// Document interface (numeric ids come from the users sequence)
export interface IUserDocument extends IUser, Document<number> {
  _id: number;
}

export type IUserModel = Model<IUserDocument>;

const UserSchema = new Schema<IUserDocument, IUserModel>(
  {
    _id: {
      type: Number,
      required: true,
    },
    email: {
      type: String,
      required: [true, 'Email is required'],
      unique: true,
      trim: true,
      lowercase: true,
      maxlength: [255, 'Email cannot exceed 255 characters'],
      match: [/^[^\s@]+@[^\s@]+\.[^\s@]+$/, 'Please provide a valid email address'],
    },
    fullName: {
      type: String,
      required: [true, 'Full name is required'],
      trim: true,
      minlength: [2, 'Full name must be at least 2 characters'],
      maxlength: [255, 'Full name cannot exceed 255 characters'],
    },
    phone: {
      type: String,
      trim: true,
      maxlength: [20, 'Phone cannot exceed 20 characters'],
    },
    role: {
      type: String,
      enum: USER_ROLES,
      default: 'customer',
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
    toJSON: {
      transform: (_doc: IUserDocument, ret: Record<string, unknown>) => {
        ret['id'] = ret['_id'];
        delete ret['_id'];
        delete ret['__v'];
        return ret;
      },
    },
  }
);

UserSchema.index({ role: 1 });

export const User = mongoose.model<IUserDocument, IUserModel>('User', UserSchema);

export default User;
