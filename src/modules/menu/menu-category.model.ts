import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';

// Menu section of one restaurant, e.g. "Appetizers"
export interface IMenuCategory {
  restaurant: number;
  name: string;
  description?: string;
  displayOrder: number;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
}

export interface IMenuCategoryDocument extends IMenuCategory, Document<number> {
  _id: number;
}

export type IMenuCategoryModel = Model<IMenuCategoryDocument>;

const MenuCategorySchema = new Schema<IMenuCategoryDocument, IMenuCategoryModel>(
  {
    _id: {
      type: Number,
      required: true,
    },
    restaurant: {
      type: Number,
      ref: 'Restaurant',
      required: [true, 'Restaurant reference is required'],
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
    displayOrder: {
      type: Number,
      default: 0,
      min: [0, 'Display order cannot be negative'],
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      transform: (_doc: IMenuCategoryDocument, ret: Record<string, unknown>) => {
        delete ret['__v'];
        return ret;
      },
    },
  }
);

// One category per display slot within a restaurant
MenuCategorySchema.index({ restaurant: 1, displayOrder: 1 }, { unique: true });
MenuCategorySchema.index({ restaurant: 1, isActive: 1 });

export const MenuCategory = mongoose.model<IMenuCategoryDocument, IMenuCategoryModel>(
  'MenuCategory',
  MenuCategorySchema
);

export default MenuCategory;
