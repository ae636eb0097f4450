import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';

// Base menu item interface
export interface IMenuItem {
  restaurant: number;
  menuCategory: number;
  name: string;
  description?: string;
  // size label -> amount, e.g. { small: 6.99, large: 9.99 }
  price: Map<string, number>;
  imageUrl?: string;
  isVegetarian: boolean;
  isVegan: boolean;
  isGlutenFree: boolean;
  ingredients: string[];
  allergens: string[];
  isAvailable: boolean;
  displayOrder: number;

  // Timestamps
  createdAt: Date;
  updatedAt: Date;
}

export interface IMenuItemDocument extends IMenuItem, Document<number> {
  _id: number;
}

export type IMenuItemModel = Model<IMenuItemDocument>;

const MenuItemSchema = new Schema<IMenuItemDocument, IMenuItemModel>(
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
    menuCategory: {
      type: Number,
      ref: 'MenuCategory',
      required: [true, 'Menu category reference is required'],
    },
    name: {
      type: String,
      required: [true, 'Menu item name is required'],
      trim: true,
      minlength: [2, 'Menu item name must be at least 2 characters'],
      maxlength: [255, 'Menu item name cannot exceed 255 characters'],
    },
    description: {
      type: String,
      trim: true,
    },
    price: {
      type: Map,
      of: {
        type: Number,
        min: [0.01, 'Price must be positive'],
      },
      required: [true, 'Price is required'],
    },
    imageUrl: {
      type: String,
      trim: true,
    },
    isVegetarian: {
      type: Boolean,
      default: false,
    },
    isVegan: {
      type: Boolean,
      default: false,
    },
    isGlutenFree: {
      type: Boolean,
      default: false,
    },
    ingredients: {
      type: [String],
      default: [],
    },
    allergens: {
      type: [String],
      default: [],
    },
    isAvailable: {
      type: Boolean,
      default: true,
    },
    displayOrder: {
      type: Number,
      default: 0,
      min: [0, 'Display order cannot be negative'],
    },
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      transform: (_doc: IMenuItemDocument, ret: Record<string, unknown>) => {
        delete ret['__v'];
        return ret;
      },
    },
    toObject: {
      virtuals: true,
    },
  }
);

// One item per display slot within a restaurant's category
MenuItemSchema.index({ restaurant: 1, menuCategory: 1, displayOrder: 1 }, { unique: true });
MenuItemSchema.index({ restaurant: 1, isAvailable: 1 });

// Reject an empty price map before it reaches the server
MenuItemSchema.pre('validate', function (next) {
  if (this.price.size === 0) {
    this.invalidate('price', 'At least one price entry is required');
  }
  next();
});

export const MenuItem = mongoose.model<IMenuItemDocument, IMenuItemModel>('MenuItem', MenuItemSchema);

export default MenuItem;
