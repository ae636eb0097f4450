import mongoose, { Schema } from 'mongoose';
import type { Document, Model } from 'mongoose';

// Base restaurant interface
export interface IRestaurant {
  name: string;
  description?: string;
  address: string;
  latitude?: number;
  longitude?: number;
  phone?: string;
  email?: string;
  category: number;
  owner: number;
  imageUrl?: string;
  openingHours?: Map<string, string>;
  isActive: boolean;

  // Rating fields
  rating: number;
  totalReviews: number;

  // Timestamps
  createdAt: Date;
  updatedAt: Date;
}

export interface IRestaurantDocument extends IRestaurant, Document<number> {
  _id: number;
}

export type IRestaurantModel = Model<IRestaurantDocument>;

const RestaurantSchema = new Schema<IRestaurantDocument, IRestaurantModel>(
  {
    _id: {
      type: Number,
      required: true,
    },
    name: {
      type: String,
      required: [true, 'Restaurant name is required'],
      trim: true,
      minlength: [2, 'Restaurant name must be at least 2 characters'],
      maxlength: [255, 'Restaurant name cannot exceed 255 characters'],
    },
    description: {
      type: String,
      trim: true,
    },
    address: {
      type: String,
      required: [true, 'Address is required'],
      trim: true,
    },
    latitude: {
      type: Number,
      min: [-90, 'Latitude must be between -90 and 90'],
      max: [90, 'Latitude must be between -90 and 90'],
    },
    longitude: {
      type: Number,
      min: [-180, 'Longitude must be between -180 and 180'],
      max: [180, 'Longitude must be between -180 and 180'],
    },
    phone: {
      type: String,
      trim: true,
    },
    email: {
      type: String,
      trim: true,
      lowercase: true,
    },
    category: {
      type: Number,
      ref: 'RestaurantCategory',
      required: [true, 'Restaurant category is required'],
    },
    owner: {
      type: Number,
      ref: 'User',
      required: [true, 'Owner is required'],
    },
    imageUrl: {
      type: String,
      trim: true,
    },
    // weekday -> "HH:MM-HH:MM" | "closed"
    openingHours: {
      type: Map,
      of: String,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    rating: {
      type: Number,
      default: 0,
      min: [0, 'Rating cannot be negative'],
      max: [5, 'Rating cannot exceed 5'],
    },
    totalReviews: {
      type: Number,
      default: 0,
      min: [0, 'Total reviews cannot be negative'],
    },
  },
  {
    timestamps: true,
    toJSON: {
      virtuals: true,
      transform: (_doc: IRestaurantDocument, ret: Record<string, unknown>) => {
        delete ret['__v'];
        return ret;
      },
    },
  }
);

RestaurantSchema.index({ owner: 1 });
RestaurantSchema.index({ category: 1 });
RestaurantSchema.index({ latitude: 1, longitude: 1 });

export const Restaurant = mongoose.model<IRestaurantDocument, IRestaurantModel>('Restaurant', RestaurantSchema);

export default Restaurant;
