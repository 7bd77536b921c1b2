/**
 * Car MongoDB Model
 * Mongoose schema for extracted listings
 */

import mongoose, { Schema } from 'mongoose';
import { CarRecord, UNKNOWN_SELLER } from './car.types';

const CarSchema = new Schema<CarRecord>(
  {
    url: {
      type: String,
      required: true,
      unique: true,
    },
    title: {
      type: String,
      required: true,
    },
    priceUsd: {
      type: Number,
      default: 0,
    },
    odometerKm: {
      type: Number,
      default: 0,
    },
    sellerName: {
      type: String,
      default: UNKNOWN_SELLER,
    },
    phoneNumber: {
      type: String,
      default: '',
    },
    imageUrl: {
      type: String,
      default: null,
    },
    imagesCount: {
      type: Number,
      default: 0,
    },
    vin: {
      type: String,
      default: '',
    },
    plateNumber: {
      type: String,
      default: '',
    },
    discoveredAt: {
      type: Date,
      required: true,
      index: true,
    },
  },
  {
    collection: 'cars',
    versionKey: false,
  }
);

export const CarModel = mongoose.model<CarRecord>('Car', CarSchema);
