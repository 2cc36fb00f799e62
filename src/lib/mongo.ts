/**
 * MongoDB connection
 */

import mongoose from 'mongoose';
import { env } from '../config/env';

export const connectDB = async (): Promise<void> => {
  try {
    await mongoose.connect(env.MONGODB_URI);
    console.log('✅ MongoDB connected');
  } catch (error) {
    console.error('❌ MongoDB connection error:', error);
    throw error;
  }

  mongoose.connection.on('error', (error) => {
    console.error('MongoDB error:', error);
  });

  mongoose.connection.on('disconnected', () => {
    console.log('⚠️  MongoDB disconnected');
  });
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  console.log('MongoDB disconnected');
};
