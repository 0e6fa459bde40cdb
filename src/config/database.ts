import mongoose from 'mongoose';
import { Logger } from '../utils/loggers';

export const connectDB = async (mongoUri: string): Promise<void> => {
  await mongoose.connect(mongoUri);
  Logger.success('MongoDB Connected Successfully');

  mongoose.connection.on('error', (err) => Logger.error('MongoDB error', err));
  mongoose.connection.on('disconnected', () => Logger.warning('MongoDB disconnected'));
  mongoose.connection.on('reconnected', () => Logger.info('MongoDB reconnected'));
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  Logger.info('MongoDB connection closed');
};
