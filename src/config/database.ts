import mongoose from 'mongoose';
import { logger } from './logger.js';

const DEFAULT_MONGODB_URI = 'mongodb://127.0.0.1:27017/catalog?replicaSet=rs0';

interface DatabaseConfig {
  uri: string;
  options: mongoose.ConnectOptions;
}

const getDatabaseConfig = (): DatabaseConfig => {
  const uri = process.env['MONGODB_URI'] ?? DEFAULT_MONGODB_URI;

  // Transactions need a replica set or a sharded cluster
  const options: mongoose.ConnectOptions = {
    maxPoolSize: 10,
    minPoolSize: 2,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
    family: 4,
    retryWrites: true,
    w: 'majority',
    autoIndex: true,
  };

  return { uri, options };
};

export const connectDatabase = async (): Promise<typeof mongoose> => {
  const { uri, options } = getDatabaseConfig();

  mongoose.connection.on('connected', () => {
    logger.info('MongoDB connected successfully');
  });

  mongoose.connection.on('error', (error: Error) => {
    logger.error('MongoDB connection error:', { error: error.message });
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  try {
    logger.info('Connecting to MongoDB...');
    const connection = await mongoose.connect(uri, options);
    logger.info(`MongoDB connected to database: ${connection.connection.name}`);
    return connection;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Failed to connect to MongoDB:', { error: errorMessage });
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  try {
    await mongoose.connection.close();
    logger.info('MongoDB connection closed');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Error disconnecting from MongoDB:', { error: errorMessage });
    throw error;
  }
};

export const getDatabaseStatus = (): {
  isConnected: boolean;
  readyState: number;
  readyStateText: string;
} => {
  const readyState = mongoose.connection.readyState;
  const readyStateMap: Record<number, string> = {
    0: 'disconnected',
    1: 'connected',
    2: 'connecting',
    3: 'disconnecting',
  };

  return {
    isConnected: readyState === 1,
    readyState,
    readyStateText: readyStateMap[readyState] ?? 'unknown',
  };
};

export default { connectDatabase, disconnectDatabase, getDatabaseStatus };
