import mongoose, { ConnectOptions } from 'mongoose';

export const DEFAULT_MONGODB_URI = 'mongodb://localhost:27017/interview-coach';

export const MONGO_CONNECT_OPTIONS: ConnectOptions = {
  serverSelectionTimeoutMS: 5000,
  socketTimeoutMS: 45000,
  family: 4,
  retryWrites: true,
  maxPoolSize: 10,
  minPoolSize: 2,
};

export const connectDatabase = async (mongoUri: string = process.env.MONGODB_URI || DEFAULT_MONGODB_URI): Promise<void> => {
  console.log(`[Database] Connecting to MongoDB at ${mongoUri.replace(/\/\/[^@/]*@/, '//***@')}`);

  try {
    await mongoose.connect(mongoUri, MONGO_CONNECT_OPTIONS);
  } catch (error) {
    console.error('[Database] ❌ Failed to connect to MongoDB:', error);
    throw error;
  }

  mongoose.connection.on('error', (error) => {
    console.error('[Database] ❌ MongoDB connection error:', error);
  });

  mongoose.connection.on('disconnected', () => {
    console.warn('[Database] ⚠️ MongoDB disconnected');
  });

  console.log('[Database] ✓ MongoDB connected');
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
};
