import mongoose from 'mongoose';
import { requireMongoUri } from './env';

export async function connectToDatabase(): Promise<void> {
  mongoose.set('strictQuery', true);
  await mongoose.connect(requireMongoUri());
  console.log('[db] MongoDB connected');
}

export async function disconnectFromDatabase(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    console.log('[db] MongoDB disconnected');
  }
}
