/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

let connected = false;

export async function connectMongo(url: string, dbName: string): Promise<void> {
  if (connected) return;

  await mongoose.connect(url, {
    dbName,
    serverSelectionTimeoutMS: 5000,
  });
  connected = true;
  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
  console.log('[DB] Disconnected from MongoDB');
}

export function isMongoConnected(): boolean {
  return connected && mongoose.connection.readyState === 1;
}
