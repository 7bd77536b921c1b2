/**
 * MongoDB Connection
 */

import mongoose from 'mongoose';
import { env } from '../config/env';
import { createLogger } from './logger';

const log = createLogger('MongoDB');

export interface ConnectOptions {
  /** Refuse deployments that cannot run multi-document transactions */
  requireTransactions?: boolean;
}

/** Fields of the `hello` reply that reveal the deployment topology */
export interface HelloReply {
  setName?: unknown;
  msg?: unknown;
}

/**
 * Replica set members report `setName`; mongos reports `msg: 'isdbgrid'`
 */
export function supportsTransactions(hello: HelloReply): boolean {
  return typeof hello.setName === 'string' || hello.msg === 'isdbgrid';
}

export async function connectDB(uri: string = env.MONGODB_URI, options: ConnectOptions = {}): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  try {
    await mongoose.connect(uri);
  } catch (error) {
    log.error('❌ Connection error:', error);
    throw error;
  }

  if (options.requireTransactions) {
    await assertTransactionSupport();
  }

  log.info('✅ Connected');
}

async function assertTransactionSupport(): Promise<void> {
  const { db } = mongoose.connection;
  if (!db) {
    await mongoose.disconnect();
    throw new Error('MongoDB connection has no database handle');
  }

  const hello: HelloReply = await db.admin().command({ hello: 1 });
  if (!supportsTransactions(hello)) {
    await mongoose.disconnect();
    throw new Error(
      'MongoDB is a standalone server; batch inserts need a replica set or mongos. ' +
        'Start mongod with --replSet and add ?replicaSet=<name> to MONGODB_URI, or set SAVE_TO_DB=false.'
    );
  }
}

export async function disconnectDB(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;

  await mongoose.disconnect();
  log.info('Disconnected');
}
