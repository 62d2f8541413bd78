import mongoose from 'mongoose';
import { logger } from '../utils/logger';
import { MongoStore } from '../store/mongoStore';

export interface DatabaseOptions {
  url?: string;
  name?: string;
  debug?: boolean;
}

/**
 * Opens the MongoDB connection. Returns `null` when no URL is configured or the
 * server cannot be reached, so the API can still serve its diagnostic routes.
 */
export const connectDB = async ({ url, name, debug }: DatabaseOptions): Promise<MongoStore | null> => {
  if (!url) {
    logger.warn('DATABASE_URL not set, entity endpoints are disabled');
    return null;
  }

  if (debug) {
    mongoose.set('debug', (collectionName, method, query, doc, options) => {
      logger.info(
        { collection: collectionName, method, query, doc, options },
        'MongoDB query',
      );
    });
  }

  try {
    const connection = await mongoose.createConnection(url, { dbName: name }).asPromise();
    logger.info(`MongoDB Connected: ${connection.host}/${connection.name}`);
    return new MongoStore(connection);
  } catch (error) {
    logger.error({ err: error }, 'MongoDB connection failed');
    return null;
  }
};
