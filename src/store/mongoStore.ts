import mongoose from 'mongoose';
import { DocumentStore, EqualityFilter, StoredDocument, StoreUnavailableError } from './types';

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/** The slice of a Mongoose collection the store uses. */
export interface StoreCollection {
  insertOne(document: StoredDocument): Promise<{ insertedId: unknown }>;
  find(filter: EqualityFilter): { limit(limit: number): AsyncIterable<StoredDocument> };
  findOne(filter: { _id: mongoose.Types.ObjectId }): Promise<StoredDocument | null>;
}

/** The slice of a Mongoose connection the store uses; `mongoose.Connection` satisfies it. */
export interface StoreConnection {
  readonly name: string;
  readonly readyState: mongoose.ConnectionStates;
  readonly db?: { listCollections(): { toArray(): Promise<Array<{ name: string }>> } };
  collection(name: string): StoreCollection;
  close(): Promise<void>;
}

/** Driver errors meaning the server cannot be reached become StoreUnavailableError. */
export const toStoreError = (error: unknown): unknown => {
  if (
    error instanceof mongoose.mongo.MongoNetworkError ||
    error instanceof mongoose.mongo.MongoServerSelectionError
  ) {
    return new StoreUnavailableError();
  }
  return error;
};

export class MongoStore implements DocumentStore {
  constructor(private readonly connection: StoreConnection) {}

  get name(): string {
    return this.connection.name;
  }

  // Mongoose would otherwise buffer commands until the server comes back.
  private collection(name: string): StoreCollection {
    if (this.connection.readyState !== mongoose.ConnectionStates.connected) {
      throw new StoreUnavailableError();
    }
    return this.connection.collection(name);
  }

  async insertOne(collection: string, document: StoredDocument): Promise<string> {
    try {
      const result = await this.collection(collection).insertOne({ ...document });
      return String(result.insertedId);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async *find(collection: string, filter: EqualityFilter, limit: number): AsyncIterable<StoredDocument> {
    try {
      yield* this.collection(collection).find({ ...filter }).limit(limit);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    if (!OBJECT_ID_PATTERN.test(id)) return null;
    try {
      return await this.collection(collection).findOne({ _id: new mongoose.Types.ObjectId(id) });
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async listCollections(): Promise<string[]> {
    const db = this.connection.db;
    if (!db || this.connection.readyState !== mongoose.ConnectionStates.connected) {
      throw new StoreUnavailableError();
    }
    try {
      const collections = await db.listCollections().toArray();
      return collections.map((c) => c.name);
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
