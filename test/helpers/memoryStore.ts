import mongoose from 'mongoose';
import { DocumentStore, EqualityFilter, StoredDocument } from '../../src/store/types';

/** In-process DocumentStore with MongoDB-like ObjectId strings. */
export class MemoryStore implements DocumentStore {
  readonly name = 'memory';
  private readonly collections = new Map<string, StoredDocument[]>();

  private rows(collection: string): StoredDocument[] {
    let rows = this.collections.get(collection);
    if (!rows) {
      rows = [];
      this.collections.set(collection, rows);
    }
    return rows;
  }

  async insertOne(collection: string, document: StoredDocument): Promise<string> {
    const _id = new mongoose.Types.ObjectId();
    this.rows(collection).push({ ...document, _id });
    return _id.toHexString();
  }

  async *find(collection: string, filter: EqualityFilter, limit: number): AsyncIterable<StoredDocument> {
    let yielded = 0;
    for (const row of this.rows(collection)) {
      if (yielded >= limit) return;
      if (Object.entries(filter).every(([field, value]) => row[field] === value)) {
        yielded += 1;
        yield { ...row };
      }
    }
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    return this.rows(collection).find((row) => String(row._id) === id) ?? null;
  }

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  count(collection: string): number {
    return this.rows(collection).length;
  }

  documents(collection: string): StoredDocument[] {
    return this.rows(collection).map((row) => ({ ...row }));
  }
}
