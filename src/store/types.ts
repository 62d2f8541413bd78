export type StoredDocument = Record<string, unknown>;

/** Equality filter: every listed field must match exactly. An empty filter matches everything. */
export type EqualityFilter = Readonly<Record<string, string>>;

export interface DocumentStore {
  readonly name: string;
  insertOne(collection: string, document: StoredDocument): Promise<string>;
  /** Lazily yields at most `limit` matching documents in store-default order. */
  find(collection: string, filter: EqualityFilter, limit: number): AsyncIterable<StoredDocument>;
  findById(collection: string, id: string): Promise<StoredDocument | null>;
  listCollections(): Promise<string[]>;
  close(): Promise<void>;
}

export class StoreUnavailableError extends Error {
  readonly statusCode: number;

  constructor(message = 'Database unavailable', statusCode = 503) {
    super(message);
    this.name = 'StoreUnavailableError';
    this.statusCode = statusCode;
  }
}
