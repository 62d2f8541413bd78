import { DocumentStore, EqualityFilter, StoredDocument, StoreUnavailableError } from '../store/types';
import { JobStatus } from '../models/Job';
import { InvoiceStatus } from '../models/Invoice';
import { EntityCollection } from '../models/collections';

export type AssetFilter = { site_id?: string };
export type JobFilter = { status?: JobStatus };
export type InvoiceFilter = { status?: InvoiceStatus };

/** A stored document as returned to clients: `_id` in its string form. */
export type DisplayDocument = StoredDocument & { _id: string };

export const requireStore = (store: DocumentStore | null): DocumentStore => {
  if (!store) {
    throw new StoreUnavailableError('Database not configured', 500);
  }
  return store;
};

// Drops unset keys so `{ status: undefined }` does not turn into a filter on null.
const toEqualityFilter = (filter: Readonly<Record<string, string | undefined>>): EqualityFilter => {
  const equality: Record<string, string> = {};
  for (const [field, value] of Object.entries(filter)) {
    if (value !== undefined) equality[field] = value;
  }
  return equality;
};

export const createDocument = async (
  store: DocumentStore,
  collection: EntityCollection,
  record: StoredDocument,
): Promise<string> => {
  const now = new Date();
  return store.insertOne(collection, { ...record, created_at: now, updated_at: now });
};

export const getDocuments = async (
  store: DocumentStore,
  collection: EntityCollection,
  filter: Readonly<Record<string, string | undefined>>,
  limit: number,
): Promise<DisplayDocument[]> => {
  const documents: DisplayDocument[] = [];
  for await (const doc of store.find(collection, toEqualityFilter(filter), limit)) {
    documents.push({ ...doc, _id: String(doc._id) });
  }
  return documents;
};

export const documentExists = async (
  store: DocumentStore,
  collection: EntityCollection,
  id: string,
): Promise<boolean> => (await store.findById(collection, id)) !== null;
