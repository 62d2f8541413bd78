import assert from 'node:assert/strict';
import { after, describe, it } from 'node:test';
import mongoose from 'mongoose';
import { MongoStore, StoreCollection, StoreConnection, toStoreError } from '../src/store/mongoStore';
import { StoreUnavailableError } from '../src/store/types';

const isUnavailable = (error: unknown) =>
  error instanceof StoreUnavailableError &&
  error.statusCode === 503 &&
  error.message === 'Database unavailable';

const drain = async (documents: AsyncIterable<unknown>) => {
  const rows: unknown[] = [];
  for await (const doc of documents) rows.push(doc);
  return rows;
};

const failingCollection = (error: Error): StoreCollection => ({
  insertOne: async () => {
    throw error;
  },
  find: () => ({
    limit: () => ({
      async *[Symbol.asyncIterator]() {
        throw error;
      },
    }),
  }),
  findOne: async () => {
    throw error;
  },
});

const connectedTo = (collection: StoreCollection): StoreConnection => ({
  name: 'field_service',
  readyState: mongoose.ConnectionStates.connected,
  collection: () => collection,
  close: async () => undefined,
});

describe('MongoStore without an open connection', () => {
  const store = new MongoStore(mongoose.createConnection());

  after(async () => {
    await store.close();
  });

  it('fails inserts instead of buffering them', async () => {
    await assert.rejects(store.insertOne('site', { name: 'North Plant' }), isUnavailable);
  });

  it('fails queries', async () => {
    await assert.rejects(drain(store.find('site', {}, 10)), isUnavailable);
  });

  it('fails lookups of well-formed ids', async () => {
    await assert.rejects(store.findById('site', '652f1c2e9b1d4a3f8c7e6d5b'), isUnavailable);
  });

  it('treats malformed ids as missing', async () => {
    assert.equal(await store.findById('site', 's1'), null);
  });

  it('fails collection listing', async () => {
    await assert.rejects(store.listCollections(), isUnavailable);
  });
});

describe('MongoStore when the server drops away mid-connection', () => {
  const store = new MongoStore(connectedTo(failingCollection(new mongoose.mongo.MongoNetworkError('connection reset'))));

  it('reports inserts as unavailable', async () => {
    await assert.rejects(store.insertOne('site', { name: 'North Plant' }), isUnavailable);
  });

  it('reports queries as unavailable', async () => {
    await assert.rejects(drain(store.find('site', {}, 10)), isUnavailable);
  });

  it('reports lookups as unavailable', async () => {
    await assert.rejects(store.findById('site', '652f1c2e9b1d4a3f8c7e6d5b'), isUnavailable);
  });

  it('reports collection listing as unavailable without a database handle', async () => {
    await assert.rejects(store.listCollections(), isUnavailable);
  });
});

describe('MongoStore with other driver failures', () => {
  it('passes them through unchanged', async () => {
    const failure = new Error('duplicate key');
    const store = new MongoStore(connectedTo(failingCollection(failure)));
    await assert.rejects(store.insertOne('site', { name: 'North Plant' }), (error: unknown) => error === failure);
  });
});

describe('toStoreError', () => {
  it('maps network timeouts to unavailability', () => {
    assert.ok(isUnavailable(toStoreError(new mongoose.mongo.MongoNetworkTimeoutError('timed out'))));
  });

  it('leaves other errors alone', () => {
    const error = new TypeError('bad input');
    assert.equal(toStoreError(error), error);
  });
});
