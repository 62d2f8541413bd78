import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { MemoryStore } from './helpers/memoryStore';
import { TestServer, issueKeys, postJson, readObject, startServer } from './helpers/http';

describe('feedback', () => {
  let store: MemoryStore;
  let server: TestServer;

  beforeEach(async () => {
    store = new MemoryStore();
    server = await startServer({ store });
  });

  afterEach(async () => {
    await server.close();
  });

  it('stores feedback with its defaults', async () => {
    const res = await postJson(`${server.url}/feedback`, { job_id: 'j1', rating_overall: 4 });
    assert.equal(res.status, 201);
    const { _id } = await readObject(res);

    const [feedback] = store.documents('feedback');
    assert.equal(String(feedback._id), _id);
    assert.equal(feedback.rating_overall, 4);
    assert.equal(feedback.rating_engineer, null);
    assert.equal(feedback.comments, null);
    assert.equal(feedback.request_follow_up, false);
  });

  it('accepts the rating boundaries', async () => {
    for (const rating of [1, 5]) {
      const res = await postJson(`${server.url}/feedback`, {
        job_id: 'j1',
        rating_overall: rating,
        rating_engineer: rating,
        request_follow_up: true,
      });
      assert.equal(res.status, 201, `rating ${rating}`);
    }
    assert.equal(store.count('feedback'), 2);
  });

  it('rejects overall ratings of 0 and 6', async () => {
    const low = await postJson(`${server.url}/feedback`, { job_id: 'j1', rating_overall: 0 });
    assert.equal(low.status, 422);
    assert.deepEqual(issueKeys(await readObject(low)), ['rating_overall:min']);

    const high = await postJson(`${server.url}/feedback`, { job_id: 'j1', rating_overall: 6 });
    assert.equal(high.status, 422);
    assert.deepEqual(issueKeys(await readObject(high)), ['rating_overall:max']);

    assert.equal(store.count('feedback'), 0);
  });

  it('rejects an engineer rating out of range', async () => {
    const res = await postJson(`${server.url}/feedback`, { job_id: 'j1', rating_overall: 5, rating_engineer: 7 });
    assert.equal(res.status, 422);
    assert.deepEqual(issueKeys(await readObject(res)), ['rating_engineer:max']);
  });

  it('requires the overall rating', async () => {
    const res = await postJson(`${server.url}/feedback`, { job_id: 'j1', comments: 'Quick fix' });
    assert.equal(res.status, 422);
    assert.deepEqual(issueKeys(await readObject(res)), ['rating_overall:required']);
  });

  it('has no listing route', async () => {
    const res = await fetch(`${server.url}/feedback`);
    assert.equal(res.status, 404);
  });
});
