import assert from 'node:assert/strict';
import { Server } from 'node:http';
import { createApp, AppOptions } from '../../src/app';
import { logger } from '../../src/utils/logger';
import { isPlainObject } from '../../src/utils/isPlainObject';

logger.level = 'silent';

export interface TestServer {
  url: string;
  close(): Promise<void>;
}

export const startServer = (options: AppOptions): Promise<TestServer> =>
  new Promise((resolve, reject) => {
    const server: Server = createApp(options).listen(0, '127.0.0.1');
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Test server has no TCP address'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });

export const postJson = (url: string, body: unknown) =>
  fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export const readObject = async (res: FetchResponse): Promise<Record<string, unknown>> => {
  const body: unknown = await res.json();
  assert.ok(isPlainObject(body), 'expected a JSON object');
  return body;
};

export const readList = async (res: FetchResponse): Promise<Record<string, unknown>[]> => {
  const body: unknown = await res.json();
  assert.ok(Array.isArray(body) && body.every(isPlainObject), 'expected a JSON array of objects');
  return body;
};

/** `field:kind` pairs from a 422 response, in the order the API lists them. */
export const issueKeys = (body: Record<string, unknown>): string[] => {
  assert.equal(body.message, 'Validation failed');
  const { errors } = body;
  assert.ok(Array.isArray(errors) && errors.every(isPlainObject));
  return errors.map((issue) => `${String(issue.field)}:${String(issue.kind)}`);
};

export const issueFields = (body: Record<string, unknown>): string[] =>
  issueKeys(body).map((key) => key.split(':')[0]);
