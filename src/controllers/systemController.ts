import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { ENTITY_COLLECTIONS } from '../models/collections';
import { isPlainObject } from '../utils/isPlainObject';

export interface SystemOptions {
  store: DocumentStore | null;
  databaseUrlSet: boolean;
}

export interface ConnectivityReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

const errorText = (error: unknown, max: number) =>
  (error instanceof Error ? error.message : String(error)).slice(0, max);

/** Probes the store without ever failing the request. */
export const checkConnectivity = async ({
  store,
  databaseUrlSet,
}: SystemOptions): Promise<ConnectivityReport> => {
  const report: ConnectivityReport = {
    backend: 'Running',
    database: 'Not Initialized',
    database_url: databaseUrlSet ? 'Set' : 'Not Set',
    database_name: 'Not Set',
    connection_status: 'Not Connected',
    collections: [],
  };
  if (!store) return report;

  report.database = 'Available';
  report.database_name = store.name || 'Set';
  try {
    report.collections = await store.listCollections();
    report.connection_status = 'Connected';
    report.database = 'Connected & Working';
  } catch (error) {
    report.database = `Connected but Error: ${errorText(error, 80)}`;
  }
  return report;
};

export const systemController = (options: SystemOptions) => ({
  // @route   GET /
  getRoot: async (_req: Request, res: Response) => {
    res.json({ message: 'Hello from the Field Service API!' });
  },

  // @desc    Liveness; does not touch the store
  // @route   GET /health
  getHealth: async (_req: Request, res: Response) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  },

  // @route   POST /echo
  echo: async (req: Request, res: Response) => {
    if (!isPlainObject(req.body)) {
      res.status(400);
      throw new Error('Request body must be a JSON object');
    }
    res.json({ received: req.body, time: new Date().toISOString() });
  },

  // @desc    Store connectivity diagnostic
  // @route   GET /test
  getConnectivity: async (_req: Request, res: Response) => {
    res.json(await checkConnectivity(options));
  },

  // @route   GET /schema
  getSchema: async (_req: Request, res: Response) => {
    res.json({ collections: [...ENTITY_COLLECTIONS] });
  },
});
