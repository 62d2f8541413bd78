import express from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';

import { DocumentStore } from './store/types';
import { errorHandler, notFound } from './middlewares/errorMiddleware';
import { requestLogger } from './middlewares/requestLogger';

import systemRoutes from './routes/systemRoutes';
import siteRoutes from './routes/siteRoutes';
import assetRoutes from './routes/assetRoutes';
import jobRoutes from './routes/jobRoutes';
import invoiceRoutes from './routes/invoiceRoutes';
import feedbackRoutes from './routes/feedbackRoutes';

export interface AppOptions {
  /** `null` keeps diagnostics up while every entity route answers 500. */
  store: DocumentStore | null;
  databaseUrlSet?: boolean;
}

const corsOptions: CorsOptions = {
  // Any origin; reflected rather than `*` so credentialed requests work.
  origin: true,
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  optionsSuccessStatus: 204,
};

export const createApp = ({ store, databaseUrlSet = false }: AppOptions) => {
  const app = express();

  // Middlewares
  app.use(helmet());
  app.use(cors(corsOptions));
  app.options(/.*/, cors(corsOptions));
  app.use(express.json());
  app.use(requestLogger);

  app.use('/', systemRoutes({ store, databaseUrlSet }));
  app.use('/sites', siteRoutes(store));
  app.use('/assets', assetRoutes(store));
  app.use('/jobs', jobRoutes(store));
  app.use('/invoices', invoiceRoutes(store));
  app.use('/feedback', feedbackRoutes(store));

  // Error Handling
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
