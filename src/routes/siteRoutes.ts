import express from 'express';
import { DocumentStore } from '../store/types';
import { siteController } from '../controllers/siteController';

const siteRoutes = (store: DocumentStore | null) => {
  const router = express.Router();
  const { createSite, getSites } = siteController(store);

  router.route('/').get(getSites).post(createSite);

  return router;
};

export default siteRoutes;
