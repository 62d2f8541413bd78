import express from 'express';
import { DocumentStore } from '../store/types';
import { assetController } from '../controllers/assetController';

const assetRoutes = (store: DocumentStore | null) => {
  const router = express.Router();
  const { createAsset, getAssets } = assetController(store);

  router.route('/').get(getAssets).post(createAsset);

  return router;
};

export default assetRoutes;
