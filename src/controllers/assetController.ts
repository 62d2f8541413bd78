import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { parseAsset } from '../models/Asset';
import {
  AssetFilter,
  createDocument,
  documentExists,
  getDocuments,
  requireStore,
} from '../services/persistence';
import { parseLimit, parseStringFilter } from '../utils/queryParams';
import { logger } from '../utils/logger';

const DEFAULT_LIMIT = 200;

export const assetController = (store: DocumentStore | null) => ({
  // @desc    Register an asset at a site
  // @route   POST /assets
  createAsset: async (req: Request, res: Response) => {
    const asset = parseAsset(req.body);
    const db = requireStore(store);

    // Advisory only: an unknown site is logged, the asset is still stored.
    if (!(await documentExists(db, 'site', asset.site_id))) {
      logger.warn({ site_id: asset.site_id }, 'Asset references an unknown site');
    }

    const id = await createDocument(db, 'asset', asset);
    res.status(201).json({ _id: id });
  },

  // @desc    List assets, optionally for one site
  // @route   GET /assets?limit=&site_id=
  getAssets: async (req: Request, res: Response) => {
    const limit = parseLimit(req, res, DEFAULT_LIMIT);
    const filter: AssetFilter = { site_id: parseStringFilter(req, res, 'site_id') };
    const assets = await getDocuments(requireStore(store), 'asset', filter, limit);
    res.json(assets);
  },
});
