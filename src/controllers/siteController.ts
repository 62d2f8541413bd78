import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { parseSite } from '../models/Site';
import { createDocument, getDocuments, requireStore } from '../services/persistence';
import { parseLimit } from '../utils/queryParams';

const DEFAULT_LIMIT = 100;

export const siteController = (store: DocumentStore | null) => ({
  // @desc    Create a site
  // @route   POST /sites
  createSite: async (req: Request, res: Response) => {
    const site = parseSite(req.body);
    const id = await createDocument(requireStore(store), 'site', site);
    res.status(201).json({ _id: id });
  },

  // @desc    List sites
  // @route   GET /sites?limit=
  getSites: async (req: Request, res: Response) => {
    const limit = parseLimit(req, res, DEFAULT_LIMIT);
    const sites = await getDocuments(requireStore(store), 'site', {}, limit);
    res.json(sites);
  },
});
