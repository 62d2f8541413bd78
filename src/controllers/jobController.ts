import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { JOB_STATUSES, jobFromRequest, parseJobRequest } from '../models/Job';
import { JobFilter, createDocument, getDocuments, requireStore } from '../services/persistence';
import { parseEnumFilter, parseLimit } from '../utils/queryParams';

const DEFAULT_LIMIT = 200;

export const jobController = (store: DocumentStore | null) => ({
  // @desc    Open a service job from a customer request
  // @route   POST /jobs
  createJob: async (req: Request, res: Response) => {
    const job = jobFromRequest(parseJobRequest(req.body));
    const id = await createDocument(requireStore(store), 'job', job);
    res.status(201).json({ job_id: id, status: job.status });
  },

  // @desc    List jobs, optionally by status
  // @route   GET /jobs?limit=&status=
  getJobs: async (req: Request, res: Response) => {
    const limit = parseLimit(req, res, DEFAULT_LIMIT);
    const filter: JobFilter = { status: parseEnumFilter(req, res, 'status', JOB_STATUSES) };
    const jobs = await getDocuments(requireStore(store), 'job', filter, limit);
    res.json(jobs);
  },
});
