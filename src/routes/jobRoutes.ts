import express from 'express';
import { DocumentStore } from '../store/types';
import { jobController } from '../controllers/jobController';

const jobRoutes = (store: DocumentStore | null) => {
  const router = express.Router();
  const { createJob, getJobs } = jobController(store);

  router.route('/').get(getJobs).post(createJob);

  return router;
};

export default jobRoutes;
