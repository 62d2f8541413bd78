import express from 'express';
import { DocumentStore } from '../store/types';
import { feedbackController } from '../controllers/feedbackController';

// Write-once: feedback has no listing route.
const feedbackRoutes = (store: DocumentStore | null) => {
  const router = express.Router();
  const { submitFeedback } = feedbackController(store);

  router.route('/').post(submitFeedback);

  return router;
};

export default feedbackRoutes;
