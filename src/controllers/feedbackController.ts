import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { parseFeedback } from '../models/Feedback';
import { createDocument, requireStore } from '../services/persistence';

export const feedbackController = (store: DocumentStore | null) => ({
  // @desc    Submit feedback for a job (write-once)
  // @route   POST /feedback
  submitFeedback: async (req: Request, res: Response) => {
    const feedback = parseFeedback(req.body);
    const id = await createDocument(requireStore(store), 'feedback', feedback);
    res.status(201).json({ _id: id });
  },
});
