import mongoose from 'mongoose';
import { asPayload, assertValid, integer } from './validation';

const feedbackSchema = new mongoose.Schema(
  {
    job_id: { type: String, required: true },
    rating_overall: { type: Number, required: true, min: 1, max: 5, validate: integer },
    rating_engineer: { type: Number, default: null, min: 1, max: 5, validate: integer },
    comments: { type: String, default: null },
    request_follow_up: { type: Boolean, required: true, default: false },
  },
  { _id: false, versionKey: false },
);

const Feedback = mongoose.model('Feedback', feedbackSchema, 'feedback');

export const parseFeedback = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new Feedback(payload);
  assertValid(doc, payload);
  const { _id, ...feedback } = doc.toObject();
  return feedback;
};

export type FeedbackRecord = ReturnType<typeof parseFeedback>;
