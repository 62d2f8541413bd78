import mongoose from 'mongoose';
import { asPayload, assertValid, integer } from './validation';

const analyticsSnapshotSchema = new mongoose.Schema(
  {
    month: { type: String, required: true, match: /^\d{4}-(0[1-9]|1[0-2])$/ },
    jobs_count: { type: Number, required: true, min: 0, validate: integer },
    downtime_hours: { type: Number, required: true, min: 0 },
    engineer_performance: { type: [mongoose.Schema.Types.Mixed], default: [] },
  },
  { _id: false, versionKey: false },
);

const AnalyticsSnapshot = mongoose.model(
  'AnalyticsSnapshot',
  analyticsSnapshotSchema,
  'analytics_snapshot',
);

export const parseAnalyticsSnapshot = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new AnalyticsSnapshot(payload);
  assertValid(doc, payload, { engineer_performance: 'object' });
  const { _id, ...snapshot } = doc.toObject();
  return snapshot;
};

export type AnalyticsSnapshotRecord = ReturnType<typeof parseAnalyticsSnapshot>;
