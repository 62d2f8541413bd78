import mongoose from 'mongoose';
import { asPayload, assertValid } from './validation';

export const SERVICE_TYPES = ['AMC', 'Repair', 'Installation', 'Emergency'] as const;
export type ServiceType = (typeof SERVICE_TYPES)[number];

// Nominal forward order; transitions are not enforced anywhere.
export const JOB_STATUSES = ['New', 'Assigned', 'Travelling', 'In Progress', 'Closed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

/** What a customer submits; turned into a Job before it is stored. */
const jobRequestSchema = new mongoose.Schema(
  {
    service_type: { type: String, enum: [...SERVICE_TYPES], required: true },
    site_id: { type: String, required: true },
    asset_ids: { type: [String], default: [] },
    description: { type: String, default: null },
    schedule: { type: Date, default: null },
    media_urls: { type: [String], default: [] },
  },
  { _id: false, versionKey: false },
);

const timelineEntrySchema = new mongoose.Schema(
  {
    status: { type: String, enum: [...JOB_STATUSES], required: true },
    at: { type: Date, required: true },
  },
  { _id: false },
);

const jobSchema = new mongoose.Schema(
  {
    customer_id: { type: String, default: null },
    service_type: { type: String, enum: [...SERVICE_TYPES], required: true },
    status: { type: String, enum: [...JOB_STATUSES], required: true, default: 'New' },
    site_id: { type: String, required: true },
    asset_ids: { type: [String], default: [] },
    description: { type: String, default: null },
    scheduled_for: { type: Date, default: null },
    assigned_technician_id: { type: String, default: null },
    timeline: { type: [timelineEntrySchema], default: [] },
  },
  { _id: false, versionKey: false },
);

const JobRequest = mongoose.model('JobRequest', jobRequestSchema);
const Job = mongoose.model('Job', jobSchema, 'job');

export const parseJobRequest = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new JobRequest(payload);
  assertValid(doc, payload, { asset_ids: 'string', media_urls: 'string' });
  const { _id, ...request } = doc.toObject();
  return request;
};

export const parseJob = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new Job(payload);
  assertValid(doc, payload, { asset_ids: 'string', timeline: 'object' });
  const { _id, ...job } = doc.toObject();
  return job;
};

export type JobRequestRecord = ReturnType<typeof parseJobRequest>;
export type JobRecord = ReturnType<typeof parseJob>;

/**
 * Builds the stored job for a request: unassigned, status `New`, and a
 * timeline seeded with that status at `now`. `media_urls` is not carried over.
 */
export const jobFromRequest = (request: JobRequestRecord, now: Date = new Date()) =>
  parseJob({
    customer_id: null,
    service_type: request.service_type,
    status: 'New',
    site_id: request.site_id,
    asset_ids: request.asset_ids,
    description: request.description,
    scheduled_for: request.schedule,
    assigned_technician_id: null,
    timeline: [{ status: 'New', at: now }],
  });
