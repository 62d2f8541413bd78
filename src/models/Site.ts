import mongoose from 'mongoose';
import { asPayload, assertValid } from './validation';

const siteSchema = new mongoose.Schema(
  {
    name: { type: String, required: true },
    address: { type: String, default: null },
    city: { type: String, default: null },
    state: { type: String, default: null },
    pincode: { type: String, default: null },
  },
  { _id: false, versionKey: false },
);

const Site = mongoose.model('Site', siteSchema, 'site');

export const parseSite = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new Site(payload);
  assertValid(doc, payload);
  const { _id, ...site } = doc.toObject();
  return site;
};

export type SiteRecord = ReturnType<typeof parseSite>;
