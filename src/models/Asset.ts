import mongoose from 'mongoose';
import { asPayload, assertValid } from './validation';

export const ASSET_STATUSES = ['active', 'inactive', 'maintenance'] as const;
export type AssetStatus = (typeof ASSET_STATUSES)[number];

const assetSchema = new mongoose.Schema(
  {
    site_id: { type: String, required: true },
    name: { type: String, required: true },
    type: { type: String, required: true },
    status: { type: String, enum: [...ASSET_STATUSES], required: true, default: 'active' },
    serial_number: { type: String, default: null },
    model: { type: String, default: null },
  },
  { _id: false, versionKey: false },
);

const Asset = mongoose.model('Asset', assetSchema, 'asset');

export const parseAsset = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new Asset(payload);
  assertValid(doc, payload);
  const { _id, ...asset } = doc.toObject();
  return asset;
};

export type AssetRecord = ReturnType<typeof parseAsset>;
