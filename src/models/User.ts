import mongoose from 'mongoose';
import { asPayload, assertValid } from './validation';

export const USER_ROLES = ['admin', 'manager', 'viewer', 'technician', 'customer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

// No route writes users yet; the schema fixes the shape for when one does.
const userSchema = new mongoose.Schema(
  {
    org_name: { type: String, default: null },
    name: { type: String, default: null },
    email: { type: String, default: null, trim: true, lowercase: true },
    phone: { type: String, default: null },
    role: { type: String, enum: [...USER_ROLES], required: true, default: 'customer' },
  },
  { _id: false, versionKey: false },
);

const User = mongoose.model('User', userSchema, 'user');

export const parseUser = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new User(payload);
  assertValid(doc, payload);
  const { _id, ...user } = doc.toObject();
  return user;
};

export type UserRecord = ReturnType<typeof parseUser>;
