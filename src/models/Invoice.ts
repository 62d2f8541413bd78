import mongoose from 'mongoose';
import { asPayload, assertValid } from './validation';

export const INVOICE_STATUSES = ['unpaid', 'paid', 'overdue'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

const invoiceSchema = new mongoose.Schema(
  {
    job_id: { type: String, required: true },
    amount: { type: Number, required: true },
    due_date: { type: Date, default: null },
    status: { type: String, enum: [...INVOICE_STATUSES], required: true, default: 'unpaid' },
    // Free-form: description/qty/price or whatever the client sends.
    line_items: { type: [mongoose.Schema.Types.Mixed], default: [] },
  },
  { _id: false, versionKey: false },
);

const Invoice = mongoose.model('Invoice', invoiceSchema, 'invoice');

export const parseInvoice = (input: unknown) => {
  const payload = asPayload(input);
  const doc = new Invoice(payload);
  assertValid(doc, payload, { line_items: 'object' });
  const { _id, ...invoice } = doc.toObject();
  return invoice;
};

export type InvoiceRecord = ReturnType<typeof parseInvoice>;
