import { Request, Response } from 'express';
import { DocumentStore } from '../store/types';
import { INVOICE_STATUSES, parseInvoice } from '../models/Invoice';
import { InvoiceFilter, createDocument, getDocuments, requireStore } from '../services/persistence';
import { parseEnumFilter, parseLimit } from '../utils/queryParams';

const DEFAULT_LIMIT = 200;

export const invoiceController = (store: DocumentStore | null) => ({
  // @desc    Raise an invoice
  // @route   POST /invoices
  createInvoice: async (req: Request, res: Response) => {
    const invoice = parseInvoice(req.body);
    const id = await createDocument(requireStore(store), 'invoice', invoice);
    res.status(201).json({ _id: id });
  },

  // @desc    List invoices, optionally by status
  // @route   GET /invoices?limit=&status=
  getInvoices: async (req: Request, res: Response) => {
    const limit = parseLimit(req, res, DEFAULT_LIMIT);
    const filter: InvoiceFilter = { status: parseEnumFilter(req, res, 'status', INVOICE_STATUSES) };
    const invoices = await getDocuments(requireStore(store), 'invoice', filter, limit);
    res.json(invoices);
  },
});
