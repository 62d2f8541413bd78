import express from 'express';
import { DocumentStore } from '../store/types';
import { invoiceController } from '../controllers/invoiceController';

const invoiceRoutes = (store: DocumentStore | null) => {
  const router = express.Router();
  const { createInvoice, getInvoices } = invoiceController(store);

  router.route('/').get(getInvoices).post(createInvoice);

  return router;
};

export default invoiceRoutes;
