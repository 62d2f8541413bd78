import express from 'express';
import { SystemOptions, systemController } from '../controllers/systemController';

const systemRoutes = (options: SystemOptions) => {
  const router = express.Router();
  const { getRoot, getHealth, echo, getConnectivity, getSchema } = systemController(options);

  router.get('/', getRoot);
  router.get('/health', getHealth);
  router.post('/echo', echo);
  router.get('/test', getConnectivity);
  router.get('/schema', getSchema);

  return router;
};

export default systemRoutes;
