import { Router } from 'express';
import type { SearchController } from '../controllers/SearchController';

export function createSearchRouter(controller: SearchController): Router {
  const router = Router();
  router.get('/', controller.search);
  return router;
}
