import { Router } from 'express';
import type { QueueController } from '../controllers/QueueController';

export function createQueueRouter(controller: QueueController): Router {
  const router = Router();

  router.post('/wanted', controller.enqueueWanted);
  router.post('/manual', controller.enqueueManual);

  router.get('/', controller.list);
  router.get('/stats', controller.stats);
  router.get('/events', controller.listEvents);
  router.get('/events/stream', controller.streamEvents);
  router.get('/identity/:identity', controller.getByIdentity);
  router.get('/:id', controller.get);

  // Control operations
  router.post('/:id/pause', controller.pause);
  router.post('/:id/resume', controller.resume);
  router.post('/:id/cancel', controller.cancel);
  router.post('/:id/retry', controller.retry);
  router.post('/:id/requeue', controller.requeue);

  return router;
}
