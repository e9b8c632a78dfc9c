import type { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../config/logger';
import { sendError } from '../middleware/errorHandler';
import type { PipelineEventBus } from '../services/events/pipelineEvents';
import type { QueueService } from '../services/pipeline/queueService';
import { listQuerySchema } from '../services/pipeline/queueService';
import { ValidationError } from '../utils/errors';

const eventsQuerySchema = z.object({
  since: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  itemId: z.string().optional(),
});

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue.path.join('.') || 'query'}: ${issue.message}`);
  }
  return parsed.data;
}

const HEARTBEAT_MS = 30000;

export class QueueController {
  constructor(private readonly queue: QueueService, private readonly events: PipelineEventBus) {}

  enqueueWanted = (req: Request, res: Response) => {
    try {
      const { item, created } = this.queue.enqueueWanted(req.body);
      res.status(created ? 201 : 200).json(item);
    } catch (error) {
      sendError(res, error, 'Enqueue wanted error');
    }
  };

  enqueueManual = (req: Request, res: Response) => {
    try {
      res.status(201).json(this.queue.enqueueManual(req.body));
    } catch (error) {
      sendError(res, error, 'Enqueue manual error');
    }
  };

  list = (req: Request, res: Response) => {
    try {
      const { status, limit, offset } = parseQuery(listQuerySchema, req.query);
      res.json(this.queue.list({ status, limit, offset }));
    } catch (error) {
      sendError(res, error, 'List queue error');
    }
  };

  stats = (_req: Request, res: Response) => {
    try {
      res.json(this.queue.countsByStatus());
    } catch (error) {
      sendError(res, error, 'Queue stats error');
    }
  };

  get = (req: Request, res: Response) => {
    try {
      res.json(this.queue.get(req.params.id));
    } catch (error) {
      sendError(res, error, 'Get queue item error');
    }
  };

  getByIdentity = (req: Request, res: Response) => {
    try {
      res.json(this.queue.getByIdentity(req.params.identity));
    } catch (error) {
      sendError(res, error, 'Get by identity error');
    }
  };

  // pause, resume and cancel are applied on the next tick
  pause = (req: Request, res: Response) => {
    try {
      res.status(202).json(this.queue.pause(req.params.id));
    } catch (error) {
      sendError(res, error, 'Pause error');
    }
  };

  resume = (req: Request, res: Response) => {
    try {
      res.status(202).json(this.queue.resume(req.params.id));
    } catch (error) {
      sendError(res, error, 'Resume error');
    }
  };

  cancel = (req: Request, res: Response) => {
    try {
      res.status(202).json(this.queue.cancel(req.params.id));
    } catch (error) {
      sendError(res, error, 'Cancel error');
    }
  };

  retry = (req: Request, res: Response) => {
    try {
      const item = this.queue.retry(req.params.id);
      res.status(item.pendingControl === 'requeue' ? 202 : 200).json(item);
    } catch (error) {
      sendError(res, error, 'Retry error');
    }
  };

  requeue = (req: Request, res: Response) => {
    try {
      const item = this.queue.forceRequeue(req.params.id);
      res.status(item.pendingControl === 'requeue' ? 202 : 200).json(item);
    } catch (error) {
      sendError(res, error, 'Requeue error');
    }
  };

  listEvents = (req: Request, res: Response) => {
    try {
      res.json(this.queue.listEvents(parseQuery(eventsQuerySchema, req.query)));
    } catch (error) {
      sendError(res, error, 'List events error');
    }
  };

  // SSE: replays from Last-Event-ID (or ?since) and then pushes live events
  streamEvents = (req: Request, res: Response) => {
    const lastEventId = Number(req.header('last-event-id') ?? req.query.since ?? NaN);

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();
    res.write('event: connected\ndata: {"status":"connected"}\n\n');

    let lastSentId = 0;
    const send = (id: number, payload: unknown) => {
      if (id <= lastSentId) return;
      lastSentId = id;
      res.write(`id: ${id}\nevent: pipeline\ndata: ${JSON.stringify(payload)}\n\n`);
    };

    if (Number.isInteger(lastEventId) && lastEventId >= 0) {
      for (const event of this.events.list({ since: lastEventId, limit: 1000 })) {
        send(event.id, event);
      }
    }

    const unsubscribe = this.events.subscribe((event) => send(event.id, event));
    const heartbeat = setInterval(() => {
      res.write(`event: heartbeat\ndata: {"time":"${new Date().toISOString()}"}\n\n`);
    }, HEARTBEAT_MS);

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
      logger.debug('[Events] SSE client disconnected');
    });
  };
}
