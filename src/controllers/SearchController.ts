import type { Request, Response } from 'express';
import { sendError } from '../middleware/errorHandler';
import type { QueueService } from '../services/pipeline/queueService';
import { ValidationError } from '../utils/errors';

export class SearchController {
  constructor(private readonly queue: QueueService) {}

  // Ranked indexer results for a manual pick; nothing is enqueued
  search = async (req: Request, res: Response) => {
    try {
      const { title, author } = req.query;
      if (typeof title !== 'string' || !title.trim()) {
        throw new ValidationError('Search title required');
      }

      const ranked = await this.queue.interactiveSearch({
        title,
        author: typeof author === 'string' ? author : null,
      });
      res.json(
        ranked.map(({ candidate, assessment }) => ({
          ...candidate,
          confidence: assessment.confidence,
          rating: assessment.rating,
          totalScore: assessment.totalScore,
          components: assessment.components,
          bonuses: assessment.bonuses,
          penalties: assessment.penalties,
        })),
      );
    } catch (error) {
      sendError(res, error, 'Release search error');
    }
  };
}
