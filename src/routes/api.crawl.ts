import { Router } from 'express';
import { z } from 'zod';
import { httpStatusFor, InvalidTaskDataError, toErrorResponse } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { describeIssues } from '~/lib/task-queue/schemas';
import type { ApiDependencies } from './types';

const log = getLogger({ module: 'ApiCrawl' });

const CrawlRequestSchema = z.object({
  keyword: z.string({ required_error: 'keyword is required' }).trim().min(1, 'keyword must be a non-empty string'),
  region: z.string().nullish(),
});

export function crawlRouter({ taskManager }: ApiDependencies): Router {
  const router = Router();

  // POST /crawl - submit a keyword search
  router.post('/crawl', async (req, res) => {
    const context = { path: req.originalUrl, method: req.method };

    const parsed = CrawlRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const error = new InvalidTaskDataError(describeIssues(parsed.error));
      res.status(400).json(toErrorResponse(error, context));
      return;
    }

    try {
      const taskId = await taskManager.create(parsed.data.keyword, parsed.data.region);
      res.status(202).json({ task_id: taskId });
    } catch (error) {
      log.error({ err: error }, 'create task failed');
      res.status(httpStatusFor(error)).json(toErrorResponse(error, context));
    }
  });

  return router;
}
