import { Request, Response } from 'express';
import { z } from 'zod';
import { getErrorStatus, HttpError } from '../errors/http-error';
import type { CrawlOrchestrator } from '../services/crawlOrchestrator.service';
import type { CrawlTask } from '../types/tasks';
import { logger } from '../utils/logger';

const crawlBodySchema = z.object({
  target: z.string().max(64).nullish(),
});

const listQuerySchema = z.object({
  status: z.enum(['pending', 'running', 'succeeded', 'failed']).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

/** Task as rendered over HTTP: every optional field present, null when unset. */
export function toTaskResponse(task: CrawlTask) {
  return {
    id: task.id,
    crawlerType: task.crawlerType,
    target: task.target,
    status: task.status,
    progress: task.progress,
    currentStep: task.currentStep ?? null,
    createdAt: task.createdAt,
    startedAt: task.startedAt ?? null,
    completedAt: task.completedAt ?? null,
    executionTimeMs: task.executionTimeMs ?? null,
    resultSummary: task.resultSummary ?? null,
    error: task.error ?? null,
  };
}

export class CrawlerController {
  constructor(private readonly orchestrator: CrawlOrchestrator) {}

  /**
   * Registered crawler types with their descriptions, plus the executor's
   * current load. `names` is the plain list of crawler types.
   */
  listCrawlers(_req: Request, res: Response) {
    const crawlers = this.orchestrator.listCrawlers();
    return res.json({
      names: crawlers.map((crawler) => crawler.name),
      crawlers,
      executor: this.orchestrator.executorStats(),
    });
  }

  requestCrawl(req: Request, res: Response) {
    try {
      const { crawlerType } = req.params;
      const body = crawlBodySchema.parse(req.body ?? {});

      const task = this.orchestrator.requestCrawl(crawlerType, body.target ?? undefined);

      return res
        .status(202)
        .location(`${req.baseUrl}/tasks/${task.id}`)
        .json({
          success: true,
          taskId: task.id,
          status: task.status,
          crawlerType: task.crawlerType,
          target: task.target,
          message: 'Crawl task accepted',
        });
    } catch (error) {
      return this.sendError(res, error, 'Crawl request');
    }
  }

  listCrawlerTasks(req: Request, res: Response) {
    try {
      const { crawlerType } = req.params;
      const query = listQuerySchema.parse(req.query);

      const { tasks, total } = this.orchestrator.findTasks({ crawlerType, ...query });
      return res.json({ tasks: tasks.map(toTaskResponse), total });
    } catch (error) {
      return this.sendError(res, error, 'Task listing');
    }
  }

  listAllTasks(req: Request, res: Response) {
    try {
      const query = listQuerySchema.parse(req.query);

      const { tasks, total } = this.orchestrator.findTasks(query);
      return res.json({ tasks: tasks.map(toTaskResponse), total });
    } catch (error) {
      return this.sendError(res, error, 'Task listing');
    }
  }

  getTask(req: Request, res: Response) {
    try {
      const task = this.orchestrator.getStatus(req.params.taskId);
      return res.json(toTaskResponse(task));
    } catch (error) {
      return this.sendError(res, error, 'Task lookup');
    }
  }

  private sendError(res: Response, error: unknown, action: string) {
    if (error instanceof z.ZodError) {
      return res.status(400).json({
        success: false,
        error: 'Invalid request payload',
        details: error.flatten(),
      });
    }

    const status = getErrorStatus(error) ?? 500;
    if (status >= 500 && status !== 503) {
      logger.error(`${action} failed`, { error });
    } else {
      logger.warn(`${action} rejected`, { status, error: error instanceof Error ? error.message : error });
    }

    if (!(error instanceof HttpError) || status === 500) {
      return res.status(status).json({ success: false, error: 'Internal server error' });
    }

    const data = typeof error.data === 'object' && error.data !== null ? error.data : {};
    return res.status(status).json({ success: false, error: error.message, ...data });
  }
}
