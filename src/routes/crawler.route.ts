import { Router } from 'express';
import type { CrawlerController } from '../controllers/crawler.controller';

export function createCrawlerRouter(controller: CrawlerController): Router {
  const router = Router();

  router.get('/', controller.listCrawlers.bind(controller));
  // task routes first so `tasks` is never taken for a crawler type
  router.get('/tasks', controller.listAllTasks.bind(controller));
  router.get('/tasks/:taskId', controller.getTask.bind(controller));
  router.post('/:crawlerType/crawl', controller.requestCrawl.bind(controller));
  router.get('/:crawlerType/tasks', controller.listCrawlerTasks.bind(controller));

  return router;
}
