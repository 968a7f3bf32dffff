import { z } from 'zod';
import type { CrawlResultSummary, CrawlTask, TaskError } from '../../types/tasks';

const taskErrorSchema = z.object({
  kind: z.enum([
    'network',
    'timeout',
    'upstream',
    'no_data',
    'validation',
    'sink',
    'interrupted',
    'unknown_crawler_type',
    'unknown',
  ]),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

const taskRowSchema = z.object({
  seq: z.number(),
  task_id: z.string(),
  crawler_type: z.string(),
  target: z.string(),
  status: z.enum(['pending', 'running', 'succeeded', 'failed']),
  progress: z.number(),
  current_step: z.string().nullable(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  execution_time_ms: z.number().nullable(),
  result_summary: z.string().nullable(),
  error: z.string().nullable(),
  updated_at: z.string(),
});

/** Column values for INSERT/UPDATE, named to match the SQL placeholders. */
export interface TaskRowParams {
  task_id: string;
  crawler_type: string;
  target: string;
  status: CrawlTask['status'];
  progress: number;
  current_step: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  execution_time_ms: number | null;
  result_summary: string | null;
  error: string | null;
  updated_at: string;
}

function parseSummary(raw: string | null): CrawlResultSummary | undefined {
  if (raw === null) return undefined;
  return z.record(z.unknown()).parse(JSON.parse(raw));
}

function parseError(raw: string | null): TaskError | undefined {
  if (raw === null) return undefined;
  return taskErrorSchema.parse(JSON.parse(raw));
}

export function mapRowToTask(input: unknown): CrawlTask {
  const row = taskRowSchema.parse(input);

  const task: CrawlTask = {
    id: row.task_id,
    crawlerType: row.crawler_type,
    target: row.target,
    status: row.status,
    progress: row.progress,
    createdAt: row.created_at,
  };

  if (row.current_step !== null) task.currentStep = row.current_step;
  if (row.started_at !== null) task.startedAt = row.started_at;
  if (row.completed_at !== null) task.completedAt = row.completed_at;
  if (row.execution_time_ms !== null) task.executionTimeMs = row.execution_time_ms;

  const summary = parseSummary(row.result_summary);
  if (summary) task.resultSummary = summary;
  const error = parseError(row.error);
  if (error) task.error = error;

  return task;
}

export function mapTaskToRow(task: CrawlTask, updatedAt: string): TaskRowParams {
  return {
    task_id: task.id,
    crawler_type: task.crawlerType,
    target: task.target,
    status: task.status,
    progress: task.progress,
    current_step: task.currentStep ?? null,
    created_at: task.createdAt,
    started_at: task.startedAt ?? null,
    completed_at: task.completedAt ?? null,
    execution_time_ms: task.executionTimeMs ?? null,
    result_summary: task.resultSummary ? JSON.stringify(task.resultSummary) : null,
    error: task.error ? JSON.stringify(task.error) : null,
    updated_at: updatedAt,
  };
}
