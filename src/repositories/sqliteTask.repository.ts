import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { SqliteDatabase } from '../db/connection';
import { ConflictError, TaskNotFoundError } from '../errors/http-error';
import type { CrawlTask, TaskListFilter, TaskTransition } from '../types/tasks';
import { logger } from '../utils/logger';
import { mapRowToTask, mapTaskToRow, type TaskRowParams } from './mappers/task.mapper';
import type { TaskRepository, TaskRepositoryOptions } from './task.repository';
import { applyTransition, clampProgress, createPendingTask } from './taskLifecycle';

interface ProgressParams {
  task_id: string;
  progress: number;
  current_step: string | null;
  updated_at: string;
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT')
  );
}

const countRowSchema = z.object({ total: z.number().int() });

function whereClause(filter: TaskListFilter): { where: string; params: Array<string | number> } {
  const clauses: string[] = [];
  const params: Array<string | number> = [];

  if (filter.crawlerType) {
    clauses.push('crawler_type = ?');
    params.push(filter.crawlerType);
  }
  if (filter.status) {
    clauses.push('status = ?');
    params.push(filter.status);
  }

  return { where: clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '', params };
}

/**
 * Durable task store backed by the `crawler_task_logs` table. The partial
 * unique index on (crawler_type, target) for active rows backs up the
 * in-transaction check, so two processes sharing the file still cannot both
 * create an active task for one key.
 */
export class SqliteTaskRepository implements TaskRepository {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly insertStmt: Database.Statement<[TaskRowParams]>;
  private readonly updateStmt: Database.Statement<[TaskRowParams]>;
  private readonly progressStmt: Database.Statement<[ProgressParams]>;
  private readonly getStmt: Database.Statement<[string]>;
  private readonly activeStmt: Database.Statement<[string, string]>;

  constructor(
    private readonly db: SqliteDatabase,
    options: TaskRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    this.insertStmt = db.prepare<TaskRowParams>(`
      INSERT INTO crawler_task_logs (
        task_id, crawler_type, target, status, progress, current_step,
        created_at, started_at, completed_at, execution_time_ms,
        result_summary, error, updated_at
      ) VALUES (
        @task_id, @crawler_type, @target, @status, @progress, @current_step,
        @created_at, @started_at, @completed_at, @execution_time_ms,
        @result_summary, @error, @updated_at
      )
    `);
    this.updateStmt = db.prepare<TaskRowParams>(`
      UPDATE crawler_task_logs SET
        status = @status,
        progress = @progress,
        current_step = @current_step,
        started_at = @started_at,
        completed_at = @completed_at,
        execution_time_ms = @execution_time_ms,
        result_summary = @result_summary,
        error = @error,
        updated_at = @updated_at
      WHERE task_id = @task_id
    `);
    this.progressStmt = db.prepare<ProgressParams>(`
      UPDATE crawler_task_logs SET
        progress = @progress,
        current_step = COALESCE(@current_step, current_step),
        updated_at = @updated_at
      WHERE task_id = @task_id AND status = 'running'
    `);
    this.getStmt = db.prepare<[string]>('SELECT * FROM crawler_task_logs WHERE task_id = ?');
    this.activeStmt = db.prepare<[string, string]>(`
      SELECT * FROM crawler_task_logs
      WHERE crawler_type = ? AND target = ? AND status IN ('pending', 'running')
      ORDER BY seq DESC
      LIMIT 1
    `);
  }

  create(crawlerType: string, target: string): CrawlTask {
    const insert = this.db.transaction((): CrawlTask => {
      const existing = this.findActive(crawlerType, target);
      if (existing) {
        throw new ConflictError(existing.id, crawlerType, target);
      }

      const now = this.now();
      const task = createPendingTask(this.generateId(), crawlerType, target, now);
      this.insertStmt.run(mapTaskToRow(task, now.toISOString()));
      return task;
    });

    try {
      return insert.immediate();
    } catch (error) {
      if (isUniqueViolation(error)) {
        const winner = this.findActive(crawlerType, target);
        if (winner) {
          throw new ConflictError(winner.id, crawlerType, target);
        }
      }
      throw error;
    }
  }

  transition(id: string, change: TaskTransition): CrawlTask {
    const apply = this.db.transaction((): CrawlTask => {
      const current = this.get(id);
      const now = this.now();
      const next = applyTransition(current, change, now);
      this.updateStmt.run(mapTaskToRow(next, now.toISOString()));
      return next;
    });
    return apply.immediate();
  }

  updateProgress(id: string, progress: number, step?: string): boolean {
    const result = this.progressStmt.run({
      task_id: id,
      progress: clampProgress(progress),
      current_step: step ?? null,
      updated_at: this.now().toISOString(),
    });

    if (result.changes === 0) {
      // distinguishes "not running" from "no such task"
      this.get(id);
      return false;
    }
    return true;
  }

  get(id: string): CrawlTask {
    const row = this.getStmt.get(id);
    if (!row) {
      throw new TaskNotFoundError(id);
    }
    return mapRowToTask(row);
  }

  findActive(crawlerType: string, target: string): CrawlTask | undefined {
    const row = this.activeStmt.get(crawlerType, target);
    return row ? mapRowToTask(row) : undefined;
  }

  list(filter: TaskListFilter = {}): CrawlTask[] {
    const { where, params } = whereClause(filter);

    let sql = `SELECT * FROM crawler_task_logs${where} ORDER BY created_at DESC, seq DESC`;
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    return this.db.prepare(sql).all(...params).map(mapRowToTask);
  }

  count(filter: TaskListFilter = {}): number {
    const { where, params } = whereClause(filter);
    const row = this.db.prepare(`SELECT COUNT(*) AS total FROM crawler_task_logs${where}`).get(...params);
    return countRowSchema.parse(row).total;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info('Task database closed');
    }
  }
}
