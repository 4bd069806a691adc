/**
 * SQLite Checkpoint Store
 *
 * Durable checkpoints on better-sqlite3. Its synchronous API lets blocking
 * runs persist a checkpoint before the next step starts. State values must
 * survive JSON: dates inside values come back as ISO strings.
 *
 * @module @stepgraph/engine/run/sqlite-checkpoint-store
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { CheckpointStore, RunCheckpoint } from './checkpoint.js';

const HistoryEntrySchema = z.object({
  revision: z.number(),
  nodeId: z.string(),
  kind: z.enum(['node', 'skipped', 'amendment', 'restore', 'join']),
  timestamp: z.coerce.date(),
  delta: z.record(z.unknown()),
  removed: z.array(z.string()),
  attempt: z.number().optional(),
  durationMs: z.number().optional(),
  source: z.string().optional(),
});

const StoredCheckpointSchema = z.object({
  executionId: z.string(),
  workflowId: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']),
  state: z.object({
    values: z.record(z.unknown()),
    revision: z.number(),
    metadata: z.record(z.unknown()),
  }),
  history: z.array(HistoryEntrySchema),
  historyDropped: z.number(),
  frontier: z.array(z.string()),
  pendingRoute: z.object({ nodeId: z.string(), next: z.array(z.string()).optional() }).optional(),
  stepCount: z.number(),
  config: z.record(z.unknown()),
  startedAt: z.coerce.date(),
  savedAt: z.coerce.date(),
});

const PayloadRowSchema = z.object({ payload: z.string() });
const ExecutionRowSchema = z.object({ execution_id: z.string() });

export interface SqliteCheckpointStoreOptions {
  /** Database file; ':memory:' keeps checkpoints in process (default) */
  filename?: string;
  /** Use an already opened database instead of `filename` */
  db?: Database.Database;
}

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly db: Database.Database;

  constructor(options: SqliteCheckpointStoreOptions = {}) {
    if (options.db) {
      this.db = options.db;
    } else {
      const filename = options.filename ?? ':memory:';
      if (filename !== ':memory:') {
        mkdirSync(dirname(filename), { recursive: true });
      }
      this.db = new Database(filename);
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        execution_id TEXT PRIMARY KEY,
        workflow_id TEXT NOT NULL,
        status TEXT NOT NULL,
        step_count INTEGER NOT NULL,
        payload TEXT NOT NULL,
        saved_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_checkpoints_workflow ON checkpoints(workflow_id);
    `);
  }

  save(executionId: string, checkpoint: RunCheckpoint): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO checkpoints (execution_id, workflow_id, status, step_count, payload, saved_at)
         VALUES (@executionId, @workflowId, @status, @stepCount, @payload, @savedAt)`
      )
      .run({
        executionId,
        workflowId: checkpoint.workflowId,
        status: checkpoint.status,
        stepCount: checkpoint.stepCount,
        payload: JSON.stringify(checkpoint),
        savedAt: checkpoint.savedAt.toISOString(),
      });
  }

  /**
   * @throws ZodError when the stored payload is not a checkpoint
   */
  load(executionId: string): RunCheckpoint | null {
    const row = this.db.prepare('SELECT payload FROM checkpoints WHERE execution_id = ?').get(executionId);
    if (row === undefined) {
      return null;
    }
    const { payload } = PayloadRowSchema.parse(row);
    return StoredCheckpointSchema.parse(JSON.parse(payload));
  }

  delete(executionId: string): boolean {
    return this.db.prepare('DELETE FROM checkpoints WHERE execution_id = ?').run(executionId).changes > 0;
  }

  /**
   * Execution IDs with a checkpoint for `workflowId`, most recently saved first
   */
  listExecutions(workflowId: string): string[] {
    return this.db
      .prepare('SELECT execution_id FROM checkpoints WHERE workflow_id = ? ORDER BY saved_at DESC, rowid DESC')
      .all(workflowId)
      .map((row) => ExecutionRowSchema.parse(row).execution_id);
  }

  close(): void {
    this.db.close();
  }
}
