import type { DBContext } from './db/client.js';

export type LogLevel = 'info' | 'warn' | 'error';

export function logIngestEvent(
  ctx: DBContext,
  params: { jobId?: number; objectKey?: string; level?: LogLevel; eventType: string; event?: Record<string, unknown> }
): void {
  ctx.db
    .prepare(
      `INSERT INTO ingest_logs (job_id, object_key, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId || null,
      params.objectKey || null,
      params.level || 'info',
      params.eventType,
      JSON.stringify(params.event || {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId || null, params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
}

export function startJob(ctx: DBContext, jobType: string, payload: Record<string, unknown>): number {
  const job = ctx.db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run(jobType, 'running', JSON.stringify(payload));
  return Number(job.lastInsertRowid);
}

export function completeJob(ctx: DBContext, jobId: number, summary: object): void {
  ctx.db
    .prepare('UPDATE jobs SET status = ?, summary_json = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
    .run('done', JSON.stringify(summary), jobId);
}

export function failJob(ctx: DBContext, jobId: number, errorText: string): void {
  ctx.db
    .prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
    .run('failed', errorText, jobId);
}

export interface JobFailureRow {
  objectKey: string | null;
  eventType: string;
  event: Record<string, unknown>;
}

/** Warnings and errors recorded for one job, oldest first. */
export function jobFailures(ctx: DBContext, jobId: number): JobFailureRow[] {
  const rows = ctx.db
    .prepare(
      `SELECT object_key, event_type, event_json FROM ingest_logs
       WHERE job_id = ? AND level IN ('warn', 'error')
       ORDER BY id ASC`
    )
    .all(jobId) as Array<{ object_key: string | null; event_type: string; event_json: string | null }>;

  return rows.map((r) => ({
    objectKey: r.object_key,
    eventType: r.event_type,
    event: r.event_json ? (JSON.parse(r.event_json) as Record<string, unknown>) : {}
  }));
}

export function healthStatus(ctx: DBContext): {
  dbOk: boolean;
  jobs: { running: number; done: number; failed: number };
  recentFailures24h: number;
  lastJob: { id: number; jobType: string; status: string; updatedAt: string } | null;
} {
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const jobs = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
       FROM jobs`
    )
    .get() as { running: number | null; done: number | null; failed: number | null };

  const recentFailures24h = Number(
    (
      ctx.db
        .prepare("SELECT COUNT(*) as c FROM jobs WHERE status = 'failed' AND created_at >= datetime('now', '-1 day')")
        .get() as { c: number }
    ).c
  );

  const last = ctx.db
    .prepare('SELECT id, job_type, status, updated_at FROM jobs ORDER BY id DESC LIMIT 1')
    .get() as { id: number; job_type: string; status: string; updated_at: string } | undefined;

  return {
    dbOk,
    jobs: {
      running: jobs.running || 0,
      done: jobs.done || 0,
      failed: jobs.failed || 0
    },
    recentFailures24h,
    lastJob: last ? { id: last.id, jobType: last.job_type, status: last.status, updatedAt: last.updated_at } : null
  };
}
