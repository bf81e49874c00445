import { getDb, generateUUID } from '../db.js';
import type { JobRun, JobRunStatus, JobSpec } from '../types.js';

export interface RunResult {
  status: Exclude<JobRunStatus, 'running'>;
  title: string | null;
  error: string | null;
}

export interface RunHistory {
  recordStart(spec: JobSpec): string;
  recordFinish(runId: string, result: RunResult): void;
}

interface JobRunRow extends Omit<JobRun, 'keywords'> {
  keywords: string;
}

export class SqliteRunHistory implements RunHistory {
  recordStart(spec: JobSpec): string {
    const id = generateUUID();

    getDb().prepare(`
      INSERT INTO job_runs (id, topic, keywords, status, started_at)
      VALUES (?, ?, ?, 'running', ?)
    `).run(id, spec.topic, JSON.stringify(spec.keywords), new Date().toISOString());

    return id;
  }

  recordFinish(runId: string, result: RunResult): void {
    getDb().prepare(`
      UPDATE job_runs
      SET status = ?, title = ?, error = ?, finished_at = ?
      WHERE id = ?
    `).run(result.status, result.title, result.error, new Date().toISOString(), runId);
  }

  listRecent(limit = 20): JobRun[] {
    const rows = getDb().prepare(`
      SELECT * FROM job_runs
      ORDER BY started_at DESC, rowid DESC
      LIMIT ?
    `).all(limit) as JobRunRow[];

    return rows.map(row => ({ ...row, keywords: parseKeywords(row.keywords) }));
  }
}

function parseKeywords(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((k): k is string => typeof k === 'string') : [];
}

// Singleton; import this instead of instantiating directly.
export const runHistory = new SqliteRunHistory();
