import type Database from 'better-sqlite3';
import type {
  ReleaseEvent,
  ReleaseEventCategory,
  ReleaseEventCreateInput,
  ReleaseEventFilter,
  ReleaseEventSeverity,
} from '../../shared/types';
import type { IReleaseEventLog } from '../interfaces/release-event-log';
import { generateId, now, parseJsonObject } from './utils';

interface ReleaseEventRow {
  id: string;
  branch: string;
  category: ReleaseEventCategory;
  severity: ReleaseEventSeverity;
  message: string;
  data: string;
  created_at: number;
}

function rowToEvent(row: ReleaseEventRow): ReleaseEvent {
  return {
    id: row.id,
    branch: row.branch,
    category: row.category,
    severity: row.severity,
    message: row.message,
    data: parseJsonObject(row.data),
    createdAt: row.created_at,
  };
}

export class SqliteReleaseEventLog implements IReleaseEventLog {
  constructor(private db: Database.Database) {}

  async log(input: ReleaseEventCreateInput): Promise<ReleaseEvent> {
    const id = generateId();
    const timestamp = now();
    const severity = input.severity ?? 'info';
    const data = input.data ?? {};

    this.db.prepare(`
      INSERT INTO release_events (id, branch, category, severity, message, data, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(id, input.branch, input.category, severity, input.message, JSON.stringify(data), timestamp);

    return {
      id,
      branch: input.branch,
      category: input.category,
      severity,
      message: input.message,
      data,
      createdAt: timestamp,
    };
  }

  async getEvents(filter?: ReleaseEventFilter): Promise<ReleaseEvent[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter?.branch) {
      conditions.push('branch = ?');
      values.push(filter.branch);
    }
    if (filter?.category) {
      conditions.push('category = ?');
      values.push(filter.category);
    }
    if (filter?.severity) {
      conditions.push('severity = ?');
      values.push(filter.severity);
    }
    if (filter?.since !== undefined) {
      conditions.push('created_at >= ?');
      values.push(filter.since);
    }
    if (filter?.until !== undefined) {
      conditions.push('created_at <= ?');
      values.push(filter.until);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    // rowid breaks ties between events logged within the same millisecond
    const rows = this.db
      .prepare(`SELECT * FROM release_events ${where} ORDER BY created_at ASC, rowid ASC`)
      .all(...values) as ReleaseEventRow[];
    return rows.map(rowToEvent);
  }
}
