import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export type AttendanceEvent = 'check_in' | 'check_out' | 'break_start' | 'break_end';
export type AttendanceStatus = 'checked_in' | 'on_break' | 'checked_out';

export interface AttendanceRecord {
  id: number;
  userId: string;
  date: string;
  checkInTime?: number;
  checkOutTime?: number;
  breakStart?: number;
  breakEnd?: number;
  location?: string;
  status: AttendanceStatus;
  notes?: string;
}

interface AttendanceRow {
  id: number;
  user_id: string;
  date: string;
  check_in_time: number | null;
  check_out_time: number | null;
  break_start: number | null;
  break_end: number | null;
  location: string | null;
  status: AttendanceStatus;
  notes: string | null;
}

const EVENT_COLUMNS: Record<AttendanceEvent, { column: string; status: AttendanceStatus }> = {
  check_in: { column: 'check_in_time', status: 'checked_in' },
  check_out: { column: 'check_out_time', status: 'checked_out' },
  break_start: { column: 'break_start', status: 'on_break' },
  break_end: { column: 'break_end', status: 'checked_in' },
};

export class AttendanceRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  findForDay(userId: string, date: string): AttendanceRecord | undefined {
    const row = this.db
      .prepare('SELECT * FROM attendance WHERE user_id = ? AND date = ? ORDER BY created_at DESC, id DESC LIMIT 1')
      .get(userId, date) as AttendanceRow | undefined;
    return row ? mapRow(row) : undefined;
  }

  /**
   * Apply an attendance event to the worker's record for `date`, creating the
   * record if this is the first event of the day. Returns the record id.
   */
  recordEvent(params: {
    userId: string;
    date: string;
    event: AttendanceEvent;
    at: number;
    location?: string;
    notes: string;
  }): number {
    const { column, status } = EVENT_COLUMNS[params.event];
    const existing = this.findForDay(params.userId, params.date);

    if (!existing) {
      const result = this.db
        .prepare(`
          INSERT INTO attendance (user_id, date, ${column}, location, status, notes, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          params.userId,
          params.date,
          params.at,
          params.location ?? null,
          status,
          params.notes,
          params.at,
          params.at
        );
      return Number(result.lastInsertRowid);
    }

    // Only a check-in moves the recorded location
    const location = params.event === 'check_in' ? (params.location ?? existing.location ?? null) : (existing.location ?? null);
    this.db
      .prepare(`
        UPDATE attendance
        SET ${column} = ?, status = ?, location = ?, notes = ?, updated_at = ?
        WHERE id = ?
      `)
      .run(params.at, status, location, params.notes, params.at, existing.id);
    return existing.id;
  }
}

function mapRow(row: AttendanceRow): AttendanceRecord {
  const record: AttendanceRecord = {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    status: row.status,
  };
  if (row.check_in_time !== null) record.checkInTime = row.check_in_time;
  if (row.check_out_time !== null) record.checkOutTime = row.check_out_time;
  if (row.break_start !== null) record.breakStart = row.break_start;
  if (row.break_end !== null) record.breakEnd = row.break_end;
  if (row.location !== null) record.location = row.location;
  if (row.notes !== null) record.notes = row.notes;
  return record;
}
