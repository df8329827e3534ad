import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export type TaskStatus = 'upcoming' | 'ongoing' | 'completed' | 'on_hold' | 'cancelled';

export interface Task {
  id: number;
  title: string;
  description?: string;
  assignedTo: string[];
  status: TaskStatus;
  priority: string;
  location?: string;
  progressPercentage: number;
  lastUpdate?: string;
  createdAt: number;
  updatedAt: number;
}

interface TaskRow {
  id: number;
  title: string;
  description: string | null;
  assigned_to: string;
  status: TaskStatus;
  priority: string;
  location: string | null;
  progress_percentage: number;
  last_update: string | null;
  created_at: number;
  updated_at: number;
}

export class TaskRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(task: {
    title: string;
    description?: string;
    assignedTo: string[];
    status?: TaskStatus;
    priority?: string;
    location?: string;
  }): Task {
    const now = Date.now();
    const stmt = this.db.prepare(`
      INSERT INTO tasks (title, description, assigned_to, status, priority, location, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const result = stmt.run(
      task.title,
      task.description ?? null,
      JSON.stringify(task.assignedTo),
      task.status ?? 'upcoming',
      task.priority ?? 'normal',
      task.location ?? null,
      now,
      now
    );

    const created = this.findById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error('Task insert did not return a row');
    }
    return created;
  }

  findById(id: number): Task | undefined {
    const row = this.db.prepare('SELECT * FROM tasks WHERE id = ?').get(id) as TaskRow | undefined;
    return row ? mapRow(row) : undefined;
  }

  /** Most recently created upcoming or ongoing task assigned to the worker. */
  findActiveForWorker(workerId: string): Task | undefined {
    const stmt = this.db.prepare(`
      SELECT * FROM tasks
      WHERE status IN ('upcoming', 'ongoing')
        AND EXISTS (SELECT 1 FROM json_each(tasks.assigned_to) WHERE json_each.value = ?)
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `);
    const row = stmt.get(workerId) as TaskRow | undefined;
    return row ? mapRow(row) : undefined;
  }

  updateProgress(id: number, update: { status: TaskStatus; progressPercentage: number; lastUpdate: string }): void {
    const stmt = this.db.prepare(`
      UPDATE tasks
      SET status = ?, progress_percentage = ?, last_update = ?, updated_at = ?
      WHERE id = ?
    `);
    stmt.run(update.status, update.progressPercentage, update.lastUpdate, Date.now(), id);
  }
}

function mapRow(row: TaskRow): Task {
  const task: Task = {
    id: row.id,
    title: row.title,
    assignedTo: parseAssignees(row.assigned_to),
    status: row.status,
    priority: row.priority,
    progressPercentage: row.progress_percentage,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.description !== null) {
    task.description = row.description;
  }
  if (row.location !== null) {
    task.location = row.location;
  }
  if (row.last_update !== null) {
    task.lastUpdate = row.last_update;
  }
  return task;
}

function parseAssignees(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.map((id) => String(id)) : [];
}
