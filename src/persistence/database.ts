import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = path || process.env.DATABASE_PATH || join(__dirname, '../../data', 'field-agent.db');
  logger.info({ dbPath }, 'Initializing database');
  mkdirSync(pathDirname(dbPath), { recursive: true });

  db = openDatabase(dbPath);
  db.pragma('journal_mode = WAL');
  return db;
}

/** Open a connection and bring its schema up to date. Accepts ':memory:'. */
export function openDatabase(path: string): Database.Database {
  const connection = new Database(path);
  connection.pragma('foreign_keys = ON');
  runMigrations(connection);
  return connection;
}

function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  // Tasks are created by managers elsewhere; workers only report progress.
  // assigned_to holds a JSON array of worker ids.
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      description TEXT,
      assigned_to TEXT NOT NULL DEFAULT '[]',
      status TEXT NOT NULL DEFAULT 'upcoming',
      priority TEXT NOT NULL DEFAULT 'normal',
      location TEXT,
      progress_percentage INTEGER NOT NULL DEFAULT 0,
      last_update TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS incidents (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      reported_by TEXT NOT NULL,
      description TEXT NOT NULL,
      severity TEXT NOT NULL DEFAULT 'low',
      status TEXT NOT NULL DEFAULT 'open',
      location TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_incidents_status ON incidents(status);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS permission_requests (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      request_type TEXT NOT NULL,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      priority TEXT NOT NULL DEFAULT 'normal',
      is_urgent INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL DEFAULT 'pending',
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_permission_requests_user ON permission_requests(user_id);
  `);

  // One attendance row per worker per day (date is YYYY-MM-DD)
  db.exec(`
    CREATE TABLE IF NOT EXISTS attendance (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      date TEXT NOT NULL,
      check_in_time INTEGER,
      check_out_time INTEGER,
      break_start INTEGER,
      break_end INTEGER,
      location TEXT,
      status TEXT NOT NULL,
      notes TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_attendance_user_date ON attendance(user_id, date);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS support_requests (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sender_id TEXT NOT NULL,
      question TEXT NOT NULL,
      equipment TEXT,
      status TEXT NOT NULL DEFAULT 'open',
      created_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS worker_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sender_id TEXT NOT NULL,
      text TEXT NOT NULL,
      entities TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_worker_messages_sender ON worker_messages(sender_id);
  `);

  // Outbox read by the manager-facing client
  db.exec(`
    CREATE TABLE IF NOT EXISTS manager_notifications (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      intent TEXT NOT NULL,
      sender_id TEXT NOT NULL,
      message_text TEXT NOT NULL,
      confidence REAL NOT NULL,
      action TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      delivered_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_manager_notifications_delivered ON manager_notifications(delivered_at);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS agent_outcomes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sender_id TEXT NOT NULL,
      text TEXT NOT NULL,
      intent TEXT NOT NULL,
      confidence REAL NOT NULL,
      source TEXT NOT NULL,
      action TEXT NOT NULL,
      requires_manager_attention INTEGER NOT NULL,
      auto_processed INTEGER NOT NULL,
      action_succeeded INTEGER NOT NULL,
      response_text TEXT NOT NULL,
      processed_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_agent_outcomes_intent ON agent_outcomes(intent);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
