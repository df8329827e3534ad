import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { EntitySet } from '../../core/agent/types.js';

/** Messages that needed no domain record; kept for manager review. */
export class WorkerMessageRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  save(message: { senderId: string; text: string; entities: EntitySet }): number {
    const result = this.db
      .prepare('INSERT INTO worker_messages (sender_id, text, entities, created_at) VALUES (?, ?, ?, ?)')
      .run(message.senderId, message.text, JSON.stringify(message.entities), Date.now());
    return Number(result.lastInsertRowid);
  }
}
