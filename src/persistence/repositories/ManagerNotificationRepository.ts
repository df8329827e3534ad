import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { ManagerNotification } from '../../ports/NotificationPort.js';
import type { DatabaseAction, Intent } from '../../core/agent/types.js';

export interface StoredNotification extends ManagerNotification {
  id: number;
}

export class ManagerNotificationRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(notification: ManagerNotification): StoredNotification {
    const result = this.db
      .prepare(`
        INSERT INTO manager_notifications (intent, sender_id, message_text, confidence, action, timestamp)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        notification.intent,
        notification.senderId,
        notification.messageText,
        notification.confidence,
        notification.action,
        notification.timestamp.getTime()
      );

    return { id: Number(result.lastInsertRowid), ...notification };
  }

  getPending(limit = 50): StoredNotification[] {
    const rows = this.db
      .prepare(
        'SELECT * FROM manager_notifications WHERE delivered_at IS NULL ORDER BY timestamp ASC, id ASC LIMIT ?'
      )
      .all(limit) as Array<{
      id: number;
      intent: Intent;
      sender_id: string;
      message_text: string;
      confidence: number;
      action: DatabaseAction;
      timestamp: number;
    }>;

    return rows.map((row) => ({
      id: row.id,
      intent: row.intent,
      senderId: row.sender_id,
      messageText: row.message_text,
      confidence: row.confidence,
      action: row.action,
      timestamp: new Date(row.timestamp),
    }));
  }

  /** False when no pending notification has that id. */
  markDelivered(id: number, at: Date = new Date()): boolean {
    const result = this.db
      .prepare('UPDATE manager_notifications SET delivered_at = ? WHERE id = ? AND delivered_at IS NULL')
      .run(at.getTime(), id);
    return result.changes > 0;
  }
}
