import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface SupportRequest {
  id: number;
  senderId: string;
  question: string;
  equipment?: string;
  status: string;
  createdAt: number;
}

export class SupportRequestRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(request: { senderId: string; question: string; equipment?: string }): SupportRequest {
    const createdAt = Date.now();
    const result = this.db
      .prepare(`
        INSERT INTO support_requests (sender_id, question, equipment, status, created_at)
        VALUES (?, ?, ?, 'open', ?)
      `)
      .run(request.senderId, request.question, request.equipment ?? null, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      ...request,
      status: 'open',
      createdAt,
    };
  }
}
