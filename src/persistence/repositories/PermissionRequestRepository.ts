import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export type PermissionRequestType = 'overtime' | 'vacation' | 'sick_leave' | 'special_access' | 'general';

export interface PermissionRequest {
  id: number;
  userId: string;
  requestType: PermissionRequestType;
  title: string;
  description: string;
  priority: 'urgent' | 'normal';
  isUrgent: boolean;
  status: string;
  createdAt: number;
}

export class PermissionRequestRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(request: Omit<PermissionRequest, 'id' | 'status' | 'createdAt'>): PermissionRequest {
    const createdAt = Date.now();
    const stmt = this.db.prepare(`
      INSERT INTO permission_requests
        (user_id, request_type, title, description, priority, is_urgent, status, created_at)
      VALUES (?, ?, ?, ?, ?, ?, 'pending', ?)
    `);
    const result = stmt.run(
      request.userId,
      request.requestType,
      request.title,
      request.description,
      request.priority,
      request.isUrgent ? 1 : 0,
      createdAt
    );

    return {
      id: Number(result.lastInsertRowid),
      ...request,
      status: 'pending',
      createdAt,
    };
  }
}
