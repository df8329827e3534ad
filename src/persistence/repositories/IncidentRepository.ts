import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export type IncidentSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface Incident {
  id: number;
  reportedBy: string;
  description: string;
  severity: IncidentSeverity;
  status: string;
  location?: string;
  createdAt: number;
}

export class IncidentRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(incident: Omit<Incident, 'id' | 'status' | 'createdAt'>): Incident {
    const createdAt = Date.now();
    const stmt = this.db.prepare(`
      INSERT INTO incidents (reported_by, description, severity, status, location, created_at)
      VALUES (?, ?, ?, 'open', ?, ?)
    `);
    const result = stmt.run(
      incident.reportedBy,
      incident.description,
      incident.severity,
      incident.location ?? null,
      createdAt
    );

    return {
      id: Number(result.lastInsertRowid),
      ...incident,
      status: 'open',
      createdAt,
    };
  }
}
