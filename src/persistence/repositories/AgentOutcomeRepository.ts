import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { AgentOutcome } from '../../core/agent/types.js';

export interface AgentStats {
  totalMessages: number;
  escalated: number;
  failedActions: number;
  byIntent: Record<string, number>;
}

export class AgentOutcomeRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  save(outcome: AgentOutcome, actionSucceeded: boolean): number {
    const result = this.db
      .prepare(`
        INSERT INTO agent_outcomes (
          sender_id, text, intent, confidence, source, action,
          requires_manager_attention, auto_processed, action_succeeded, response_text, processed_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        outcome.message.senderId,
        outcome.message.text,
        outcome.classification.intent,
        outcome.classification.confidence,
        outcome.classification.source,
        outcome.routing.action,
        outcome.routing.requiresManagerAttention ? 1 : 0,
        outcome.routing.autoProcess ? 1 : 0,
        actionSucceeded ? 1 : 0,
        outcome.responseText,
        outcome.processedAt.getTime()
      );
    return Number(result.lastInsertRowid);
  }

  getStats(): AgentStats {
    const totals = this.db
      .prepare(`
        SELECT
          COUNT(*) AS total,
          COALESCE(SUM(requires_manager_attention), 0) AS escalated,
          COALESCE(SUM(CASE WHEN action_succeeded = 0 THEN 1 ELSE 0 END), 0) AS failed
        FROM agent_outcomes
      `)
      .get() as { total: number; escalated: number; failed: number };

    const intentRows = this.db
      .prepare('SELECT intent, COUNT(*) AS count FROM agent_outcomes GROUP BY intent ORDER BY intent')
      .all() as Array<{ intent: string; count: number }>;

    const byIntent: Record<string, number> = {};
    for (const row of intentRows) {
      byIntent[row.intent] = row.count;
    }

    return {
      totalMessages: totals.total,
      escalated: totals.escalated,
      failedActions: totals.failed,
      byIntent,
    };
  }
}
