import type { PipelinePolicy } from '../../config/index.js';
import type { ClassificationResult, DatabaseAction, EntitySet, Intent, RoutingDecision } from './types.js';

export function actionForIntent(intent: Intent): DatabaseAction {
  switch (intent) {
    case 'task_update':
      return 'update_task_progress';
    case 'incident_report':
      return 'create_incident_record';
    case 'permission_request':
      return 'create_permission_request';
    case 'attendance':
      return 'update_attendance_record';
    case 'question':
      return 'route_to_support';
    case 'general':
      return 'log_general_message';
    default: {
      const unreachable: never = intent;
      throw new Error(`Unhandled intent: ${String(unreachable)}`);
    }
  }
}

function alwaysEscalates(intent: Intent): boolean {
  return intent === 'incident_report' || intent === 'permission_request';
}

export function hasUrgentMention(entities: EntitySet): boolean {
  return (entities.urgency ?? []).join(' ').toLowerCase().includes('urgent');
}

/** Pure and total: the same classification and entities always give the same decision. */
export function routeAction(
  classification: ClassificationResult,
  entities: EntitySet,
  policy: PipelinePolicy
): RoutingDecision {
  const { intent, confidence } = classification;
  return {
    action: actionForIntent(intent),
    requiresManagerAttention:
      alwaysEscalates(intent) || confidence < policy.escalationThreshold || hasUrgentMention(entities),
    autoProcess: confidence > policy.autoProcessThreshold,
  };
}
