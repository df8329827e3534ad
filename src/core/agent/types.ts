export const INTENTS = [
  'task_update',
  'incident_report',
  'permission_request',
  'attendance',
  'question',
  'general',
] as const;

export type Intent = (typeof INTENTS)[number];

export const DATABASE_ACTIONS = [
  'update_task_progress',
  'create_incident_record',
  'create_permission_request',
  'update_attendance_record',
  'route_to_support',
  'log_general_message',
] as const;

export type DatabaseAction = (typeof DATABASE_ACTIONS)[number];

export const ENTITY_CATEGORIES = ['time_mentions', 'locations', 'equipment', 'urgency'] as const;

export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

/** Categories without a match are absent, never present with an empty list. */
export type EntitySet = Readonly<Partial<Record<EntityCategory, readonly string[]>>>;

export interface WorkerMessage {
  readonly text: string;
  readonly senderId: string;
  readonly receivedAt: Date;
}

export type ClassificationSource = 'model' | 'rules';

export interface ClassificationResult {
  readonly intent: Intent;
  /** Always within [0, 1]. */
  readonly confidence: number;
  readonly source: ClassificationSource;
}

export interface RoutingDecision {
  readonly action: DatabaseAction;
  readonly requiresManagerAttention: boolean;
  readonly autoProcess: boolean;
}

export interface AgentOutcome {
  readonly message: WorkerMessage;
  readonly classification: ClassificationResult;
  readonly entities: EntitySet;
  readonly routing: RoutingDecision;
  readonly responseText: string;
  readonly processedAt: Date;
}

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}
