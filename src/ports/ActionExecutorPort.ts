import type { DatabaseAction, EntitySet } from '../core/agent/types.js';

export interface ActionRequest {
  action: DatabaseAction;
  senderId: string;
  messageText: string;
  entities: EntitySet;
}

export interface ActionResult {
  success: boolean;
  /** Row created or updated by the action, when there is one. */
  recordId?: number;
  detail: string;
}

/** Persistence side of a routed action: tasks, incidents, permissions, attendance. */
export interface ActionExecutorPort {
  execute(request: ActionRequest): Promise<ActionResult>;
}
