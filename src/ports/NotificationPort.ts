import type { DatabaseAction, Intent } from '../core/agent/types.js';

export interface ManagerNotification {
  intent: Intent;
  senderId: string;
  messageText: string;
  confidence: number;
  action: DatabaseAction;
  timestamp: Date;
}

export interface NotificationPort {
  publish(notification: ManagerNotification): Promise<void>;
}
