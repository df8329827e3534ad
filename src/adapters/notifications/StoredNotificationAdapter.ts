import type { ManagerNotification, NotificationPort } from '../../ports/NotificationPort.js';
import type { ManagerNotificationRepository } from '../../persistence/repositories/ManagerNotificationRepository.js';
import { createLogger } from '../../utils/logger.js';

/** Publishes by writing to the outbox table the manager client reads from. */
export class StoredNotificationAdapter implements NotificationPort {
  private readonly logger = createLogger({ adapter: 'StoredNotificationAdapter' });

  constructor(private readonly repository: ManagerNotificationRepository) {}

  async publish(notification: ManagerNotification): Promise<void> {
    const stored = this.repository.create(notification);
    this.logger.info(
      { notificationId: stored.id, intent: notification.intent, senderId: notification.senderId },
      'Manager notification queued'
    );
  }
}
