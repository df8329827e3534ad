import type { ActionExecutorPort } from '../../ports/ActionExecutorPort.js';
import type { NotificationPort } from '../../ports/NotificationPort.js';
import type { AgentOutcomeRepository } from '../../persistence/repositories/AgentOutcomeRepository.js';
import { createLogger, generateCorrelationId, type Logger } from '../../utils/logger.js';
import type { MessagePipeline, ProcessOptions } from './MessagePipeline.js';
import type { AgentOutcome } from './types.js';

export interface HandledMessage {
  outcome: AgentOutcome;
  actionSucceeded: boolean;
  notified: boolean;
}

export interface MessageProcessingDependencies {
  pipeline: MessagePipeline;
  actionExecutor: ActionExecutorPort;
  notificationPort: NotificationPort;
  outcomeRepository: AgentOutcomeRepository;
}

/**
 * Runs the pipeline, then hands the outcome to persistence and notification.
 * Failures after the pipeline are reported in the result; the worker still
 * gets a reply.
 */
export class MessageProcessingService {
  private readonly logger = createLogger({ service: 'MessageProcessingService' });

  constructor(private readonly deps: MessageProcessingDependencies) {}

  async handle(text: string, senderId: string, options: ProcessOptions = {}): Promise<HandledMessage> {
    const correlationId = options.correlationId ?? generateCorrelationId();
    const logger = this.logger.child({ correlationId, senderId });

    const outcome = await this.deps.pipeline.process(text, senderId, { ...options, correlationId });

    const actionSucceeded = await this.executeAction(outcome, logger);
    if (!actionSucceeded) {
      logger.warn({ action: outcome.routing.action }, 'Database action failed, replying anyway');
    }

    const notified = outcome.routing.requiresManagerAttention ? await this.notifyManager(outcome, logger) : false;

    try {
      this.deps.outcomeRepository.save(outcome, actionSucceeded);
    } catch (error) {
      logger.error({ error }, 'Failed to record agent outcome');
    }

    return { outcome, actionSucceeded, notified };
  }

  private async executeAction(outcome: AgentOutcome, logger: Logger): Promise<boolean> {
    try {
      const result = await this.deps.actionExecutor.execute({
        action: outcome.routing.action,
        senderId: outcome.message.senderId,
        messageText: outcome.message.text,
        entities: outcome.entities,
      });
      return result.success;
    } catch (error) {
      logger.error({ error, action: outcome.routing.action }, 'Action executor threw');
      return false;
    }
  }

  private async notifyManager(outcome: AgentOutcome, logger: Logger): Promise<boolean> {
    try {
      await this.deps.notificationPort.publish({
        intent: outcome.classification.intent,
        senderId: outcome.message.senderId,
        messageText: outcome.message.text,
        confidence: outcome.classification.confidence,
        action: outcome.routing.action,
        timestamp: outcome.processedAt,
      });
      return true;
    } catch (error) {
      logger.error({ error, intent: outcome.classification.intent }, 'Failed to notify manager');
      return false;
    }
  }
}
