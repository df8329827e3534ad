import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { MessageProcessingService } from '../../core/agent/MessageProcessingService.js';
import type { AgentOutcomeRepository } from '../../persistence/repositories/AgentOutcomeRepository.js';
import type { ManagerNotificationRepository } from '../../persistence/repositories/ManagerNotificationRepository.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

const processMessageSchema = z.object({
  message: z.string(),
  sender_id: z.union([z.string().min(1), z.number().int()]).transform((value) => String(value)),
});

export interface IntakeRouterDependencies {
  processingService: MessageProcessingService;
  outcomeRepository: AgentOutcomeRepository;
  notificationRepository: ManagerNotificationRepository;
}

export function createIntakeRouter(deps: IntakeRouterDependencies): Router {
  const logger = createLogger({ component: 'intakeRouter' });
  const router = express.Router();

  router.post('/process-message', async (req, res) => {
    const parsed = processMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const correlationId = generateCorrelationId();
    const requestLogger = logger.child({ correlationId, senderId: parsed.data.sender_id });

    // Stop spending model calls on a worker who has hung up
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const { outcome, actionSucceeded } = await deps.processingService.handle(
        parsed.data.message,
        parsed.data.sender_id,
        { signal: controller.signal, correlationId }
      );

      res.status(200).json({
        intent: outcome.classification.intent,
        confidence: outcome.classification.confidence,
        response: outcome.responseText,
        database_action: outcome.routing.action,
        requires_manager_attention: outcome.routing.requiresManagerAttention,
        auto_processed: outcome.routing.autoProcess,
        entities: outcome.entities,
        action_succeeded: actionSucceeded,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        requestLogger.info('Client disconnected before processing finished');
        return;
      }
      requestLogger.error({ error }, 'Error processing message');
      res.status(500).json({ error: 'Failed to process message' });
    }
  });

  router.get('/stats', (_req, res) => {
    res.status(200).json(deps.outcomeRepository.getStats());
  });

  router.get('/notifications', (_req, res) => {
    res.status(200).json({ notifications: deps.notificationRepository.getPending() });
  });

  router.post('/notifications/:id/delivered', (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id <= 0) {
      res.status(400).json({ error: 'Invalid notification id' });
      return;
    }
    if (!deps.notificationRepository.markDelivered(id)) {
      res.status(404).json({ error: 'Notification not found' });
      return;
    }
    res.status(200).json({ ok: true });
  });

  return router;
}
