import type { PipelinePolicy } from '../../config/index.js';
import { PipelineAbortedError } from '../../utils/errors.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { routeAction } from './actionRouter.js';
import { extractEntities } from './entityExtractor.js';
import type { IntentClassifier } from './IntentClassifier.js';
import type { ResponseComposer } from './ResponseComposer.js';
import type { AgentOutcome, WorkerMessage } from './types.js';

export interface ProcessOptions {
  /** Abandon the run; no outcome is returned once this fires. */
  signal?: AbortSignal;
  receivedAt?: Date;
  correlationId?: string;
}

/**
 * Extract → classify → route → compose. Holds only immutable collaborators,
 * so concurrent runs share nothing mutable.
 */
export class MessagePipeline {
  private readonly logger = createLogger({ service: 'MessagePipeline' });

  constructor(
    private readonly classifier: IntentClassifier,
    private readonly composer: ResponseComposer,
    private readonly policy: PipelinePolicy
  ) {}

  async process(text: string, senderId: string, options: ProcessOptions = {}): Promise<AgentOutcome> {
    const { signal } = options;
    const logger = this.logger.child({ correlationId: options.correlationId ?? generateCorrelationId(), senderId });
    const message: WorkerMessage = {
      text,
      senderId,
      receivedAt: options.receivedAt ?? new Date(),
    };

    const entities = extractEntities(text);
    const classification = await this.classifier.classify(text, signal);
    const routing = routeAction(classification, entities, this.policy);
    const responseText = await this.composer.compose({ text, classification, entities, signal });

    if (signal?.aborted) {
      logger.info('Message processing abandoned by caller');
      throw new PipelineAbortedError({ cause: signal.reason });
    }

    logger.info(
      {
        intent: classification.intent,
        confidence: classification.confidence,
        source: classification.source,
        action: routing.action,
        requiresManagerAttention: routing.requiresManagerAttention,
      },
      'Message processed'
    );

    return {
      message,
      classification,
      entities,
      routing,
      responseText,
      processedAt: new Date(),
    };
  }
}
