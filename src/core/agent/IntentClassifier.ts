import type { PipelinePolicy } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import type { LLMIntentClassifier } from './LLMIntentClassifier.js';
import type { RuleBasedClassifier } from './RuleBasedClassifier.js';
import type { ClassificationResult } from './types.js';

/**
 * Hybrid classifier: the model gets the first (and only) attempt when one is
 * configured; anything it cannot answer confidently goes to the rules.
 * Results are never blended.
 */
export class IntentClassifier {
  private readonly logger = createLogger({ classifier: 'IntentClassifier' });

  constructor(
    private readonly rules: RuleBasedClassifier,
    private readonly policy: PipelinePolicy,
    private readonly model?: LLMIntentClassifier
  ) {}

  async classify(text: string, signal?: AbortSignal): Promise<ClassificationResult> {
    if (!this.model) {
      return this.rules.classify(text);
    }

    const result = await this.model.classify(text, signal);
    if (!result.ok) {
      this.logger.info({ reason: result.error.kind }, 'Model result unavailable, using rules');
      return this.rules.classify(text);
    }
    if (result.value.confidence > this.policy.modelAcceptThreshold) {
      return result.value;
    }

    this.logger.info(
      { intent: result.value.intent, confidence: result.value.confidence },
      'Model confidence too low, using rules'
    );
    return this.rules.classify(text);
  }
}
