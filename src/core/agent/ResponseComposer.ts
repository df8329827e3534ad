import type { PipelinePolicy } from '../../config/index.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { renderPrompt } from '../../utils/prompts.js';
import { describeEntities } from './entityExtractor.js';
import { buildFallbackReply } from './fallbackReplies.js';
import type { ClassificationResult, EntitySet } from './types.js';

export const LOW_CONFIDENCE_NOTE =
  "(I'm not 100% sure what you meant, so I've flagged this for manager review)";

export interface ComposeInput {
  text: string;
  classification: ClassificationResult;
  entities: EntitySet;
  signal?: AbortSignal;
}

export interface ModelReplyOptions {
  llmPort: LLMPort;
  promptTemplate: string;
}

export class ResponseComposer {
  private readonly logger = createLogger({ service: 'ResponseComposer' });

  constructor(
    private readonly policy: PipelinePolicy,
    private readonly model?: ModelReplyOptions
  ) {}

  async compose(input: ComposeInput): Promise<string> {
    const reply =
      (await this.generateModelReply(input)) ??
      buildFallbackReply(input.text, input.classification.intent, input.entities);

    if (input.classification.confidence < this.policy.escalationThreshold) {
      return `${reply}\n\n${LOW_CONFIDENCE_NOTE}`;
    }
    return reply;
  }

  private async generateModelReply(input: ComposeInput): Promise<string | null> {
    if (!this.model) {
      return null;
    }

    const { intent, confidence } = input.classification;
    const prompt = renderPrompt(this.model.promptTemplate, {
      MESSAGE_TEXT: input.text,
      INTENT: intent,
      CONFIDENCE: confidence.toFixed(2),
      CONTEXT: describeEntities(input.entities),
    });

    try {
      const response = await this.model.llmPort.generateText({
        prompt,
        maxTokens: 200,
        temperature: 0.4,
        signal: input.signal,
      });
      const text = response.text.trim();
      if (text) {
        return text;
      }
      this.logger.warn({ intent }, 'Empty LLM reply, using fallback');
    } catch (error) {
      this.logger.warn({ intent, error: describeError(error) }, 'LLM reply failed, using fallback');
    }
    return null;
  }
}
