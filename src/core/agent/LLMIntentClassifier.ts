import type { LLMPort } from '../../ports/LLMPort.js';
import { LLMError, describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { renderPrompt } from '../../utils/prompts.js';
import { err, ok, type Result } from '../../utils/result.js';
import { isIntent, type ClassificationResult } from './types.js';

export type ModelErrorKind = 'unavailable' | 'timeout' | 'malformed' | 'aborted';

export interface ModelError {
  kind: ModelErrorKind;
  message: string;
  /** Raw model reply, kept for malformed responses. */
  raw?: string;
}

const CONFIDENCE_PATTERN = /^(?:\d+(?:\.\d+)?|\.\d+)$/;

/**
 * Parse a strict `label|confidence` reply. Returns null unless the label is a
 * known intent and the confidence is a decimal within [0, 1].
 */
export function parseClassificationReply(raw: string): ClassificationResult | null {
  const parts = raw.trim().split('|');
  if (parts.length !== 2) return null;

  const label = (parts[0] ?? '').trim().toLowerCase();
  const confidenceText = (parts[1] ?? '').trim();
  if (!isIntent(label) || !CONFIDENCE_PATTERN.test(confidenceText)) return null;

  const confidence = Number.parseFloat(confidenceText);
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) return null;

  return { intent: label, confidence, source: 'model' };
}

/** Single-shot model classifier. Never throws; every failure is a `ModelError`. */
export class LLMIntentClassifier {
  private readonly logger = createLogger({ classifier: 'LLMIntentClassifier' });

  constructor(
    private readonly llmPort: LLMPort,
    private readonly promptTemplate: string
  ) {}

  async classify(text: string, signal?: AbortSignal): Promise<Result<ClassificationResult, ModelError>> {
    const prompt = renderPrompt(this.promptTemplate, { MESSAGE_TEXT: text.trim() || '(empty)' });

    let raw: string;
    try {
      const response = await this.llmPort.generateText({
        prompt,
        maxTokens: 20,
        temperature: 0.1,
        signal,
      });
      raw = response.text.trim();
    } catch (error) {
      const kind: ModelErrorKind = signal?.aborted
        ? 'aborted'
        : error instanceof LLMError && error.timedOut
          ? 'timeout'
          : 'unavailable';
      this.logger.warn({ kind, error: describeError(error) }, 'LLM intent classification failed');
      return err({ kind, message: describeError(error) });
    }

    const classification = parseClassificationReply(raw);
    if (!classification) {
      this.logger.warn({ raw: raw.slice(0, 200) }, 'Failed to parse LLM intent response');
      return err({ kind: 'malformed', message: 'Reply is not in label|confidence form', raw });
    }

    this.logger.debug(
      { intent: classification.intent, confidence: classification.confidence },
      'LLM classified intent'
    );
    return ok(classification);
  }
}
