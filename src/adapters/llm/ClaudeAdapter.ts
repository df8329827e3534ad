import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

type ClaudeAdapterConfig = Pick<Config, 'anthropicApiKey' | 'llmTextModel' | 'llmTimeoutMs'>;

/**
 * Text generation against the Anthropic Messages API. Retries are disabled:
 * callers get at most one outbound call per request and handle failure
 * themselves.
 */
export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly textModel: string;
  private readonly timeoutMs: number;

  constructor(config: ClaudeAdapterConfig) {
    this.timeoutMs = config.llmTimeoutMs;
    this.client = new Anthropic({
      apiKey: config.anthropicApiKey,
      maxRetries: 0,
      timeout: this.timeoutMs,
    });
    this.textModel = config.llmTextModel;
    this.logger.info({ textModel: this.textModel, timeoutMs: this.timeoutMs }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    try {
      const response = await this.client.messages.create(
        {
          model: this.textModel,
          max_tokens: request.maxTokens ?? 800,
          temperature: request.temperature ?? 0.2,
          messages: [
            {
              role: 'user',
              content: request.prompt,
            },
          ],
        },
        { signal: request.signal, timeout: this.timeoutMs }
      );

      return {
        text: extractText(response),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const timedOut = error instanceof Anthropic.APIConnectionTimeoutError;
      logger.error({ error, timedOut }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error, timedOut });
    }
  }
}

function extractText(response: Anthropic.Message): string {
  for (const block of response.content) {
    if (block.type === 'text') {
      return block.text;
    }
  }
  return '';
}
