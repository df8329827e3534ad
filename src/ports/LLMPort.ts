export interface LLMRequest {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  /** Aborts the call when the caller abandons the message. */
  signal?: AbortSignal;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMPort {
  generateText(request: LLMRequest): Promise<LLMResponse>;
}
