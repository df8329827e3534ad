export class AgentError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AgentError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends AgentError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  /** True when the call was cut off by the client timeout. */
  public readonly timedOut: boolean;

  constructor(message: string, options?: ErrorOptions & { timedOut?: boolean }) {
    super('LLM', message, options);
    this.name = 'LLMError';
    this.timedOut = options?.timedOut ?? false;
  }
}

export class ActionError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('ACTION', message, options);
    this.name = 'ActionError';
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class PipelineAbortedError extends AgentError {
  constructor(options?: ErrorOptions) {
    super('Message processing was aborted before completion', 'PIPELINE_ABORTED', options);
    this.name = 'PipelineAbortedError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
