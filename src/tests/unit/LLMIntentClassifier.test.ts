import { describe, it, expect, vi } from 'vitest';
import { LLMIntentClassifier, parseClassificationReply } from '../../core/agent/LLMIntentClassifier.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { LLMError } from '../../utils/errors.js';

describe('parseClassificationReply', () => {
  it('parses a label and confidence', () => {
    expect(parseClassificationReply('incident_report|0.9')).toEqual({
      intent: 'incident_report',
      confidence: 0.9,
      source: 'model',
    });
  });

  it('tolerates surrounding whitespace and upper case labels', () => {
    expect(parseClassificationReply(' Question | .75 \n')).toEqual({
      intent: 'question',
      confidence: 0.75,
      source: 'model',
    });
  });

  it.each([
    'incident_report',
    'incident_report|0.9|extra',
    'unknown_intent|0.9',
    'incident_report|1.5',
    'incident_report|-0.2',
    'incident_report|high',
    'incident_report|1e-1',
    '',
  ])('rejects %j', (raw) => {
    expect(parseClassificationReply(raw)).toBeNull();
  });
});

describe('LLMIntentClassifier', () => {
  const template = 'Classify: {{MESSAGE_TEXT}}';

  function createPort(impl: LLMPort['generateText']): LLMPort {
    return { generateText: vi.fn(impl) };
  }

  it('returns the parsed model classification', async () => {
    const llmPort = createPort(async () => ({ text: 'task_update|0.8' }));
    const classifier = new LLMIntentClassifier(llmPort, template);

    const result = await classifier.classify('finished the job');

    expect(result).toEqual({ ok: true, value: { intent: 'task_update', confidence: 0.8, source: 'model' } });
    expect(llmPort.generateText).toHaveBeenCalledTimes(1);
    expect(llmPort.generateText).toHaveBeenCalledWith({
      prompt: 'Classify: finished the job',
      maxTokens: 20,
      temperature: 0.1,
      signal: undefined,
    });
  });

  it('sends a placeholder for empty messages', async () => {
    const llmPort = createPort(async () => ({ text: 'general|0.6' }));
    const classifier = new LLMIntentClassifier(llmPort, template);

    await classifier.classify('   ');

    expect(llmPort.generateText).toHaveBeenCalledWith(expect.objectContaining({ prompt: 'Classify: (empty)' }));
  });

  it('reports malformed replies with the raw text', async () => {
    const classifier = new LLMIntentClassifier(
      createPort(async () => ({ text: 'I think it is an incident' })),
      template
    );

    const result = await classifier.classify('help');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'malformed', message: 'Reply is not in label|confidence form', raw: 'I think it is an incident' },
    });
  });

  it('reports timeouts', async () => {
    const classifier = new LLMIntentClassifier(
      createPort(async () => {
        throw new LLMError('Claude text generation failed', { timedOut: true });
      }),
      template
    );

    const result = await classifier.classify('help');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
    }
  });

  it('reports other failures as unavailable', async () => {
    const classifier = new LLMIntentClassifier(
      createPort(async () => {
        throw new Error('connection refused');
      }),
      template
    );

    const result = await classifier.classify('help');

    expect(result).toEqual({ ok: false, error: { kind: 'unavailable', message: 'connection refused' } });
  });

  it('reports aborted calls', async () => {
    const controller = new AbortController();
    const classifier = new LLMIntentClassifier(
      createPort(async () => {
        controller.abort();
        throw new Error('Request was aborted.');
      }),
      template
    );

    const result = await classifier.classify('help', controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('aborted');
    }
  });
});
