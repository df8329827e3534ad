import { describe, it, expect } from 'vitest';
import { DEFAULT_POLICY } from '../../config/index.js';
import { IntentClassifier } from '../../core/agent/IntentClassifier.js';
import { RULE_PRIORITY, RuleBasedClassifier } from '../../core/agent/RuleBasedClassifier.js';
import { INTENTS } from '../../core/agent/types.js';

describe('RuleBasedClassifier', () => {
  const classifier = new RuleBasedClassifier();

  it('classifies a gas leak as an incident', () => {
    const result = classifier.classify("There's a gas leak in the basement - urgent!");
    expect(result.intent).toBe('incident_report');
    expect(result.confidence).toBeCloseTo(2 / 9 + 0.3, 5);
    expect(result.source).toBe('rules');
  });

  it('classifies a finished repair as a task update', () => {
    const result = classifier.classify('Just finished the plumbing repair in Building A');
    expect(result.intent).toBe('task_update');
    expect(result.confidence).toBeCloseTo(2 / 9 + 0.3, 5);
  });

  it('classifies an overtime approval as a permission request', () => {
    const result = classifier.classify('Can I get approval for overtime this weekend?');
    expect(result.intent).toBe('permission_request');
    expect(result.confidence).toBeCloseTo(3 / 7 + 0.3, 5);
  });

  it('falls back to general at 0.5 when nothing matches', () => {
    expect(classifier.classify('')).toEqual({ intent: 'general', confidence: 0.5, source: 'rules' });
    expect(classifier.classify('ok thanks')).toEqual({ intent: 'general', confidence: 0.5, source: 'rules' });
  });

  it('breaks ties in favour of the more severe intent', () => {
    // One group each for incident ("problem") and task ("repair"), no bonus
    const result = classifier.classify('problem with the repair');
    expect(result.intent).toBe('incident_report');
    expect(result.confidence).toBeCloseTo(1 / 9, 5);
  });

  it('caps confidence at 0.95', () => {
    const result = classifier.classify(
      'Permission for overtime access, can I get approval to purchase time off'
    );
    expect(result.intent).toBe('permission_request');
    expect(result.confidence).toBe(0.95);
  });

  it('matches case-insensitively', () => {
    const result = classifier.classify('GAS LEAK');
    expect(result.intent).toBe('incident_report');
    expect(result.confidence).toBeCloseTo(1 / 9 + 0.3, 5);
  });

  it('gives the same answer for the same text', () => {
    const text = 'Arrived on site, checking the pump';
    expect(classifier.classify(text)).toEqual(classifier.classify(text));
  });

  it('evaluates severe intents first', () => {
    expect(RULE_PRIORITY).toEqual(['incident_report', 'permission_request', 'task_update', 'attendance', 'question']);
  });

  describe('non-ASCII input', () => {
    const inputs = ['Привет, насос сломан 🔧', 'İSTANBUL ofis', 'Ｆｉｒｅ！', 'fuga de gás no porão – urgente!', 'leak \uD800 here'];

    it.each(inputs)('returns a valid classification for %j', (text) => {
      const result = classifier.classify(text);
      expect(INTENTS).toContain(result.intent);
      expect(result.confidence).toBeGreaterThanOrEqual(0);
      expect(result.confidence).toBeLessThanOrEqual(1);
    });

    it.each(inputs)('resolves through the hybrid classifier for %j', async (text) => {
      const result = await new IntentClassifier(classifier, DEFAULT_POLICY).classify(text);
      expect(INTENTS).toContain(result.intent);
      expect(result.confidence).toBeGreaterThanOrEqual(0);
      expect(result.confidence).toBeLessThanOrEqual(1);
    });
  });
});
