import { ENTITY_CATEGORIES, type EntityCategory, type EntitySet } from './types.js';

interface EntityPattern {
  pattern: RegExp;
  /** Builds the entity text from a match; defaults to the whole match. */
  render?: (match: RegExpMatchArray) => string;
}

const ENTITY_PATTERNS: Record<EntityCategory, EntityPattern[]> = {
  time_mentions: [
    { pattern: /\d{1,2}:\d{2}/g },
    { pattern: /morning|afternoon|evening|night/g },
    { pattern: /today|tomorrow|yesterday/g },
    { pattern: /monday|tuesday|wednesday|thursday|friday|saturday|sunday/g },
  ],
  locations: [
    {
      pattern: /(building|floor|room|site|area|zone)\s*([a-z0-9]+)/g,
      render: (match) => `${match[1] ?? ''} ${match[2] ?? ''}`,
    },
    { pattern: /basement|roof|office|warehouse|factory/g },
  ],
  equipment: [
    { pattern: /generator|pump|valve|motor|machine|equipment|tool/g },
    { pattern: /electrical|plumbing|hvac|mechanical/g },
  ],
  urgency: [
    { pattern: /urgent|emergency|asap|immediately|critical/g },
    { pattern: /low priority|when possible|no rush/g },
  ],
};

function extractCategory(text: string, patterns: EntityPattern[]): string[] {
  const found: Array<{ index: number; value: string }> = [];
  for (const { pattern, render } of patterns) {
    for (const match of text.matchAll(pattern)) {
      found.push({ index: match.index ?? 0, value: render ? render(match) : match[0] });
    }
  }
  // Array.prototype.sort is stable, so equal offsets keep pattern order
  return found.sort((a, b) => a.index - b.index).map((entry) => entry.value);
}

/**
 * Pull time, location, equipment and urgency hints out of a worker message.
 * Matching is case-insensitive and every match is kept, in textual order.
 */
export function extractEntities(text: string): EntitySet {
  const lower = text.toLowerCase();
  const entities: Partial<Record<EntityCategory, string[]>> = {};

  for (const category of ENTITY_CATEGORIES) {
    const matches = extractCategory(lower, ENTITY_PATTERNS[category]);
    if (matches.length > 0) {
      entities[category] = matches;
    }
  }

  return entities;
}

/** Compact one-line rendering used in model prompts and logs. */
export function describeEntities(entities: EntitySet): string {
  const parts: string[] = [];
  if (entities.urgency) parts.push(`Urgency detected: ${entities.urgency.join(', ')}`);
  if (entities.equipment) parts.push(`Equipment mentioned: ${entities.equipment.join(', ')}`);
  if (entities.locations) parts.push(`Location: ${entities.locations.join(', ')}`);
  if (entities.time_mentions) parts.push(`Time mentioned: ${entities.time_mentions.join(', ')}`);
  return parts.length > 0 ? parts.join(' | ') : 'Standard message';
}
