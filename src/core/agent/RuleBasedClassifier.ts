import type { ClassificationResult, Intent } from './types.js';

type ScoredIntent = Exclude<Intent, 'general'>;

interface IntentRules {
  /** Pattern groups; each matching group counts once toward the score. */
  groups: RegExp[];
  /** Narrow phrases that add a flat bonus when any of them matches. */
  specific: RegExp[];
}

const SPECIFIC_MATCH_BONUS = 0.3;
const MAX_RULE_CONFIDENCE = 0.95;
const NO_MATCH_RESULT: ClassificationResult = { intent: 'general', confidence: 0.5, source: 'rules' };

/**
 * Evaluation order doubles as the tie-break: when two intents reach the same
 * score the one listed first wins. Severity-first, so a message that reads as
 * both an incident and a task update is treated as an incident.
 */
export const RULE_PRIORITY: readonly ScoredIntent[] = [
  'incident_report',
  'permission_request',
  'task_update',
  'attendance',
  'question',
];

const INTENT_RULES: Record<ScoredIntent, IntentRules> = {
  task_update: {
    groups: [
      /completed|finished|done|complete|completing/,
      /started|starting|beginning|begin|working on/,
      /progress|update|status|advancement/,
      /task|work|job|assignment|project/,
      /(material|tool|equipment|resource).*(need|require|want)/,
      /delayed|behind|late|slow|stuck/,
      /on schedule|on time|ahead|early/,
      /almost done|nearly finished|halfway/,
      /repair|fix|install|build|construct/,
    ],
    specific: [/finished/, /completed/, /started/, /progress/, /need.*material/],
  },
  incident_report: {
    groups: [
      /incident|accident|emergency|problem|issue|trouble/,
      /safety|danger|hazard|risk|unsafe/,
      /broken|damaged|malfunction|fault|failure|not working/,
      /injury|hurt|injured|medical|first aid/,
      /leak|spill|fire|gas|smoke|explosion/,
      /urgent|emergency|critical|serious|help/,
      /pipe.*broken|pipe.*leak|water.*damage/,
      /electrical.*problem|power.*out|short circuit/,
      /security.*breach|unauthorized.*access/,
    ],
    specific: [/gas leak/, /pipe.*broken/, /emergency/, /urgent/, /safety/, /injury/, /broken/],
  },
  permission_request: {
    groups: [
      /permission|access|authorize|authorization|approval/,
      /overtime|extra hours|weekend work|holiday work/,
      /restricted|locked|secure|private|blocked/,
      /can i|may i|allowed to|permit|let me/,
      /approve|clearance|sign off/,
      /budget|purchase|expense|cost/,
      /leave|time off|vacation|sick day/,
    ],
    specific: [/permission/, /approval/, /overtime/, /access/, /authorize/],
  },
  attendance: {
    groups: [
      /check in|checked in|arrived|here|present|on site/,
      /check out|checking out|leaving|finished|going home/,
      /break|lunch|rest|meal/,
      /sick|ill|absent|leave|not coming/,
      /at location|reached|on site|at work/,
      /clocking in|clocking out|time card/,
      /shift.*start|shift.*end/,
    ],
    specific: [/check in/, /check out/, /arrived/, /leaving/, /on site/],
  },
  question: {
    groups: [
      /how|what|when|where|why|help|assist/,
      /instruction|procedure|guideline|manual/,
      /don't know|not sure|confused|unclear|unsure/,
      /explain|clarify|understand|learn|show me/,
      /\?|help me|need help|assistance/,
      /new.*equipment|operate|use.*machine/,
    ],
    specific: [/how/, /what/, /help/, /procedure/, /unclear/],
  },
};

/**
 * Deterministic keyword classifier. Always available; used on its own when no
 * model is configured and as the fallback when the model result is rejected.
 */
export class RuleBasedClassifier {
  classify(text: string): ClassificationResult {
    const lower = text.toLowerCase();
    let best: ClassificationResult | undefined;

    for (const intent of RULE_PRIORITY) {
      const confidence = scoreIntent(lower, INTENT_RULES[intent]);
      if (confidence > 0 && (!best || confidence > best.confidence)) {
        best = { intent, confidence, source: 'rules' };
      }
    }

    return best ?? NO_MATCH_RESULT;
  }
}

/** 0 when no group matches; otherwise a confidence in (0, MAX_RULE_CONFIDENCE]. */
function scoreIntent(text: string, rules: IntentRules): number {
  const matched = rules.groups.filter((group) => group.test(text)).length;
  if (matched === 0) {
    return 0;
  }
  let confidence = matched / rules.groups.length;
  if (rules.specific.some((pattern) => pattern.test(text))) {
    confidence += SPECIFIC_MATCH_BONUS;
  }
  return Math.min(MAX_RULE_CONFIDENCE, confidence);
}
