import type { EntitySet, Intent } from './types.js';

const URGENT_WORDS = ['urgent', 'emergency', 'critical', 'asap', 'immediately', 'help'];

function mentions(text: string, ...words: string[]): boolean {
  return words.some((word) => text.includes(word));
}

function incidentReply(text: string): string {
  if (mentions(text, 'leak')) {
    return '🚨 Leak reported! Your manager and the safety team have been notified. Please evacuate the area and keep yourself safe.';
  }
  if (mentions(text, 'fire')) {
    return '🔥 Fire emergency logged! Emergency services and management are being alerted. Please follow evacuation procedures.';
  }
  if (mentions(text, 'injury', 'hurt')) {
    return '🏥 Injury recorded! First aid and your manager have been notified. Please get medical attention if you need it.';
  }
  if (mentions(text, 'broken', 'damaged')) {
    return '⚠️ Equipment damage reported! Maintenance has been alerted. Please avoid using the damaged equipment.';
  }
  return '🚨 Incident documented and your manager has been notified. Please put your safety first and follow protocol.';
}

function taskReply(text: string): string {
  if (mentions(text, 'finished', 'completed', 'done')) {
    return '✅ Great work finishing the task! Your progress is logged and the team is updated.';
  }
  if (mentions(text, 'started', 'beginning')) {
    return '🚀 Task start logged! Let me know if you need anything along the way.';
  }
  if (mentions(text, 'need') && mentions(text, 'material', 'tool')) {
    return '📦 Material request noted and passed to procurement. You will hear back about availability soon.';
  }
  if (mentions(text, 'delayed', 'behind')) {
    return '⏰ Delay logged and your manager notified so they can help clear the blocker.';
  }
  return '📝 Task update received and logged. The team has been informed.';
}

function permissionReply(text: string): string {
  if (mentions(text, 'overtime')) {
    return '📋 Overtime request sent to your manager. Expect an approval decision within a few hours.';
  }
  if (mentions(text, 'access', 'restricted')) {
    return '🔐 Access request forwarded to security and your manager. Please wait for clearance before going in.';
  }
  if (mentions(text, 'budget', 'purchase')) {
    return '💼 Budget request sent to management for review.';
  }
  return '📋 Permission request submitted to the right approvers. You will get an update shortly.';
}

function attendanceReply(text: string, entities: EntitySet): string {
  if (mentions(text, 'check in', 'arrived')) {
    const location = entities.locations?.[0];
    const where = location ? ` at ${location}` : '';
    return `✅ Checked in${where}! Have a productive and safe day.`;
  }
  if (mentions(text, 'check out', 'leaving')) {
    return '👋 Check-out recorded. Thanks for your work today, travel safely!';
  }
  if (mentions(text, 'break', 'lunch')) {
    return '☕ Break logged. Enjoy the rest and stay hydrated.';
  }
  return '⏰ Attendance updated. Your time tracking is current.';
}

function questionReply(text: string, entities: EntitySet): string {
  if (mentions(text, 'how') && mentions(text, 'operate', 'use')) {
    const equipment = entities.equipment?.[0];
    const subject = equipment ? ` for the ${equipment}` : '';
    return `💡 Operating question noted${subject}. Connecting you with a technician or the manual.`;
  }
  if (mentions(text, 'procedure', 'protocol')) {
    return '📋 Procedure question logged. Sending the relevant guidelines or a supervisor your way.';
  }
  if (mentions(text, 'safety')) {
    return '⛑️ Safety questions come first. Forwarded to the safety officer for guidance.';
  }
  return '❓ Question received. Getting you the right information or someone who can help.';
}

function generalReply(text: string): string {
  if (mentions(text, ...URGENT_WORDS)) {
    return '⚠️ Message marked urgent and forwarded to your manager. You should hear back soon.';
  }
  return '📝 Message received and logged. The right people have been notified.';
}

/**
 * Deterministic reply chosen by intent, then by the first keyword that
 * matches inside that intent. Never returns an empty string.
 */
export function buildFallbackReply(text: string, intent: Intent, entities: EntitySet): string {
  const lower = text.toLowerCase();
  switch (intent) {
    case 'incident_report':
      return incidentReply(lower);
    case 'task_update':
      return taskReply(lower);
    case 'permission_request':
      return permissionReply(lower);
    case 'attendance':
      return attendanceReply(lower, entities);
    case 'question':
      return questionReply(lower, entities);
    case 'general':
      return generalReply(lower);
    default: {
      const unreachable: never = intent;
      throw new Error(`Unhandled intent: ${String(unreachable)}`);
    }
  }
}
