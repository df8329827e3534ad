import type { EntitySet } from '../agent/types.js';
import type { TaskStatus } from '../../persistence/repositories/TaskRepository.js';
import type { IncidentSeverity } from '../../persistence/repositories/IncidentRepository.js';
import type { PermissionRequestType } from '../../persistence/repositories/PermissionRequestRepository.js';
import type { AttendanceEvent } from '../../persistence/repositories/AttendanceRepository.js';

// Keyword tables are checked in order; the first hit wins.

const PROGRESS_KEYWORDS: Array<[string, number]> = [
  ['started', 10],
  ['begun', 15],
  ['beginning', 10],
  ['progress', 50],
  ['halfway', 50],
  ['almost', 80],
  ['completed', 100],
  ['finished', 100],
  ['done', 100],
];

const SEVERITY_KEYWORDS: Array<[string, IncidentSeverity]> = [
  ['emergency', 'critical'],
  ['urgent', 'critical'],
  ['critical', 'critical'],
  ['serious', 'high'],
  ['danger', 'high'],
  ['safety', 'high'],
  ['injury', 'high'],
  ['fire', 'critical'],
  ['gas', 'critical'],
  ['problem', 'medium'],
  ['issue', 'medium'],
  ['broken', 'medium'],
];

const PERMISSION_TYPES: Array<{ type: PermissionRequestType; title: string; words: string[] }> = [
  { type: 'overtime', title: 'Overtime Request', words: ['overtime', 'extra hours', 'weekend', 'holiday'] },
  { type: 'vacation', title: 'Vacation Request', words: ['vacation', 'leave', 'time off', 'holiday'] },
  { type: 'sick_leave', title: 'Sick Leave Request', words: ['sick', 'ill', 'medical'] },
  { type: 'special_access', title: 'Special Access Request', words: ['access', 'permission', 'authorization'] },
];

const ATTENDANCE_EVENTS: Array<{ event: AttendanceEvent; words: string[] }> = [
  { event: 'check_in', words: ['check in', 'checked in', 'arrived', 'here', 'present'] },
  { event: 'check_out', words: ['check out', 'leaving', 'going home', 'finished'] },
  { event: 'break_start', words: ['break', 'lunch', 'rest'] },
  { event: 'break_end', words: ['back', 'return', 'resume'] },
];

const URGENT_PERMISSION_WORDS = ['urgent', 'emergency', 'asap'];

export function taskProgressFromText(text: string): { progressPercentage: number; status: TaskStatus } {
  const lower = text.toLowerCase();
  const hit = PROGRESS_KEYWORDS.find(([keyword]) => lower.includes(keyword));
  const progressPercentage = hit ? hit[1] : 0;
  return { progressPercentage, status: progressPercentage === 100 ? 'completed' : 'ongoing' };
}

export function incidentSeverityFromText(text: string): IncidentSeverity {
  const lower = text.toLowerCase();
  const hit = SEVERITY_KEYWORDS.find(([keyword]) => lower.includes(keyword));
  return hit ? hit[1] : 'low';
}

export function permissionTypeFromText(text: string): { type: PermissionRequestType; title: string } {
  const lower = text.toLowerCase();
  const hit = PERMISSION_TYPES.find(({ words }) => words.some((word) => lower.includes(word)));
  return hit ? { type: hit.type, title: hit.title } : { type: 'general', title: 'General Permission Request' };
}

export function isUrgentRequest(entities: EntitySet): boolean {
  return (entities.urgency ?? []).some((word) => URGENT_PERMISSION_WORDS.includes(word));
}

export function attendanceEventFromText(text: string): AttendanceEvent {
  const lower = text.toLowerCase();
  const hit = ATTENDANCE_EVENTS.find(({ words }) => words.some((word) => lower.includes(word)));
  return hit ? hit.event : 'check_in';
}
