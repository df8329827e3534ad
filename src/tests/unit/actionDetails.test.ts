import { describe, it, expect } from 'vitest';
import {
  attendanceEventFromText,
  incidentSeverityFromText,
  isUrgentRequest,
  permissionTypeFromText,
  taskProgressFromText,
} from '../../core/actions/actionDetails.js';

describe('actionDetails', () => {
  it('estimates task progress from the first keyword hit', () => {
    expect(taskProgressFromText('Halfway through the tiling')).toEqual({ progressPercentage: 50, status: 'ongoing' });
    expect(taskProgressFromText('All done here')).toEqual({ progressPercentage: 100, status: 'completed' });
    expect(taskProgressFromText('Working on it')).toEqual({ progressPercentage: 0, status: 'ongoing' });
  });

  it('grades incident severity', () => {
    expect(incidentSeverityFromText('Small fire near the generator')).toBe('critical');
    expect(incidentSeverityFromText('Safety rail is loose')).toBe('high');
    expect(incidentSeverityFromText('Door handle broken')).toBe('medium');
    expect(incidentSeverityFromText('Scuff on the wall')).toBe('low');
  });

  it('types permission requests', () => {
    expect(permissionTypeFromText('Can I take vacation next week')).toEqual({
      type: 'vacation',
      title: 'Vacation Request',
    });
    expect(permissionTypeFromText('Feeling sick today')).toEqual({ type: 'sick_leave', title: 'Sick Leave Request' });
    expect(permissionTypeFromText('Can I borrow the van')).toEqual({
      type: 'general',
      title: 'General Permission Request',
    });
  });

  it('treats urgent, emergency and asap as urgent requests', () => {
    expect(isUrgentRequest({ urgency: ['asap'] })).toBe(true);
    expect(isUrgentRequest({ urgency: ['critical'] })).toBe(false);
    expect(isUrgentRequest({})).toBe(false);
  });

  it('reads the attendance event, defaulting to check-in', () => {
    expect(attendanceEventFromText('Checking out, going home')).toBe('check_out');
    expect(attendanceEventFromText('Taking a break')).toBe('break_start');
    expect(attendanceEventFromText('Back on the job')).toBe('break_end');
    expect(attendanceEventFromText('On the roof')).toBe('check_in');
  });
});
