import type { ActionExecutorPort, ActionRequest, ActionResult } from '../../ports/ActionExecutorPort.js';
import type { TaskRepository } from '../../persistence/repositories/TaskRepository.js';
import type { IncidentRepository } from '../../persistence/repositories/IncidentRepository.js';
import type { PermissionRequestRepository } from '../../persistence/repositories/PermissionRequestRepository.js';
import type { AttendanceRepository } from '../../persistence/repositories/AttendanceRepository.js';
import type { SupportRequestRepository } from '../../persistence/repositories/SupportRequestRepository.js';
import type { WorkerMessageRepository } from '../../persistence/repositories/WorkerMessageRepository.js';
import { ActionError, describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
  attendanceEventFromText,
  incidentSeverityFromText,
  isUrgentRequest,
  permissionTypeFromText,
  taskProgressFromText,
} from './actionDetails.js';

const ATTENDANCE_NOTES_LIMIT = 255;

export interface DatabaseActionExecutorDependencies {
  taskRepository: TaskRepository;
  incidentRepository: IncidentRepository;
  permissionRequestRepository: PermissionRequestRepository;
  attendanceRepository: AttendanceRepository;
  supportRequestRepository: SupportRequestRepository;
  workerMessageRepository: WorkerMessageRepository;
  now?: () => Date;
}

/**
 * Carries out a routed action against the SQLite store. Never throws: a
 * failed write is reported as `success: false`.
 */
export class DatabaseActionExecutor implements ActionExecutorPort {
  private readonly logger = createLogger({ service: 'DatabaseActionExecutor' });
  private readonly now: () => Date;

  constructor(private readonly deps: DatabaseActionExecutorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async execute(request: ActionRequest): Promise<ActionResult> {
    const logger = this.logger.child({ action: request.action, senderId: request.senderId });

    try {
      const result = this.dispatch(request);
      logger.info({ recordId: result.recordId, success: result.success }, result.detail);
      return result;
    } catch (error) {
      const failure = new ActionError(`Action ${request.action} failed`, { cause: error });
      logger.error({ error: failure, cause: describeError(error) }, 'Action execution failed');
      return { success: false, detail: failure.message };
    }
  }

  private dispatch(request: ActionRequest): ActionResult {
    switch (request.action) {
      case 'update_task_progress':
        return this.updateTaskProgress(request);
      case 'create_incident_record':
        return this.createIncidentRecord(request);
      case 'create_permission_request':
        return this.createPermissionRequest(request);
      case 'update_attendance_record':
        return this.updateAttendanceRecord(request);
      case 'route_to_support':
        return this.routeToSupport(request);
      case 'log_general_message':
        return this.logGeneralMessage(request);
      default: {
        const unreachable: never = request.action;
        throw new ActionError(`Unhandled action: ${String(unreachable)}`);
      }
    }
  }

  private updateTaskProgress({ senderId, messageText }: ActionRequest): ActionResult {
    const task = this.deps.taskRepository.findActiveForWorker(senderId);
    if (!task) {
      return { success: false, detail: 'No active task found for worker' };
    }

    const { progressPercentage, status } = taskProgressFromText(messageText);
    this.deps.taskRepository.updateProgress(task.id, { status, progressPercentage, lastUpdate: messageText });
    return { success: true, recordId: task.id, detail: `Task ${task.id} is now ${status}` };
  }

  private createIncidentRecord({ senderId, messageText, entities }: ActionRequest): ActionResult {
    const incident = this.deps.incidentRepository.create({
      reportedBy: senderId,
      description: messageText,
      severity: incidentSeverityFromText(messageText),
      location: entities.locations?.[0],
    });
    return { success: true, recordId: incident.id, detail: `Incident ${incident.id} opened (${incident.severity})` };
  }

  private createPermissionRequest({ senderId, messageText, entities }: ActionRequest): ActionResult {
    const { type, title } = permissionTypeFromText(messageText);
    const isUrgent = isUrgentRequest(entities);
    const request = this.deps.permissionRequestRepository.create({
      userId: senderId,
      requestType: type,
      title,
      description: messageText,
      priority: isUrgent ? 'urgent' : 'normal',
      isUrgent,
    });
    return { success: true, recordId: request.id, detail: `Permission request ${request.id} (${type}) pending` };
  }

  private updateAttendanceRecord({ senderId, messageText, entities }: ActionRequest): ActionResult {
    const now = this.now();
    const event = attendanceEventFromText(messageText);
    // Attendance days are bucketed by UTC date
    const recordId = this.deps.attendanceRepository.recordEvent({
      userId: senderId,
      date: now.toISOString().split('T')[0] ?? '',
      event,
      at: now.getTime(),
      location: entities.locations?.[0],
      notes: messageText.slice(0, ATTENDANCE_NOTES_LIMIT),
    });
    return { success: true, recordId, detail: `Attendance ${event} recorded` };
  }

  private routeToSupport({ senderId, messageText, entities }: ActionRequest): ActionResult {
    const request = this.deps.supportRequestRepository.create({
      senderId,
      question: messageText,
      equipment: entities.equipment?.join(', '),
    });
    return { success: true, recordId: request.id, detail: `Support request ${request.id} opened` };
  }

  private logGeneralMessage({ senderId, messageText, entities }: ActionRequest): ActionResult {
    const id = this.deps.workerMessageRepository.save({ senderId, text: messageText, entities });
    return { success: true, recordId: id, detail: 'General message logged' };
  }
}
