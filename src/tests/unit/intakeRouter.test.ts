import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { DEFAULT_POLICY } from '../../config/index.js';
import { DatabaseActionExecutor } from '../../core/actions/DatabaseActionExecutor.js';
import { IntentClassifier } from '../../core/agent/IntentClassifier.js';
import { MessagePipeline } from '../../core/agent/MessagePipeline.js';
import { MessageProcessingService } from '../../core/agent/MessageProcessingService.js';
import { ResponseComposer } from '../../core/agent/ResponseComposer.js';
import { RuleBasedClassifier } from '../../core/agent/RuleBasedClassifier.js';
import { StoredNotificationAdapter } from '../../adapters/notifications/StoredNotificationAdapter.js';
import { openDatabase } from '../../persistence/database.js';
import { AgentOutcomeRepository } from '../../persistence/repositories/AgentOutcomeRepository.js';
import { AttendanceRepository } from '../../persistence/repositories/AttendanceRepository.js';
import { IncidentRepository } from '../../persistence/repositories/IncidentRepository.js';
import { ManagerNotificationRepository } from '../../persistence/repositories/ManagerNotificationRepository.js';
import { PermissionRequestRepository } from '../../persistence/repositories/PermissionRequestRepository.js';
import { SupportRequestRepository } from '../../persistence/repositories/SupportRequestRepository.js';
import { TaskRepository } from '../../persistence/repositories/TaskRepository.js';
import { WorkerMessageRepository } from '../../persistence/repositories/WorkerMessageRepository.js';
import { createApp } from '../../server.js';

describe('intake HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const db = openDatabase(':memory:');
    const notificationRepository = new ManagerNotificationRepository(db);
    const outcomeRepository = new AgentOutcomeRepository(db);
    const processingService = new MessageProcessingService({
      pipeline: new MessagePipeline(
        new IntentClassifier(new RuleBasedClassifier(), DEFAULT_POLICY),
        new ResponseComposer(DEFAULT_POLICY),
        DEFAULT_POLICY
      ),
      actionExecutor: new DatabaseActionExecutor({
        taskRepository: new TaskRepository(db),
        incidentRepository: new IncidentRepository(db),
        permissionRequestRepository: new PermissionRequestRepository(db),
        attendanceRepository: new AttendanceRepository(db),
        supportRequestRepository: new SupportRequestRepository(db),
        workerMessageRepository: new WorkerMessageRepository(db),
      }),
      notificationPort: new StoredNotificationAdapter(notificationRepository),
      outcomeRepository,
    });

    const app = createApp({ processingService, outcomeRepository, notificationRepository });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('processes an incident report', async () => {
    const res = await post(
      '/process-message',
      JSON.stringify({ message: "There's a gas leak in the basement - urgent!", sender_id: 42 })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      intent: 'incident_report',
      confidence: expect.closeTo(2 / 9 + 0.3, 5),
      response:
        '🚨 Leak reported! Your manager and the safety team have been notified. Please evacuate the area and keep yourself safe.',
      database_action: 'create_incident_record',
      requires_manager_attention: true,
      auto_processed: false,
      entities: { locations: ['basement'], urgency: ['urgent'] },
      action_succeeded: true,
    });
  });

  it('queues a manager notification for the incident', async () => {
    const res = await fetch(`${baseUrl}/notifications`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      notifications: [
        expect.objectContaining({
          id: 1,
          intent: 'incident_report',
          senderId: '42',
          action: 'create_incident_record',
        }),
      ],
    });
  });

  it('acknowledges delivered notifications once', async () => {
    expect((await post('/notifications/1/delivered', '{}')).status).toBe(200);
    expect((await post('/notifications/1/delivered', '{}')).status).toBe(404);
    expect((await post('/notifications/abc/delivered', '{}')).status).toBe(400);
  });

  it('reports a failed action when the worker has no task', async () => {
    const res = await post(
      '/process-message',
      JSON.stringify({ message: 'Just finished the plumbing repair in Building A', sender_id: 'w-7' })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      intent: 'task_update',
      database_action: 'update_task_progress',
      requires_manager_attention: false,
      action_succeeded: false,
    });
  });

  it('summarises processed messages', async () => {
    const res = await fetch(`${baseUrl}/stats`);

    expect(await res.json()).toEqual({
      totalMessages: 2,
      escalated: 1,
      failedActions: 1,
      byIntent: { incident_report: 1, task_update: 1 },
    });
  });

  it('rejects requests without a message', async () => {
    const res = await post('/process-message', JSON.stringify({ sender_id: 'w-1' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid request', issues: ['message: Required'] });
  });

  it('rejects malformed JSON', async () => {
    const res = await post('/process-message', '{"message":');
    expect(res.status).toBe(400);
  });
});
