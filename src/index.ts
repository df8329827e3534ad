// Load environment variables first
import 'dotenv/config';

import { loadConfig, policyFromConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { loadPrompt } from './utils/prompts.js';
import { getDatabase, closeDatabase } from './persistence/database.js';
import { TaskRepository } from './persistence/repositories/TaskRepository.js';
import { IncidentRepository } from './persistence/repositories/IncidentRepository.js';
import { PermissionRequestRepository } from './persistence/repositories/PermissionRequestRepository.js';
import { AttendanceRepository } from './persistence/repositories/AttendanceRepository.js';
import { SupportRequestRepository } from './persistence/repositories/SupportRequestRepository.js';
import { WorkerMessageRepository } from './persistence/repositories/WorkerMessageRepository.js';
import { ManagerNotificationRepository } from './persistence/repositories/ManagerNotificationRepository.js';
import { AgentOutcomeRepository } from './persistence/repositories/AgentOutcomeRepository.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { StoredNotificationAdapter } from './adapters/notifications/StoredNotificationAdapter.js';
import { RuleBasedClassifier } from './core/agent/RuleBasedClassifier.js';
import { LLMIntentClassifier } from './core/agent/LLMIntentClassifier.js';
import { IntentClassifier } from './core/agent/IntentClassifier.js';
import { ResponseComposer } from './core/agent/ResponseComposer.js';
import { MessagePipeline } from './core/agent/MessagePipeline.js';
import { MessageProcessingService } from './core/agent/MessageProcessingService.js';
import { DatabaseActionExecutor } from './core/actions/DatabaseActionExecutor.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting field message agent');

  try {
    const config = loadConfig();
    const policy = policyFromConfig(config);

    // Model path is optional; without a key every message goes through the rules
    const llmAdapter = config.anthropicApiKey ? new ClaudeAdapter(config) : undefined;
    if (!llmAdapter) {
      logger.warn('ANTHROPIC_API_KEY not set; running rule-based only');
    }

    const [classifyPrompt, replyPrompt] = await Promise.all([
      loadPrompt('classify_intent.md'),
      loadPrompt('compose_reply.md'),
    ]);

    const classifier = new IntentClassifier(
      new RuleBasedClassifier(),
      policy,
      llmAdapter ? new LLMIntentClassifier(llmAdapter, classifyPrompt) : undefined
    );
    const composer = new ResponseComposer(
      policy,
      llmAdapter ? { llmPort: llmAdapter, promptTemplate: replyPrompt } : undefined
    );
    const pipeline = new MessagePipeline(classifier, composer, policy);

    const db = getDatabase(config.databasePath);
    const notificationRepository = new ManagerNotificationRepository(db);
    const outcomeRepository = new AgentOutcomeRepository(db);
    const actionExecutor = new DatabaseActionExecutor({
      taskRepository: new TaskRepository(db),
      incidentRepository: new IncidentRepository(db),
      permissionRequestRepository: new PermissionRequestRepository(db),
      attendanceRepository: new AttendanceRepository(db),
      supportRequestRepository: new SupportRequestRepository(db),
      workerMessageRepository: new WorkerMessageRepository(db),
    });

    const processingService = new MessageProcessingService({
      pipeline,
      actionExecutor,
      notificationPort: new StoredNotificationAdapter(notificationRepository),
      outcomeRepository,
    });

    const server = await startServer(
      { processingService, outcomeRepository, notificationRepository },
      config.port,
      config.host
    );

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      server.close(() => {
        closeDatabase();
        process.exit(0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    logger.info({ host: config.host, port: config.port, modelEnabled: Boolean(llmAdapter) }, 'Agent ready');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
