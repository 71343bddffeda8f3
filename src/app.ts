import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfig, type AppConfig } from './config/index.js';
import { registerErrorHandler } from './common/error-handler.js';
import { createEventBus, type InMemoryEventBus } from './common/event-bus.js';
import { passThroughValidator } from './common/http.js';
import { createAuthHook } from './modules/auth/auth.middleware.js';
import { createApiKeyStore, type ApiKeyStore } from './modules/auth/api-key.store.js';
import { createAccessGuard } from './modules/access/access.guard.js';
import { participantRoutes } from './modules/participants/participant.routes.js';
import { courseRoutes } from './modules/courses/course.routes.js';
import { enrollmentRoutes } from './modules/enrollments/enrollment.routes.js';
import { assessmentRoutes } from './modules/assessments/assessment.routes.js';
import { attemptRoutes } from './modules/attempts/attempt.routes.js';
import { createAttemptManager } from './modules/attempts/attempt.service.js';
import { progressRoutes } from './modules/progress/progress.routes.js';
import { createProgressTracker } from './modules/progress/progress.service.js';
import { notificationRoutes } from './modules/notifications/notification.routes.js';
import { createNotificationFanout, registerFanoutSubscriber } from './modules/notifications/notification.service.js';
import { createLoggingNotifier, type Notifier } from './modules/notifications/notifier.js';
import {
  createInMemoryRepositoryBundle,
  type RepositoryBundle,
} from './infrastructure/repositories.js';
import './common/fastify-request.js';
import pkg from '../package.json' with { type: 'json' };

export interface AppDependencies {
  config?: AppConfig;
  repositories?: RepositoryBundle;
  apiKeyStore?: ApiKeyStore;
  notifier?: Notifier;
  eventBus?: InMemoryEventBus;
  /** Set to false to silence request logging (tests). */
  logger?: boolean;
}

const apiVersion = typeof pkg?.version === 'string' ? pkg.version : '0.0.0';

export function buildApp(deps: AppDependencies = {}) {
  const config = deps.config ?? loadConfig();
  const app = Fastify({ logger: deps.logger === false ? false : { level: config.server.logLevel } });
  const repositories = deps.repositories ?? createInMemoryRepositoryBundle();
  const apiKeyStore = deps.apiKeyStore ?? createApiKeyStore(config.auth.seedKeys);
  const eventBus = deps.eventBus ?? createEventBus(app.log);
  const notifier = deps.notifier ?? createLoggingNotifier(app.log);

  const accessGuard = createAccessGuard({
    courseRepository: repositories.course,
    enrollmentRepository: repositories.enrollment,
  });
  const attemptManager = createAttemptManager({
    attemptRepository: repositories.attempt,
    assessmentRepository: repositories.assessment,
    accessGuard,
    eventBus,
    logger: app.log,
  });
  const progressTracker = createProgressTracker({
    progressRepository: repositories.progress,
    courseRepository: repositories.course,
    accessGuard,
    eventBus,
    logger: app.log,
  });
  const notificationFanout = createNotificationFanout({
    notificationRepository: repositories.notification,
    enrollmentRepository: repositories.enrollment,
    participantRepository: repositories.participant,
    notifier,
    logger: app.log,
    batchSize: config.fanout.batchSize,
    claimTtlMs: config.fanout.claimTtlMs,
  });
  registerFanoutSubscriber({
    eventBus,
    courseRepository: repositories.course,
    notificationFanout,
    logger: app.log,
  });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Course Progress Engine API',
        description: 'Gated course content, graded assessments, learner progress and publish notifications',
        version: apiVersion,
      },
      servers: [{ url: config.server.publicUrl, description: 'API server' }],
      components: {
        securitySchemes: {
          ApiKeyHeader: {
            type: 'apiKey',
            in: 'header',
            name: 'x-api-key',
            description: 'API key issued per tenant',
          },
          TenantHeader: {
            type: 'apiKey',
            in: 'header',
            name: 'x-tenant-id',
            description: 'Tenant scope for the request',
          },
          ActorHeader: {
            type: 'apiKey',
            in: 'header',
            name: 'x-actor-id',
            description: 'Participant acting on the request',
          },
        },
      },
      security: [
        {
          ApiKeyHeader: [],
          TenantHeader: [],
          ActorHeader: [],
        },
      ],
    },
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  app.setValidatorCompiler(passThroughValidator);

  app.decorateRequest('tenantId', '');
  app.decorateRequest('actorId', undefined);
  registerErrorHandler(app);

  // Auth & tenant enforcement
  app.addHook('onRequest', createAuthHook(apiKeyStore));

  // Routes
  app.register(participantRoutes, { prefix: '/participants', repository: repositories.participant });
  app.register(courseRoutes, { prefix: '/courses', repository: repositories.course, accessGuard, eventBus });
  app.register(enrollmentRoutes, {
    prefix: '/courses',
    repository: repositories.enrollment,
    courseRepository: repositories.course,
    accessGuard,
  });
  app.register(assessmentRoutes, {
    prefix: '/assessments',
    repository: repositories.assessment,
    accessGuard,
    attemptManager,
    eventBus,
  });
  app.register(attemptRoutes, { prefix: '/attempts', attemptManager });
  app.register(progressRoutes, { prefix: '/progress', progressTracker });
  app.register(notificationRoutes, { prefix: '/notifications', notificationFanout });

  app.addHook('onClose', async () => {
    await eventBus.drain();
    if (repositories.dispose) {
      await repositories.dispose();
    }
  });

  app.get('/health', async () => ({ status: 'ok' }));
  return app;
}
