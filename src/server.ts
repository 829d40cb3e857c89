import { FastifyInstance } from 'fastify';
import { buildServer } from './app';
import { Base64CredentialEncoder } from './clients/credential-encoder';
import { LoginFlow } from './clients/login-flow';
import { PortalTransport } from './clients/portal-transport';
import { PortalClient } from './clients/portal.client';
import { config } from './config';
import { createScheduleExtractor } from './extractors/schedule';
import { SnapshotRetentionJob } from './jobs/snapshot-retention.job';
import { AcademicRepositoryImpl } from './repositories/implementations/academic.repository.impl';
import { MemoryAcademicRepository } from './repositories/implementations/memory-academic.repository';
import { AcademicRepository } from './repositories/interfaces/academic.repository';
import { AcademicService } from './services/academic.service';
import { CacheService, RedisCacheService } from './services/cache.service';
import { DatabaseService } from './services/database.service';
import { MemoryCacheService } from './services/memory-cache.service';
import { SessionStoreService } from './services/session-store.service';
import { SnapshotStoreService } from './services/snapshot-store.service';
import { SyncService } from './services/sync.service';
import { logger } from './utils/logger';

/**
 * Portal Sync Service - Main server
 * Wires the portal client, session store and snapshot storage behind the HTTP API
 */

interface Runtime {
  fastify: FastifyInstance;
  retentionJob: SnapshotRetentionJob;
  transport: PortalTransport;
  cache: CacheService;
  database: DatabaseService | null;
}

function createCache(): CacheService {
  if (config.SESSION_BACKEND === 'memory') {
    logger.warn('Server', 'Using in-process session and cache store; sessions are lost on restart');
    return new MemoryCacheService();
  }
  return new RedisCacheService(config);
}

function createRepository(database: DatabaseService | null): AcademicRepository {
  if (!database) {
    logger.warn('Server', 'Using in-process snapshot storage; data is lost on restart');
    return new MemoryAcademicRepository();
  }
  return new AcademicRepositoryImpl(database, { logQueries: config.LOG_LEVEL === 'debug' });
}

/**
 * Build every component and the HTTP server
 */
async function initialize(): Promise<Runtime> {
  const cache = createCache();
  const database = config.STORAGE_BACKEND === 'postgres' ? new DatabaseService(config) : null;
  const repository = createRepository(database);

  // Ensure database tables exist
  await repository.ensureSchema();

  const transport = new PortalTransport({
    baseUrl: config.PORTAL_BASE_URL,
    connectTimeoutMs: config.PORTAL_CONNECT_TIMEOUT_MS,
    readTimeoutMs: config.PORTAL_READ_TIMEOUT_MS,
    insecureSkipVerify: config.PORTAL_INSECURE_SKIP_VERIFY,
    userAgent: config.PORTAL_USER_AGENT,
  });
  const loginFlow = new LoginFlow(transport, new Base64CredentialEncoder(), {
    healthPath: config.PORTAL_HEALTH_PATH,
    loginPath: config.PORTAL_LOGIN_PATH,
  });
  const portal = new PortalClient(transport, loginFlow, createScheduleExtractor(config.SCHEDULE_PARSER), {
    healthPath: config.PORTAL_HEALTH_PATH,
    profilePath: config.PORTAL_PROFILE_PATH,
    semestersPath: config.PORTAL_SEMESTERS_PATH,
    gradesPath: config.PORTAL_GRADES_PATH,
    schedulePath: config.PORTAL_SCHEDULE_PATH,
  });

  const sessions = new SessionStoreService(cache, {
    absoluteTtlSec: config.SESSION_ABSOLUTE_TTL_SEC,
    idleTtlSec: config.SESSION_IDLE_TTL_SEC,
  });
  const snapshots = new SnapshotStoreService(repository, cache, {
    profile: config.CACHE_TTL_PROFILE_SEC,
    semesters: config.CACHE_TTL_SEMESTERS_SEC,
    grades: config.CACHE_TTL_GRADES_SEC,
    schedule: config.CACHE_TTL_SCHEDULE_SEC,
  });
  const sync = new SyncService(sessions, snapshots, portal);
  const academic = new AcademicService(portal, sessions, sync);

  const retentionJob = new SnapshotRetentionJob(repository, {
    retentionDays: config.SNAPSHOT_RETENTION_DAYS,
    intervalMs: config.SNAPSHOT_CLEANUP_INTERVAL_MS,
    batchSize: config.SNAPSHOT_CLEANUP_BATCH_SIZE,
    batchDelayMs: config.SNAPSHOT_CLEANUP_BATCH_DELAY_MS,
    warningThresholdMs: config.SNAPSHOT_CLEANUP_WARNING_THRESHOLD_MS,
  });

  const fastify = await buildServer(
    {
      academic,
      readiness: {
        database: repository,
        cache,
        ...(database ? { poolStatus: () => database.getPoolStatus() } : {}),
      },
    },
    {
      requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
      connectionTimeoutMs: config.CONNECTION_TIMEOUT_MS,
      bodyLimitBytes: config.BODY_LIMIT_BYTES,
    }
  );

  return { fastify, retentionJob, transport, cache, database };
}

let runtime: Runtime | null = null;

/**
 * Start server
 */
async function start(): Promise<void> {
  try {
    runtime = await initialize();

    // Start snapshot retention job
    runtime.retentionJob.start();

    // Start listening
    await runtime.fastify.listen({
      port: config.PORT,
      host: config.HOST,
    });
    logger.info('Server', `Listening on ${config.HOST}:${config.PORT}`, {
      storage: config.STORAGE_BACKEND,
      sessions: config.SESSION_BACKEND,
      scheduleParser: config.SCHEDULE_PARSER,
    });
  } catch (error) {
    logger.error('Server', 'Failed to start server', error);
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 */
let isShuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info('Server', `Shutdown already in progress, ignoring ${signal}`);
    return;
  }
  isShuttingDown = true;

  logger.info('Server', `Received ${signal}, starting graceful shutdown`);

  try {
    if (runtime) {
      // Stop accepting new connections
      await runtime.fastify.close();
      logger.info('Server', 'Fastify closed');

      await runtime.retentionJob.stop();

      await runtime.transport.close();

      // Close cache connection
      await runtime.cache.close();
      logger.info('Server', 'Cache closed');

      // Close database connection
      if (runtime.database) {
        await runtime.database.close();
        logger.info('Server', 'Database closed');
      }
    }

    logger.info('Server', 'Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Server', 'Error during shutdown', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// Handle uncaught errors
process.on('uncaughtException', error => {
  logger.error('Server', 'Uncaught exception', error);
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', reason => {
  logger.error('Server', 'Unhandled rejection', reason);
  void shutdown('unhandledRejection');
});

void start();
