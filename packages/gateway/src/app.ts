/**
 * Gateway Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: connect Redis, build the pipeline context, start HTTP + metrics
 * - On shutdown: stop accepting requests, then close Redis and the pg pool
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { Express } from 'express';
import type { Server } from 'http';
import { Pool } from 'pg';
import { Redis } from 'ioredis';

import {
  SubmissionPipeline,
  createPipelineContext,
  systemClock,
  DEFAULT_VERIFICATION_WINDOWS,
} from './submission/index.js';
import { createPostgresStoresFromPool } from './persistence/postgres/index.js';
import { RedisReplayStore, createRedisClient } from './adapters/redis-replay-store.js';
import { StaticTaskDirectory, TaskDirectory } from './services/task-directory.js';
import { createRoutes, errorHandler } from './http/index.js';
import { startMetricsServer, trackPipelineEvent } from './metrics/index.js';
import { createLogger, isLogLevel, Logger, LogLevel, LOG_LEVELS } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export type TaskSource = 'static' | 'database';

export interface GatewayConfig {
  // Server
  port: number;
  host: string;
  metricsPort: number;

  // Database
  databaseUrl: string;

  // Cache
  redisUrl: string;

  // Verification
  maxSkewSeconds: number;
  maxAgeSeconds: number;
  replayTtlSeconds: number;
  maxArtifactBytes: number;

  // Tasks
  taskSource: TaskSource;

  // Logging
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Parse "host:port". IPv6 hosts use brackets: "[::]:8080".
 */
export function parseBindAddress(value: string): { host: string; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(value);
  if (!match) {
    throw new ConfigError(`BIND_ADDR must look like host:port, got "${value}"`);
  }
  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (port > 65535) {
    throw new ConfigError(`BIND_ADDR port out of range: ${port}`);
  }
  return { host, port };
}

export function loadConfigFromEnv(env: Env = process.env): GatewayConfig {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL required');
  }

  const { host, port } = parseBindAddress(env.BIND_ADDR ?? '0.0.0.0:8080');

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  const taskSource = env.TASK_SOURCE ?? 'static';
  if (taskSource !== 'static' && taskSource !== 'database') {
    throw new ConfigError(`TASK_SOURCE must be "static" or "database", got "${taskSource}"`);
  }

  return {
    port,
    host,
    metricsPort: parseInteger(env, 'METRICS_PORT', 9090),
    databaseUrl,
    redisUrl: env.REDIS_URL ?? 'redis://127.0.0.1/',
    maxSkewSeconds: parseInteger(env, 'FRESHNESS_MAX_SKEW_SECONDS', DEFAULT_VERIFICATION_WINDOWS.maxSkewSeconds),
    maxAgeSeconds: parseInteger(env, 'FRESHNESS_MAX_AGE_SECONDS', DEFAULT_VERIFICATION_WINDOWS.maxAgeSeconds),
    replayTtlSeconds: parseInteger(env, 'REPLAY_TTL_SECONDS', DEFAULT_VERIFICATION_WINDOWS.replayTtlSeconds, 1),
    maxArtifactBytes: parseInteger(env, 'MAX_ARTIFACT_BYTES', 64 * 1024 * 1024, 1),
    taskSource,
    logLevel,
  };
}

// =============================================================================
// GATEWAY APPLICATION
// =============================================================================

export class Gateway {
  private config: GatewayConfig;
  private logger: Logger;
  private app: Express;
  private pool: Pool;
  private redis: Redis;
  private server?: Server;
  private metricsServer?: Server;
  private shutdownPromise?: Promise<void>;

  constructor(config: GatewayConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'gateway' });
    this.app = express();
    this.pool = new Pool({ connectionString: config.databaseUrl });
    this.redis = createRedisClient(config.redisUrl);
  }

  /**
   * Start the Gateway.
   *
   * 1. Connect Redis (replay protection is mandatory, so failure is fatal)
   * 2. Build the pipeline context
   * 3. Start HTTP server
   * 4. Start metrics server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting Gateway...');

    this.redis.on('error', (err: Error) => {
      this.logger.error({ error: err }, 'Redis connection error');
    });
    await this.redis.connect();
    this.logger.info({}, 'Redis connection established');

    const stores = createPostgresStoresFromPool(this.pool);
    this.pool.on('error', (err: Error) => {
      this.logger.error({ error: err }, 'Idle database client error');
    });
    this.logger.info({}, 'Database pool created');

    const context = createPipelineContext({
      replayStore: new RedisReplayStore(this.redis),
      minerKeys: stores.minerKeys,
      ledger: stores.ledger,
      windows: {
        maxSkewSeconds: this.config.maxSkewSeconds,
        maxAgeSeconds: this.config.maxAgeSeconds,
        replayTtlSeconds: this.config.replayTtlSeconds,
      },
      clock: systemClock,
      logger: this.logger.child({ component: 'pipeline' }),
    });
    const pipeline = new SubmissionPipeline(context);
    this.logger.info(
      {
        maxSkewSeconds: this.config.maxSkewSeconds,
        maxAgeSeconds: this.config.maxAgeSeconds,
        replayTtlSeconds: this.config.replayTtlSeconds,
      },
      'Submission pipeline initialized'
    );

    // Subscribe to pipeline events for metrics + debug logging
    pipeline.onEvent(trackPipelineEvent);
    pipeline.onEvent((event) => {
      if (event.type === 'STAGE_PASSED') {
        this.logger.debug({ submissionId: event.submissionId, stage: event.stage }, 'Stage passed');
      }
    });

    const tasks: TaskDirectory =
      this.config.taskSource === 'database' ? stores.tasks : new StaticTaskDirectory();
    this.logger.info({ source: this.config.taskSource }, 'Task directory initialized');

    // Setup HTTP server
    this.app.use(
      createRoutes({
        pipeline,
        tasks,
        logger: this.logger,
        maxArtifactBytes: this.config.maxArtifactBytes,
      })
    );
    this.app.use(errorHandler(this.logger));

    // Start listening
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Gateway HTTP server started'
        );
        resolve();
      });
    });

    // Start internal metrics server (Prometheus /metrics)
    this.metricsServer = startMetricsServer(this.config.metricsPort);
    this.logger.info({ port: this.config.metricsPort }, 'Internal metrics server started (Prometheus /metrics)');

    this.setupShutdownHandlers();

    this.logger.info({}, 'Gateway started successfully');
  }

  /**
   * Stop the Gateway gracefully.
   *
   * - Stop accepting new requests, let in-flight submissions finish
   * - Close Redis and database connections
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping Gateway...');

    // Stop HTTP server
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    // Stop metrics server
    if (this.metricsServer) {
      this.metricsServer.close();
      this.logger.info({}, 'Metrics server stopped');
    }

    await this.redis.quit();
    this.logger.info({}, 'Redis connection closed');

    // Close database pool
    await this.pool.end();
    this.logger.info({}, 'Database connections closed');

    this.logger.info({}, 'Gateway stopped');
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      try {
        await this.stop();
        process.exit(0);
      } catch (err) {
        this.logger.error({ error: err }, 'Shutdown failed');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const gateway = new Gateway(config);
  await gateway.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
