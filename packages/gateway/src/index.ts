export * from './submission/index.js';
export { RedisReplayStore, createRedisClient } from './adapters/redis-replay-store.js';
export * from './persistence/postgres/index.js';
export { StaticTaskDirectory, DEFAULT_TASK } from './services/task-directory.js';
export type { TaskDirectory } from './services/task-directory.js';
export * from './http/index.js';
export { Gateway, ConfigError, loadConfigFromEnv, parseBindAddress } from './app.js';
export type { GatewayConfig, TaskSource } from './app.js';
