/**
 * instance-forest - an in-memory forest of identity-addressed instances
 *
 * Instances form ordered trees held in an identity-indexed store. Subtrees can
 * be removed into forests of their own, transplanted between forests, walked
 * lazily, validated and snapshotted to plain data.
 */

export * from './entities/index.js';
export * from './errors/index.js';
export * from './schemas/index.js';
export { newInstanceId, parseInstanceId, isInstanceId } from './utils/instanceId.js';
export { cfg, configSchema, type AppConfig } from './config/index.js';
export {
  logger,
  createLogger,
  createModuleLogger,
  createLoggerOptions,
  startTimer,
  logError,
} from './utils/logger.js';
