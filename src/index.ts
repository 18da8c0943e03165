/**
 * cooploop
 * Single-threaded cooperative task scheduler for Node.js
 *
 * Features:
 * - Generator tasks that suspend on yield-now, deadlines and descriptor readiness
 * - One multiplexer poll per idle loop iteration
 * - AsyncQueue with direct handoff and close semantics
 * - Stream connections whose would-block reads and writes become waits
 */

export * from './core/index.js';
export * from './multiplexer/index.js';
export * from './sync/index.js';
export { StreamConnection } from './io/connection.js';
export {
    SchedulerConfigSchema,
    ConfigError,
    defaultConfig,
    loadConfig,
    validateConfig,
    type ErrorPolicy,
    type LoadConfigOptions,
    type SchedulerConfig,
} from './config/index.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logging/logger.js';
export {
    SchedulerEventBus,
    matchPattern,
    type SchedulerEvent,
    type SchedulerEventHandler,
    type SchedulerEventType,
} from './events/bus.js';
