/**
 * Interview engine
 *
 * Runs rules-driven interviews: scripts of questions and steps that decide,
 * from the answers so far, what to ask next.
 *
 * @example
 * ```typescript
 * import { InterviewEngine, MemoryStorage, loadScripts } from 'interview-engine';
 *
 * const interviews = await loadScripts(['interviews.yml']);
 * const engine = new InterviewEngine({ interviews, storage: new MemoryStorage() });
 * const started = await engine.start('registration');
 * const result = await engine.update(started.key);
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './errors.js';
export * from './pointer/index.js';
export * from './logic/index.js';
export * from './fields/index.js';
export * from './steps/index.js';
export * from './interview/index.js';
export * from './storage/index.js';
export * from './script/index.js';
export * from './config/index.js';
export { Logger, createLogger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
export type { JsonObject, JsonValue, Value } from './utils/json.js';
