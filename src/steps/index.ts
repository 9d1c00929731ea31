/**
 * Interview steps.
 *
 * @packageDocumentation
 */

export * from './types.js';
export { executeStep } from './execute.js';
export { executeAsk, askQuestion } from './ask.js';
export { executeSet } from './set.js';
export { executeExit } from './exit.js';
export { executeEnsure } from './ensure.js';
