/**
 * Programmatic interview API.
 *
 * InterviewEngine is the boundary a front end talks to: it starts interviews
 * and advances them by key. Every call stores the new state under a new key,
 * so a key always names one immutable snapshot.
 *
 * @packageDocumentation
 */

import { isUserError, NotFoundError, toError } from '../errors.js';
import { isValidKey } from '../storage/keys.js';
import type { InterviewStorage } from '../storage/types.js';
import type { JsonObject } from '../utils/json.js';
import { Logger } from '../utils/logger.js';
import { createInitialState, createInterviewContext, type StartOptions } from './state.js';
import type { Interview, InterviewStatus, StepContent } from './types.js';
import { updateInterview } from './update.js';

/**
 * Result of a start or update call.
 */
export interface EngineResult {
  /** Key of the stored state; pass it to the next update. */
  readonly key: string;
  readonly completed: boolean;
  readonly status: InterviewStatus;
  /** The pending question or exit payload, or null. */
  readonly content: StepContent | null;
  /** The answers collected so far. */
  readonly data: JsonObject;
}

/**
 * Options for creating an InterviewEngine.
 */
export interface InterviewEngineOptions {
  /** Loaded interviews, as a list or a map; each is registered under its own id. */
  readonly interviews: ReadonlyMap<string, Interview> | readonly Interview[];
  readonly storage: InterviewStorage;
  readonly logger?: Logger;
}

/**
 * Runs interviews against a storage collaborator.
 *
 * @example
 * ```typescript
 * const engine = new InterviewEngine({ interviews, storage: new MemoryStorage() });
 * const started = await engine.start('registration', { target: 'meetup' });
 * let result = await engine.update(started.key);
 * result = await engine.update(result.key, { field_0: 'Ada' });
 * ```
 */
export class InterviewEngine {
  private readonly interviews: ReadonlyMap<string, Interview>;
  private readonly storage: InterviewStorage;
  private readonly logger: Logger;

  constructor(options: InterviewEngineOptions) {
    this.interviews = new Map(
      Array.from(options.interviews.values(), (interview): [string, Interview] => [
        interview.id,
        interview,
      ])
    );
    this.storage = options.storage;
    this.logger = options.logger ?? new Logger({ component: 'InterviewEngine' });
  }

  /** Ids of the interviews this engine can run. */
  get interviewIds(): string[] {
    return [...this.interviews.keys()];
  }

  private findInterview(interviewId: string): Interview {
    const interview = this.interviews.get(interviewId);
    if (interview === undefined) {
      throw new NotFoundError(`Unknown interview "${interviewId}"`);
    }
    return interview;
  }

  /**
   * Creates and stores the initial state of an interview. No step runs.
   *
   * @throws NotFoundError when the interview id is unknown.
   */
  async start(interviewId: string, options: StartOptions = {}): Promise<EngineResult> {
    return this.guard('start', { interviewId }, async () => {
      this.findInterview(interviewId);
      const state = createInitialState(options);
      const key = await this.storage.put({ interviewId, state });
      this.logger.info('interview_started', { interviewId, target: state.target });
      return { key, completed: false, status: 'running', content: null, data: state.data };
    });
  }

  /**
   * Applies responses to the pending question, if any, replays the steps
   * and stores the result under a new key.
   *
   * @param key - Key returned by the previous call.
   * @param responses - Response mapping (`field_0`, `field_1`, ...) for the pending question.
   * @throws NotFoundError when the key or its interview is unknown.
   * @throws ValidationError when the responses are rejected.
   */
  async update(key: string, responses?: unknown): Promise<EngineResult> {
    return this.guard('update', {}, async () => {
      if (!isValidKey(key)) {
        throw new NotFoundError(`Unknown interview key "${key}"`);
      }
      const record = await this.storage.get(key);
      if (record === undefined) {
        throw new NotFoundError(`Unknown interview key "${key}"`);
      }
      const interview = this.findInterview(record.interviewId);
      const outcome = updateInterview(createInterviewContext(interview, record.state), responses);
      const { state } = outcome.context;
      const nextKey = await this.storage.put({ interviewId: interview.id, state });

      this.logger.debug('interview_updated', {
        interviewId: interview.id,
        status: outcome.status,
        currentQuestionId: state.currentQuestionId,
        answered: state.answeredQuestionIds.length,
      });
      if (outcome.status === 'completed') {
        this.logger.info('interview_completed', { interviewId: interview.id });
      }

      return {
        key: nextKey,
        completed: state.completed,
        status: outcome.status,
        content: outcome.content,
        data: state.data,
      };
    });
  }

  /**
   * Logs a failed call and rethrows. Rejected input is a warning; anything
   * else is an error.
   */
  private async guard<T>(
    operation: string,
    details: Record<string, unknown>,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const failure = toError(error);
      const data = { operation, ...details, error: failure.name, message: failure.message };
      if (isUserError(error)) {
        this.logger.warn('interview_rejected', data);
      } else {
        this.logger.error('interview_failed', data);
      }
      throw error;
    }
  }
}
