/**
 * Tests for the InterviewEngine programmatic API.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotFoundError, StorageError, ValidationError } from '../errors.js';
import type { QuestionTemplate } from '../fields/question.js';
import { ALWAYS } from '../logic/condition.js';
import { ExpressionEnvironment } from '../logic/environment.js';
import { parsePointer } from '../pointer/parser.js';
import { MemoryStorage } from '../storage/memory.js';
import type { InterviewStorage, StoredInterview } from '../storage/types.js';
import { Logger } from '../utils/logger.js';
import { InterviewEngine } from './engine.js';
import type { Interview } from './types.js';

const env = new ExpressionEnvironment();

const nameQuestion: QuestionTemplate = {
  id: 'name',
  title: env.compileTemplate('Welcome to {{ event }}'),
  when: ALWAYS,
  fields: [
    {
      pointer: parsePointer('person.name'),
      field: { type: 'text', optional: false, min: 1, max: 50 },
    },
  ],
};

const interview: Interview = {
  id: 'registration',
  questions: new Map([['name', nameQuestion]]),
  steps: [
    { type: 'ask', questionId: 'name', when: ALWAYS },
    {
      type: 'set',
      pointer: parsePointer('person.greeting'),
      value: { type: 'template', template: env.compileTemplate('Hello {{ person.name }}') },
      when: ALWAYS,
    },
  ],
};

function silenceStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

function logEvents(spy: { mock: { calls: unknown[][] } }): Array<{ level: string; event: string }> {
  return spy.mock.calls.map((call) => {
    const parsed: unknown = JSON.parse(String(call[0]));
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('Expected a log entry');
    }
    return {
      level: 'level' in parsed ? String(parsed.level) : '',
      event: 'event' in parsed ? String(parsed.event) : '',
    };
  });
}

describe('InterviewEngine', () => {
  let stderr: ReturnType<typeof silenceStderr>;
  let storage: MemoryStorage;
  let engine: InterviewEngine;

  beforeEach(() => {
    stderr = silenceStderr();
    storage = new MemoryStorage();
    engine = new InterviewEngine({
      interviews: [interview],
      storage,
      logger: new Logger({ component: 'InterviewEngine', debugMode: true }),
    });
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it('should list the interviews it can run', () => {
    expect(engine.interviewIds).toEqual(['registration']);
  });

  describe('start', () => {
    it('should store the initial state and run no step', async () => {
      const result = await engine.start('registration', {
        target: 'meetup-7',
        context: { event: 'Meetup' },
      });
      expect(result).toMatchObject({ completed: false, status: 'running', content: null, data: {} });

      const stored = await storage.get(result.key);
      expect(stored?.interviewId).toBe('registration');
      expect(stored?.state).toMatchObject({
        target: 'meetup-7',
        context: { event: 'Meetup' },
        currentQuestionId: null,
        answeredQuestionIds: [],
      });
    });

    it('should reject unknown interviews', async () => {
      await expect(engine.start('missing')).rejects.toThrow(
        new NotFoundError('Unknown interview "missing"')
      );
      expect(storage.size).toBe(0);
    });
  });

  describe('update', () => {
    it('should run an interview to completion', async () => {
      const started = await engine.start('registration', { context: { event: 'Meetup' } });

      const asked = await engine.update(started.key);
      expect(asked.status).toBe('awaiting_answer');
      expect(asked.content).toMatchObject({
        type: 'question',
        question: { id: 'name', title: 'Welcome to Meetup', fieldNames: ['field_0'] },
      });
      expect(asked.key).not.toBe(started.key);

      const done = await engine.update(asked.key, { field_0: '  Ada ' });
      expect(done).toMatchObject({
        completed: true,
        status: 'completed',
        content: null,
        data: { person: { name: 'Ada', greeting: 'Hello Ada' } },
      });
    });

    it('should leave earlier snapshots usable', async () => {
      const started = await engine.start('registration', { context: { event: 'Meetup' } });
      const asked = await engine.update(started.key);
      await engine.update(asked.key, { field_0: 'Ada' });

      const retry = await engine.update(asked.key, { field_0: 'Grace' });
      expect(retry.data).toEqual({ person: { name: 'Grace', greeting: 'Hello Grace' } });
    });

    it('should reject unknown and malformed keys', async () => {
      await expect(engine.update('AAAAAAAAAAAAAAAAAAAAAAAA')).rejects.toBeInstanceOf(NotFoundError);
      await expect(engine.update('../etc/passwd')).rejects.toThrow(
        'Unknown interview key "../etc/passwd"'
      );
    });

    it('should reject records of interviews it does not know', async () => {
      const key = await storage.put({
        interviewId: 'retired',
        state: {
          version: '1.0.0',
          data: {},
          context: {},
          answeredQuestionIds: [],
          currentQuestionId: null,
          target: null,
          completed: false,
        },
      });
      await expect(engine.update(key)).rejects.toThrow('Unknown interview "retired"');
    });

    it('should store nothing and warn when responses are rejected', async () => {
      const started = await engine.start('registration', { context: { event: 'Meetup' } });
      const asked = await engine.update(started.key);
      const before = storage.size;

      await expect(engine.update(asked.key, { field_0: 42 })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(storage.size).toBe(before);
      expect(logEvents(stderr)).toContainEqual({ level: 'warn', event: 'interview_rejected' });
    });

    it('should log storage failures as errors', async () => {
      const failing: InterviewStorage = {
        put: (_record: StoredInterview) => Promise.resolve('AAAAAAAAAAAAAAAAAAAA'),
        get: () => Promise.reject(new StorageError('disk unavailable', 'file_error')),
      };
      const broken = new InterviewEngine({ interviews: [interview], storage: failing });

      await expect(broken.update('AAAAAAAAAAAAAAAAAAAA')).rejects.toThrow('disk unavailable');
      expect(logEvents(stderr)).toContainEqual({ level: 'error', event: 'interview_failed' });
    });
  });

  it('should log lifecycle events', async () => {
    const started = await engine.start('registration', { context: { event: 'Meetup' } });
    const asked = await engine.update(started.key);
    await engine.update(asked.key, { field_0: 'Ada' });

    expect(logEvents(stderr).map((entry) => entry.event)).toEqual([
      'interview_started',
      'interview_updated',
      'interview_updated',
      'interview_completed',
    ]);
  });
});
