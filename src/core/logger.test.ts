import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  errorMessage,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  describe('log entry structure', () => {
    it('emits level, component, msg and an ISO timestamp', () => {
      createLogger('lifecycle').info('container created');

      expect(entries).toHaveLength(1);
      const entry = entries[0];
      expect(entry.level).toBe('info');
      expect(entry.component).toBe('lifecycle');
      expect(entry.msg).toBe('container created');
      expect(new Date(entry.ts).toISOString()).toBe(entry.ts);
    });

    it('includes metadata when provided', () => {
      createLogger('proxy').info('rule failed', { path: '/chat', status: 502 });

      expect(entries[0].meta).toEqual({ path: '/chat', status: 502 });
    });

    it('omits meta when no metadata is provided', () => {
      createLogger('proxy').info('plain');

      expect(entries[0].meta).toBeUndefined();
    });
  });

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('core');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });
  });

  describe('field promotion', () => {
    it('promotes agent, container, duration_ms, ok and error_code', () => {
      createLogger('lifecycle').warn('start failed', {
        agent: 'agent-1',
        container: 'c-1',
        duration_ms: 42,
        ok: false,
        error_code: 'RUNTIME_OPERATION_FAILED',
        detail: 'boom',
      });

      const entry = entries[0];
      expect(entry.agent).toBe('agent-1');
      expect(entry.container).toBe('c-1');
      expect(entry.duration_ms).toBe(42);
      expect(entry.ok).toBe(false);
      expect(entry.error_code).toBe('RUNTIME_OPERATION_FAILED');
      expect(entry.meta).toEqual({ detail: 'boom' });
    });

    it('ignores promoted keys with the wrong type', () => {
      createLogger('core').info('odd', { duration_ms: 'slow' });

      expect(entries[0].duration_ms).toBeUndefined();
      expect(entries[0].meta).toBeUndefined();
    });
  });

  describe('context', () => {
    it('withContext binds agent and container to every entry', () => {
      const logger = createLogger('lifecycle').withContext({ agent: 'a-9' });
      logger.info('one');
      logger.withContext({ container: 'c-9' }).info('two');

      expect(entries[0].agent).toBe('a-9');
      expect(entries[0].container).toBeUndefined();
      expect(entries[1].agent).toBe('a-9');
      expect(entries[1].container).toBe('c-9');
    });

    it('child appends a sub-component', () => {
      createLogger('runtime').child('docker').info('exec');

      expect(entries[0].component).toBe('runtime:docker');
    });
  });

  describe('sanitization', () => {
    it('never logs deny-listed keys', () => {
      expect(NEVER_LOG_FIELDS.has('LLM_API_KEY')).toBe(true);

      createLogger('core').info('spec', {
        env: { LLM_API_KEY: 'test-secret' },
        llm_api_key: 'test-secret',
        image: 'agentdock/agent:latest',
      });

      expect(entries[0].meta).toEqual({ image: 'agentdock/agent:latest' });
    });

    it('truncates long strings', () => {
      const long = 'x'.repeat(META_STRING_MAX_LENGTH + 10);
      createLogger('core').info('long', { stderr: long });

      const meta = entries[0].meta;
      expect(meta?.['stderr']).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes Error values', () => {
      const err = new Error('exploded');
      createLogger('core').error('failure', { error: err });

      expect(entries[0].meta?.['error']).toEqual({
        name: 'Error',
        message: 'exploded',
        stack: err.stack,
      });
    });
  });

  describe('errorMessage', () => {
    it('uses the message of an Error', () => {
      expect(errorMessage(new Error('bad'))).toBe('bad');
    });

    it('stringifies anything else', () => {
      expect(errorMessage(404)).toBe('404');
    });
  });
});
