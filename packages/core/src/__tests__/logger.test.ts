import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  QueryLaneLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
} from '../observability/logger.js';

function collect(config: Parameters<typeof createLogger>[0] = {}): {
  logger: QueryLaneLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = createLogger({ ...config, handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('QueryLaneLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      expect(createLogger({ module: 'test' })).toBeInstanceOf(QueryLaneLogger);
    });

    it('should prefix child module names', () => {
      const parent = createLogger({ module: 'app' });
      expect(parent.child('cache').moduleName).toBe('app:cache');
      expect(parent.child('cache').child('gc').moduleName).toBe('app:cache:gc');
    });

    it('should default the module name', () => {
      expect(createLogger().moduleName).toBe('querylane');
    });

    it('should pass the handler on to children', () => {
      const { logger, entries } = collect({ module: 'app' });
      logger.child('query').info('hello');
      expect(entries).toHaveLength(1);
      expect(entries[0]?.module).toBe('app:query');
    });
  });

  describe('log levels', () => {
    it('should skip debug at the default level', () => {
      const { logger, entries } = collect();
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');
      expect(entries.map((entry) => entry.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const { logger, entries } = collect({ level: 'debug' });
      logger.debug('debug msg');
      expect(entries).toHaveLength(1);
    });

    it('should only emit errors at error level', () => {
      const { logger, entries } = collect({ level: 'error' });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
    });

    it('should treat debug: true as level debug', () => {
      const { logger, entries } = collect({ level: 'error', debug: true });
      logger.debug('shown');
      expect(entries).toHaveLength(1);
    });
  });

  describe('debug mode', () => {
    it('should toggle global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
      setDebugMode(false);
      expect(isDebugMode()).toBe(false);
    });

    it('should override level when debug mode is on', () => {
      const { logger, entries } = collect({ level: 'error' });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should describe Error instances in the context', () => {
      const { logger, entries } = collect();
      logger.error('failed', new TypeError('bad input'), { key: 'todos' });

      const context = entries[0]?.context;
      expect(context?.['key']).toBe('todos');
      expect(context?.['error']).toMatchObject({ name: 'TypeError', message: 'bad input' });
    });

    it('should stringify non-Error values', () => {
      const { logger, entries } = collect();
      logger.error('failed', 'plain string');
      expect(entries[0]?.context?.['error']).toEqual({ name: 'NonError', message: 'plain string' });
    });

    it('should omit the context when there is none', () => {
      const { logger, entries } = collect();
      logger.info('bare');
      expect(entries[0]).not.toHaveProperty('context');
    });
  });

  describe('time', () => {
    it('should log the duration at debug level', () => {
      const { logger, entries } = collect({ level: 'debug' });
      const end = logger.time('fetch');
      end({ key: 'todos' });

      expect(entries).toHaveLength(1);
      expect(entries[0]?.message).toBe('fetch completed');
      expect(entries[0]?.context?.['key']).toBe('todos');
      expect(entries[0]?.context?.['durationMs']).toBeGreaterThanOrEqual(0);
    });
  });

  describe('console output', () => {
    it('should stay silent without handler, json or debug mode', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      createLogger({ module: 'quiet' }).info('nothing');
      expect(spy).not.toHaveBeenCalled();
    });

    it('should write JSON lines when configured', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      createLogger({ module: 'test', json: true }).info('json test');

      expect(spy).toHaveBeenCalledTimes(1);
      const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ level: 'info', message: 'json test', module: 'test' });
    });

    it('should route warnings to console.warn', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      createLogger({ json: true }).warn('careful');
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });
});
