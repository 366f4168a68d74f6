import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../../src/services/logger';
import type { LogEntry } from '../../src/services/logger';

describe('Logger', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('records nothing until enabled', () => {
    const log = new Logger();
    log.error('render', 'ignored');
    expect(log.enabled).toBe(false);
    expect(log.getEntries()).toEqual([]);
  });

  it('records an entry when enabled', () => {
    const log = new Logger();
    log.enable();
    expect(log.level).toBe('DEBUG');
    expect(log.getEntries().map((e) => e.message)).toEqual(['Logging enabled at DEBUG']);
  });

  it('logs enabling and disabling under the app category', () => {
    const log = new Logger();
    log.enable('INFO');
    log.disable();
    expect(log.getEntries().map((e) => [e.category, e.message])).toEqual([
      ['app', 'Logging enabled at INFO'],
      ['app', 'Logging disabled'],
    ]);
    expect(log.enabled).toBe(false);
  });

  it('drops entries below the threshold', () => {
    const log = new Logger();
    log.enable('WARN');
    log.debug('registry', 'too quiet');
    log.info('registry', 'still too quiet');
    log.warn('theme', 'kept');
    expect(log.getEntries().map((e) => e.message)).toEqual(['kept']);
  });

  it('filters entries by level and category', () => {
    const log = new Logger();
    log.enable();
    log.clear();
    log.debug('render', 'a');
    log.error('render', 'b');
    log.error('theme', 'c');
    expect(log.getEntries({ level: 'ERROR' }).map((e) => e.message)).toEqual(['b', 'c']);
    expect(log.getEntries({ category: 'render' }).map((e) => e.message)).toEqual(['a', 'b']);
  });

  it('serializes and truncates data payloads', () => {
    const log = new Logger();
    log.enable();
    log.clear();
    log.info('registry', 'object', { rules: 9 });
    log.info('render', 'long', 'x'.repeat(250));

    const [object, long] = log.getEntries();
    expect(object?.data).toBe('{"rules":9}');
    expect(long?.data).toBe(`${'x'.repeat(200)}… (250 chars)`);
  });

  it('redacts sensitive values in data payloads', () => {
    const log = new Logger();
    log.enable();
    log.clear();
    log.info('registry', 'config', { apiKey: 'test-secret', language: 'pest' });
    log.info('render', 'headers', '{"Authorization": "Bearer test-token"}');
    log.info('render', 'plain', { language: 'pest' });

    expect(log.getEntries().map((e) => e.data)).toEqual([
      '{"apiKey":"[REDACTED]","language":"pest"}',
      '{"Authorization": "[REDACTED]"}',
      '{"language":"pest"}',
    ]);
  });

  it('keeps only the most recent entries', () => {
    const log = new Logger();
    log.enable();
    for (let i = 0; i < 1005; i++) log.debug('registry', `m${i}`);

    const entries = log.getEntries();
    expect(entries).toHaveLength(1000);
    expect(entries[0]?.message).toBe('m5');
    expect(entries[999]?.message).toBe('m1004');
  });

  it('notifies listeners until they unsubscribe', () => {
    const log = new Logger();
    log.enable();
    const seen: LogEntry[] = [];
    const unsubscribe = log.onLog((entry) => seen.push(entry));

    log.info('render', 'first');
    unsubscribe();
    log.info('render', 'second');

    expect(seen.map((e) => e.message)).toEqual(['first']);
  });

  it('enables itself from the environment', () => {
    const fromEnv = new Logger();
    fromEnv.configureFromEnv({ PEST_HIGHLIGHT_LOG: 'info' });
    expect(fromEnv.level).toBe('INFO');

    const unset = new Logger();
    unset.configureFromEnv({});
    expect(unset.enabled).toBe(false);

    const unknown = new Logger();
    unknown.configureFromEnv({ PEST_HIGHLIGHT_LOG: 'verbose' });
    expect(unknown.enabled).toBe(false);
  });

  it('exports entries as text lines', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
    const log = new Logger();
    log.enable();
    log.clear();
    log.info('render', 'done', { fences: 1 });

    expect(log.exportAsText()).toBe('[2026-01-02T03:04:05.000Z] [INFO] [render] done | {"fences":1}');
  });
});
