import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '~/lib/errors';
import { DEFAULT_SETTINGS } from './settings';
import { loadSettings } from './storage';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'crawl-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'config.json');
    writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('returns the defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({ ...DEFAULT_SETTINGS, alerts: { telegram: {} } });
  });

  it('lets the config file override defaults and the environment override the file', () => {
    const file = writeConfig({
      defaultRegion: 'US',
      broker: { taskQueue: 'file.task', prefetch: 4 },
      store: { driver: 'redis' },
    });

    const settings = loadSettings({ CRAWL_CONFIG_PATH: file, TASK_QUEUE: 'env.task', PORT: '9000' });

    expect(settings.defaultRegion).toBe('US');
    expect(settings.broker.taskQueue).toBe('env.task');
    expect(settings.broker.prefetch).toBe(4);
    expect(settings.store.driver).toBe('redis');
    expect(settings.app.port).toBe(9000);
  });

  it('reads Telegram credentials from the environment', () => {
    const settings = loadSettings({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '42' });
    expect(settings.alerts.telegram).toEqual({ botToken: 'test-token', chatId: '42' });
  });

  it('accepts every documented log level, silent included', () => {
    expect(loadSettings({ LOG_LEVEL: 'silent' }).log.level).toBe('silent');
    expect(loadSettings({ LOG_LEVEL: 'debug' }).log.level).toBe('debug');
    expect(() => loadSettings({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ BROKER_DRIVER: 'kafka' })).toThrow(ConfigError);
    expect(() => loadSettings({ PORT: 'eighty' })).toThrow(ConfigError);
  });

  it('rejects a missing or malformed config file', () => {
    expect(() => loadSettings({ CRAWL_CONFIG_PATH: path.join(dir, 'absent.json') })).toThrow(ConfigError);

    const file = path.join(dir, 'broken.json');
    writeFileSync(file, '{ not json');
    expect(() => loadSettings({ CRAWL_CONFIG_PATH: file })).toThrow(ConfigError);
  });
});
