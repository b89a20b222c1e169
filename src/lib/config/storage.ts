// Settings loading: defaults < JSON config file < environment variables
import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { AppSettings } from './settings';
import { DEFAULT_SETTINGS } from './settings';

const log = getLogger({ module: 'SettingsStorage' });

type Env = Record<string, string | undefined>;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const AppSettingsSchema: z.ZodType<AppSettings, z.ZodTypeDef, unknown> = z.object({
  app: z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(0).max(65535),
  }),
  defaultRegion: z.string().trim().min(1),
  broker: z.object({
    driver: z.enum(['amqp', 'memory']),
    url: z.string().min(1),
    taskQueue: z.string().min(1),
    resultQueue: z.string().min(1),
    prefetch: z.coerce.number().int().positive(),
  }),
  store: z.object({
    driver: z.enum(['sqlite', 'redis']),
    sqlitePath: z.string().min(1),
    redisUrl: z.string().min(1),
    keyPrefix: z.string(),
  }),
  crawler: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.coerce.number().int().positive(),
  }),
  alerts: z.object({
    telegram: z.object({
      botToken: z.string().optional(),
      chatId: z.string().optional(),
    }).optional(),
  }),
  log: z.object({
    level: LogLevelSchema,
  }),
});

// Shape of the optional JSON config file: every key may be omitted
const ConfigFileSchema = z.object({
  app: z.record(z.string(), z.unknown()).optional(),
  defaultRegion: z.unknown().optional(),
  broker: z.record(z.string(), z.unknown()).optional(),
  store: z.record(z.string(), z.unknown()).optional(),
  crawler: z.record(z.string(), z.unknown()).optional(),
  alerts: z.object({
    telegram: z.record(z.string(), z.unknown()).optional(),
  }).optional(),
  log: z.record(z.string(), z.unknown()).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * First defined value wins: environment, then config file, then default
 */
function pickSetting(envValue: string | undefined, fileValue: unknown, fallback: unknown): unknown {
  if (envValue !== undefined && envValue !== '') return envValue;
  if (fileValue !== undefined && fileValue !== null) return fileValue;
  return fallback;
}

/**
 * Read and shape-check the JSON config file, if one is configured
 */
export function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in configuration file ${path}`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration file ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Load application settings.
 * CRAWL_CONFIG_PATH names an optional JSON file; environment variables override it.
 */
export function loadSettings(env: Env = process.env): AppSettings {
  const file: ConfigFile = env.CRAWL_CONFIG_PATH ? readConfigFile(env.CRAWL_CONFIG_PATH) : {};
  const d = DEFAULT_SETTINGS;

  const candidate = {
    app: {
      host: pickSetting(env.HOST, file.app?.host, d.app.host),
      port: pickSetting(env.PORT, file.app?.port, d.app.port),
    },
    defaultRegion: pickSetting(env.DEFAULT_REGION, file.defaultRegion, d.defaultRegion),
    broker: {
      driver: pickSetting(env.BROKER_DRIVER, file.broker?.driver, d.broker.driver),
      url: pickSetting(env.RABBITMQ_URL, file.broker?.url, d.broker.url),
      taskQueue: pickSetting(env.TASK_QUEUE, file.broker?.taskQueue, d.broker.taskQueue),
      resultQueue: pickSetting(env.RESULT_QUEUE, file.broker?.resultQueue, d.broker.resultQueue),
      prefetch: pickSetting(env.BROKER_PREFETCH, file.broker?.prefetch, d.broker.prefetch),
    },
    store: {
      driver: pickSetting(env.STORE_DRIVER, file.store?.driver, d.store.driver),
      sqlitePath: pickSetting(env.SQLITE_PATH, file.store?.sqlitePath, d.store.sqlitePath),
      redisUrl: pickSetting(env.REDIS_URL, file.store?.redisUrl, d.store.redisUrl),
      keyPrefix: pickSetting(env.REDIS_KEY_PREFIX, file.store?.keyPrefix, d.store.keyPrefix),
    },
    crawler: {
      baseUrl: pickSetting(env.CRAWLER_BASE_URL, file.crawler?.baseUrl, d.crawler.baseUrl),
      timeoutMs: pickSetting(env.CRAWLER_TIMEOUT_MS, file.crawler?.timeoutMs, d.crawler.timeoutMs),
    },
    alerts: {
      telegram: {
        botToken: pickSetting(env.TELEGRAM_BOT_TOKEN, file.alerts?.telegram?.botToken, undefined),
        chatId: pickSetting(env.TELEGRAM_CHAT_ID, file.alerts?.telegram?.chatId, undefined),
      },
    },
    log: {
      level: pickSetting(env.LOG_LEVEL, file.log?.level, d.log.level),
    },
  };

  const parsed = AppSettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    log.error({ issues }, 'invalid settings');
    throw new ConfigError(`Invalid settings: ${issues}`);
  }

  return parsed.data;
}
