import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_GEMINI_API_URL } from './infrastructure/http/GeminiApiClient.js';

// Load environment variables from .env file
dotenv.config();

const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  cache: z.object({
    driver: z.enum(['redis', 'memory', 'none']),
    url: z.string().url('Invalid cache URL format'),
    ttlSeconds: z.number().int().min(1),
  }),
  generator: z.object({
    apiUrl: z.string().url('Invalid generator URL format'),
    apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
    timeoutMs: z.number().int().min(100).max(300000),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().min(1),
    retryAttempts: z.number().int().min(1).max(10),
  }),
  chat: z.object({
    contextLimit: z.number().int().min(0),
    historyLimit: z.number().int().min(0),
    displayLimit: z.number().int().min(1),
    aiUserId: z.string().min(1).nullable(),
    deferReplies: z.boolean(),
  }),
  jobQueue: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(16),
    retentionHours: z.number().min(0),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigSource = Record<string, string | boolean | undefined>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --cache-driver memory --debug
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): ConfigSource {
  const args: ConfigSource = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const key = arg.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }

  return args;
}

/**
 * Build and validate configuration. CLI flags win over environment variables,
 * which win over defaults. Throws ConfigError listing every invalid field.
 */
export function parseConfig(cliArgs: ConfigSource, env: ConfigSource): Config {
  const raw = (cliKey: string, envKey: string): string | boolean | undefined => {
    const fromCli = cliArgs[cliKey];
    if (fromCli !== undefined) return fromCli;
    const fromEnv = env[envKey];
    return fromEnv === '' ? undefined : fromEnv;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' ? value : defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const value = raw(cliKey, envKey);
    if (value === undefined) return defaultValue;
    return value === true || value === 'true' || value === '1';
  };

  // NaN fails the schema's number checks, so garbage is reported, not defaulted
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' ? Number(value) : defaultValue;
  };

  const aiUserId = raw('ai-user-id', 'AI_USER_ID');

  const result = ConfigSchema.safeParse({
    server: {
      name: getString('server-name', 'SERVER_NAME', 'room-chat'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      port: getNumber('port', 'PORT', 8000),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'chat.db'),
    },
    cache: {
      driver: getString('cache-driver', 'CACHE_DRIVER', 'redis'),
      url: getString('cache-url', 'CACHE_URL', 'redis://localhost:6379/0'),
      ttlSeconds: getNumber('cache-ttl', 'CACHE_TTL_SECONDS', 60),
    },
    generator: {
      apiUrl: getString('gemini-url', 'GEMINI_API_URL', DEFAULT_GEMINI_API_URL),
      apiKey: getString('gemini-api-key', 'GEMINI_API_KEY', ''),
      timeoutMs: getNumber('generator-timeout', 'GENERATOR_TIMEOUT_MS', 30000),
      temperature: getNumber('temperature', 'GENERATOR_TEMPERATURE', 0.2),
      maxOutputTokens: getNumber('max-output-tokens', 'GENERATOR_MAX_OUTPUT_TOKENS', 512),
      retryAttempts: getNumber('retry-attempts', 'GENERATOR_RETRY_ATTEMPTS', 1),
    },
    chat: {
      contextLimit: getNumber('context-limit', 'CONTEXT_LIMIT', 10),
      historyLimit: getNumber('history-limit', 'HISTORY_LIMIT', 5),
      displayLimit: getNumber('display-limit', 'DISPLAY_LIMIT', 50),
      aiUserId: typeof aiUserId === 'string' ? aiUserId : null,
      deferReplies: getBoolean('defer-replies', 'DEFER_REPLIES', false),
    },
    jobQueue: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
      retentionHours: getNumber('job-retention-hours', 'JOB_RETENTION_HOURS', 24),
    },
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Get configuration from CLI arguments and the environment.
 * Exits the process when validation fails.
 */
export function getConfig(): Config {
  try {
    return parseConfig(parseArgs(), process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('\nConfiguration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
      console.error('\nTips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - GEMINI_API_KEY must be set');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary. Secrets are never printed.
 */
export function printConfigInfo(config: Config): void {
  console.error(`\n[Config] ${config.server.name} v${config.server.version}${config.server.debug ? ' (debug)' : ''}`);
  console.error(`[Config] HTTP port: ${config.server.port}`);
  console.error(`[Config] Database: ${config.database.path}`);
  console.error(`[Config] Cache: ${config.cache.driver} (ttl ${config.cache.ttlSeconds}s)`);
  console.error(
    `[Config] Generator: timeout ${config.generator.timeoutMs}ms, ${config.generator.retryAttempts} attempt(s)`
  );
  console.error(
    `[Config] Context: ${config.chat.contextLimit} messages, ${config.chat.historyLimit} sent to generator`
  );
  console.error(
    `[Config] Replies: ${config.chat.deferReplies ? 'deferred' : 'inline'} | Queue: ${config.jobQueue.maxConcurrentJobs} concurrent, ${config.jobQueue.retentionHours}h retention`
  );
}
