import * as dotenv from 'dotenv';
import { z } from 'zod';
import { SOURCE_TYPES, SourceType } from './core/entities/CandidateRecord.js';
import { ConfigError } from './core/errors.js';
import { TargetLimit } from './infrastructure/ratelimit/RateLimiter.js';
import { LogLevel } from './utils/logger.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    logLevel: LogLevel;
  };
  rateLimit: {
    maxConcurrentPerTarget: number;
    requestsPerSecondPerTarget: number;
    overrides: Record<string, Partial<TargetLimit>>;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;
  };
  orchestrator: {
    maxStrategiesPerJob: number;
    maxJobDurationMs: number;
    maxParallelStrategies: number;
    strategyTimeoutMs: number;
    coverageThreshold: number;
    minSourceTypes: number;
  };
  matching: {
    fuzzyMatchThreshold: number;
    sourcePriorityOrder: SourceType[];
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  jobQueue: {
    maxConcurrentJobs: number;
  };
  database: {
    path: string;
  };
  http: {
    userAgent: string;
  };
}

// Targets with published fair-access limits
const DEFAULT_TARGET_OVERRIDES: Record<string, Partial<TargetLimit>> = {
  sec: { maxConcurrent: 2, requestsPerSecond: 5 },
  wikidata: { maxConcurrent: 2, requestsPerSecond: 2 },
};

const millis = (max: number) => z.number().int().min(0).max(max);

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),
  rateLimit: z.object({
    maxConcurrentPerTarget: z.number().int().min(1).max(100),
    requestsPerSecondPerTarget: z.number().positive().max(1000),
    overrides: z.record(
      z.object({
        maxConcurrent: z.number().int().min(1).optional(),
        requestsPerSecond: z.number().positive().optional(),
      })
    ),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(20),
    baseDelayMs: millis(600_000),
    maxDelayMs: millis(3_600_000),
    requestTimeoutMs: z.number().int().min(100).max(600_000),
  }),
  orchestrator: z.object({
    maxStrategiesPerJob: z.number().int().min(1).max(50),
    maxJobDurationMs: z.number().int().min(1000),
    maxParallelStrategies: z.number().int().min(1).max(20),
    strategyTimeoutMs: z.number().int().min(1000),
    coverageThreshold: z.number().int().min(0).max(100),
    minSourceTypes: z.number().int().min(1).max(SOURCE_TYPES.length),
  }),
  matching: z.object({
    fuzzyMatchThreshold: z.number().gt(0, 'Fuzzy threshold must be above 0').max(1),
    sourcePriorityOrder: z
      .array(z.enum(SOURCE_TYPES))
      .min(1, 'At least 1 source type is required')
      .refine((order) => new Set(order).size === order.length, 'Source types must not repeat'),
  }),
  cache: z.object({
    ttlMs: z.number().int().min(0),
    maxEntries: z.number().int().min(1),
  }),
  jobQueue: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(10),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  http: z.object({
    userAgent: z.string().min(1, 'A User-Agent is required'),
  }),
});

type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --max-concurrent-jobs 1 --fuzzy-match-threshold 0.9 --debug
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const [key, inline] = arg.slice(2).split(/=(.*)/s);

      if (inline !== undefined) {
        args[key] = inline;
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment, then defaults.
 * Throws ConfigError listing every invalid option.
 */
export function getConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  const raw = (cliKey: string, envKey: string): string | boolean | undefined => {
    const cli = cliArgs[cliKey];
    if (cli !== undefined) return cli;
    const value = env[envKey];
    return value === undefined || value === '' ? undefined : value;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' ? value.trim() : defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const value = raw(cliKey, envKey);
    if (value === undefined) return defaultValue;
    return value === true || value === 'true';
  };

  // NaN fails validation below with the option's path
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = raw(cliKey, envKey);
    return typeof value === 'string' ? Number(value) : defaultValue;
  };

  const getSecondsAsMs = (cliKey: string, envKey: string, defaultSeconds: number): number =>
    Math.round(getNumber(cliKey, envKey, defaultSeconds) * 1000);

  const getStringArray = (cliKey: string, envKey: string, defaultValue: readonly string[]): string[] => {
    const value = raw(cliKey, envKey);
    if (typeof value !== 'string') return [...defaultValue];
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const debug = getBoolean('debug', 'DEBUG', false);

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'entity-research-engine'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug,
      logLevel: getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info').toLowerCase(),
    },
    rateLimit: {
      maxConcurrentPerTarget: getNumber('max-concurrent-per-target', 'MAX_CONCURRENT_PER_TARGET', 3),
      requestsPerSecondPerTarget: getNumber('requests-per-second-per-target', 'REQUESTS_PER_SECOND_PER_TARGET', 1),
      overrides: DEFAULT_TARGET_OVERRIDES,
    },
    retry: {
      maxAttempts: getNumber('max-attempts', 'MAX_ATTEMPTS', 3),
      baseDelayMs: getSecondsAsMs('base-delay-seconds', 'BASE_DELAY_SECONDS', 1),
      maxDelayMs: getSecondsAsMs('max-delay-seconds', 'MAX_DELAY_SECONDS', 60),
      requestTimeoutMs: getSecondsAsMs('request-timeout-seconds', 'REQUEST_TIMEOUT_SECONDS', 30),
    },
    orchestrator: {
      maxStrategiesPerJob: getNumber('max-strategies-per-job', 'MAX_STRATEGIES_PER_JOB', 5),
      maxJobDurationMs: getSecondsAsMs('max-job-duration-seconds', 'MAX_JOB_DURATION_SECONDS', 600),
      maxParallelStrategies: getNumber('max-parallel-strategies', 'MAX_PARALLEL_STRATEGIES', 3),
      strategyTimeoutMs: getSecondsAsMs('strategy-timeout-seconds', 'STRATEGY_TIMEOUT_SECONDS', 180),
      coverageThreshold: getNumber('coverage-threshold', 'COVERAGE_THRESHOLD', 80),
      minSourceTypes: getNumber('min-source-types', 'MIN_SOURCE_TYPES', 2),
    },
    matching: {
      fuzzyMatchThreshold: getNumber('fuzzy-match-threshold', 'FUZZY_MATCH_THRESHOLD', 0.85),
      sourcePriorityOrder: getStringArray('source-priority-order', 'SOURCE_PRIORITY_ORDER', SOURCE_TYPES),
    },
    cache: {
      ttlMs: getSecondsAsMs('cache-ttl-seconds', 'CACHE_TTL_SECONDS', 3600),
      maxEntries: getNumber('cache-max-entries', 'CACHE_MAX_ENTRIES', 1000),
    },
    jobQueue: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'data/research.db'),
    },
    http: {
      userAgent: getString('user-agent', 'USER_AGENT', 'entity-research-engine/1.0 (research@example.com)'),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`));
  }
  return result.data;
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  const { rateLimit, retry, orchestrator, matching, cache, jobQueue } = config;

  console.error('─'.repeat(68));
  console.error(`Entity research engine: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`Database: ${config.database.path}`);
  console.error(
    `Rate limit: ${rateLimit.maxConcurrentPerTarget} concurrent, ${rateLimit.requestsPerSecondPerTarget} req/s per target` +
      ` (overrides: ${Object.keys(rateLimit.overrides).join(', ') || 'none'})`
  );
  console.error(
    `Retry: ${retry.maxAttempts}x (${retry.baseDelayMs}-${retry.maxDelayMs}ms) | request timeout ${retry.requestTimeoutMs}ms`
  );
  console.error(
    `Jobs: ${jobQueue.maxConcurrentJobs} concurrent | ${orchestrator.maxParallelStrategies} strategies in parallel` +
      ` | budget ${orchestrator.maxStrategiesPerJob} strategies / ${orchestrator.maxJobDurationMs}ms`
  );
  console.error(
    `Stop at ${orchestrator.coverageThreshold}% coverage from ${orchestrator.minSourceTypes}+ source types` +
      ` | fuzzy match ≥ ${matching.fuzzyMatchThreshold}`
  );
  console.error(`Source priority: ${matching.sourcePriorityOrder.join(' > ')}`);
  console.error(`Cache: ${cache.maxEntries} entries, TTL ${cache.ttlMs}ms`);
  console.error('─'.repeat(68));
}
