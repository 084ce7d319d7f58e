import fs from 'fs-extra';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AppError, ErrorType } from '../utils/errors';

// Load environment variables from .env file
dotenv.config();

export const CONFIG_FILE = 'sms-ledger.json';

const configSchema = z.object({
  ownerId: z.string().min(1),
  dbPath: z.string().min(1),
  remote: z
    .object({
      baseUrl: z.string().url(),
      token: z.string().optional(),
      timeoutMs: z.number().int().positive(),
    })
    .optional(),
  sync: z.object({
    maxAttempts: z.number().int().positive(),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
    drainIntervalMs: z.number().int().positive(),
  }),
  dedup: z.object({
    retentionDays: z.number().positive(),
  }),
  validation: z.object({
    maxAmount: z.number().positive(),
    minAmountWarning: z.number().nonnegative(),
    maxAgeDays: z.number().int().positive(),
    ageWarningDays: z.number().int().nonnegative(),
    minConfidenceWarning: z.number().min(0).max(1),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  ownerId: 'local',
  dbPath: path.join('data', 'sms-ledger.db'),
  sync: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    drainIntervalMs: 60000,
  },
  dedup: {
    retentionDays: 90,
  },
  validation: {
    maxAmount: 10_000_000,
    minAmountWarning: 1,
    maxAgeDays: 90,
    ageWarningDays: 5,
    minConfidenceWarning: 0.5,
  },
};

const DEFAULT_REMOTE_TIMEOUT_MS = 10000;

const fileSchema = z
  .object({
    ownerId: z.string(),
    dbPath: z.string(),
    remote: z.object({ baseUrl: z.string(), token: z.string(), timeoutMs: z.number() }).partial(),
    sync: configSchema.shape.sync.partial(),
    dedup: configSchema.shape.dedup.partial(),
    validation: configSchema.shape.validation.partial(),
  })
  .partial();

type FileConfig = z.infer<typeof fileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function readConfigFile(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = fs.readJsonSync(configPath);
  } catch (error) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `${path.basename(configPath)} is not valid JSON`,
      context: { configPath },
      originalError: error,
    });
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Invalid ${path.basename(configPath)}: ${describeIssues(parsed.error)}`,
      context: { configPath },
    });
  }
  return parsed.data;
}

// A blank line such as `SMS_LEDGER_REMOTE_URL=` in .env means unset
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load configuration: defaults, then sms-ledger.json in the working
 * directory, then SMS_LEDGER_* environment variables.
 */
export function loadConfig(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = readConfigFile(path.join(cwd, CONFIG_FILE));

  const remoteUrl = envValue(env, 'SMS_LEDGER_REMOTE_URL') ?? file.remote?.baseUrl;
  const merged = {
    ownerId: envValue(env, 'SMS_LEDGER_OWNER_ID') ?? file.ownerId ?? DEFAULT_CONFIG.ownerId,
    dbPath: path.resolve(cwd, envValue(env, 'SMS_LEDGER_DB_PATH') ?? file.dbPath ?? DEFAULT_CONFIG.dbPath),
    remote: remoteUrl
      ? {
          baseUrl: remoteUrl,
          token: envValue(env, 'SMS_LEDGER_REMOTE_TOKEN') ?? file.remote?.token,
          timeoutMs: file.remote?.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS,
        }
      : undefined,
    sync: { ...DEFAULT_CONFIG.sync, ...file.sync },
    dedup: { ...DEFAULT_CONFIG.dedup, ...file.dedup },
    validation: { ...DEFAULT_CONFIG.validation, ...file.validation },
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Invalid configuration: ${describeIssues(parsed.error)}`,
      context: { cwd },
    });
  }
  return parsed.data;
}

/**
 * Create a template sms-ledger.json config file
 */
export function createConfigTemplate(cwd: string = process.cwd()): string {
  const configPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(configPath)) {
    console.log(`Config already exists at ${configPath}, leaving it untouched.`);
    return configPath;
  }

  const template = {
    ownerId: 'YOUR_USER_ID',
    dbPath: DEFAULT_CONFIG.dbPath,
    remote: {
      baseUrl: 'https://example.com/api',
      token: 'YOUR_API_TOKEN',
      timeoutMs: DEFAULT_REMOTE_TIMEOUT_MS,
    },
    sync: DEFAULT_CONFIG.sync,
    dedup: DEFAULT_CONFIG.dedup,
    validation: DEFAULT_CONFIG.validation,
  };

  fs.writeJsonSync(configPath, template, { spaces: 2 });
  console.log(`Created template config at ${configPath}`);
  console.log('Update ownerId and the remote settings, or remove "remote" to keep everything local.');
  return configPath;
}
