import type { AppConfig, BackendConfig, LogLevel, OrphanPolicy } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
const ORPHAN_POLICIES = ['retain', 'remove'] as const;

const backendSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ollama'), baseUrl: z.string() }),
  z.object({ type: z.literal('openai-compatible'), baseUrl: z.string(), apiKey: z.string().optional() }),
]);

const fileConfigSchema = z
  .object({
    api: z.object({ port: z.number().int(), host: z.string() }).partial(),
    broker: z
      .object({
        providerTtlMs: z.number(),
        defaultWaitTimeoutMs: z.number(),
        maxWaitTimeoutMs: z.number(),
        orphanPolicy: z.enum(ORPHAN_POLICIES),
      })
      .partial(),
    provider: z
      .object({
        brokerUrl: z.string(),
        providerId: z.string(),
        pollIntervalMs: z.number(),
        modelRefreshIntervalMs: z.number(),
        kinds: z.array(z.string()),
        backend: backendSchema,
      })
      .partial(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

interface ConfigOverrides {
  api?: Partial<AppConfig['api']>;
  broker?: Partial<AppConfig['broker']>;
  provider?: Partial<AppConfig['provider']>;
  logLevel?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isOrphanPolicy(value: string): value is OrphanPolicy {
  return (ORPHAN_POLICIES as readonly string[]).includes(value);
}

function merge(base: AppConfig, override: ConfigOverrides | FileConfig): AppConfig {
  return {
    api: { ...base.api, ...override.api },
    broker: { ...base.broker, ...override.broker },
    provider: { ...base.provider, ...override.provider },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function loadFileConfig(cwd: string): FileConfig {
  const candidates = [
    join(cwd, '.inferline.json'),
    join(cwd, 'inferline.config.json'),
  ];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      throw new ConfigValidationError(`Cannot parse ${candidate}: ${String(err)}`);
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigValidationError(`Invalid config in ${candidate}: ${issues}`);
    }
    return parsed.data;
  }
  return {};
}

/** POLL_INTERVAL and MODEL_REFRESH_INTERVAL are given in (fractional) seconds. */
function secondsToMs(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Math.round(parseFloat(value) * 1000);
}

function loadEnvOverrides(base: AppConfig): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const port = process.env['INFERLINE_PORT'];
  const host = process.env['INFERLINE_HOST'];
  if (port ?? host) {
    overrides.api = {
      ...(port !== undefined && { port: parseInt(port, 10) }),
      ...(host !== undefined && { host }),
    };
  }

  const logLevel = process.env['INFERLINE_LOG_LEVEL'];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError(
        `INFERLINE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}".`,
      );
    }
    overrides.logLevel = logLevel;
  }

  const orphanPolicy = process.env['INFERLINE_ORPHAN_POLICY'];
  if (orphanPolicy) {
    if (!isOrphanPolicy(orphanPolicy)) {
      throw new ConfigValidationError(
        `INFERLINE_ORPHAN_POLICY must be one of ${ORPHAN_POLICIES.join(', ')}, got "${orphanPolicy}".`,
      );
    }
    overrides.broker = { orphanPolicy };
  }

  // Provider-side overrides
  const provider: Partial<AppConfig['provider']> = {};
  const brokerUrl = process.env['INFERLINE_BROKER_URL'];
  const providerId = process.env['INFERLINE_PROVIDER_ID'];
  const pollIntervalMs = secondsToMs(process.env['POLL_INTERVAL']);
  const refreshIntervalMs = secondsToMs(process.env['MODEL_REFRESH_INTERVAL']);
  if (brokerUrl) provider.brokerUrl = brokerUrl;
  if (providerId) provider.providerId = providerId;
  if (pollIntervalMs !== undefined) provider.pollIntervalMs = pollIntervalMs;
  if (refreshIntervalMs !== undefined) provider.modelRefreshIntervalMs = refreshIntervalMs;

  const openaiBaseUrl = process.env['OPENAI_BASE_URL'];
  const openaiKey = process.env['OPENAI_API_KEY'];
  const ollamaBaseUrl = process.env['OLLAMA_BASE_URL'];
  if (openaiBaseUrl ?? openaiKey) {
    const current = base.provider.backend;
    const backend: BackendConfig = {
      type: 'openai-compatible',
      baseUrl: openaiBaseUrl ?? current.baseUrl,
      ...(openaiKey ? { apiKey: openaiKey } : {}),
    };
    provider.backend = backend;
  } else if (ollamaBaseUrl) {
    provider.backend = { type: 'ollama', baseUrl: ollamaBaseUrl };
  }

  if (Object.keys(provider).length > 0) overrides.provider = provider;
  return overrides;
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const fileConfig = merge(DEFAULT_CONFIG, loadFileConfig(cwd));
  return merge(fileConfig, loadEnvOverrides(fileConfig));
}
