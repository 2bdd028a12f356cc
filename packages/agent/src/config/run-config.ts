import { z } from 'zod';
import type { RunConfig } from '../types/index.js';
import { InvalidConfigError } from '../types/index.js';

export const ApprovalModeSchema = z.enum(['auto', 'manual', 'disabled']);

export const RunConfigSchema = z.object({
  approvalMode: ApprovalModeSchema.default('manual'),
  maxIterations: z.number().int().min(1).max(50).default(10),
  timeoutPerIterationMs: z.number().positive().max(600_000).default(300_000),
  allowedTools: z.array(z.string().min(1)).default([]),
  blockedTools: z.array(z.string().min(1)).default([]),
  enableTools: z.boolean().default(true),
});

export type RunConfigInput = z.input<typeof RunConfigSchema>;

export const DEFAULT_RUN_CONFIG: RunConfig = freeze(RunConfigSchema.parse({}));

export function parseRunConfig(input: unknown = {}): RunConfig {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return freeze(result.data);
}

export type EnvVarConfig = {
  readonly envVar: string;
  readonly key: keyof RunConfig;
  readonly kind: 'string' | 'integer' | 'list' | 'boolean';
};

export const RUN_CONFIG_ENV_VARS: ReadonlyArray<EnvVarConfig> = [
  { envVar: 'TOOLLOOP_APPROVAL_MODE', key: 'approvalMode', kind: 'string' },
  { envVar: 'TOOLLOOP_MAX_ITERATIONS', key: 'maxIterations', kind: 'integer' },
  { envVar: 'TOOLLOOP_TIMEOUT_MS', key: 'timeoutPerIterationMs', kind: 'integer' },
  { envVar: 'TOOLLOOP_ALLOWED_TOOLS', key: 'allowedTools', kind: 'list' },
  { envVar: 'TOOLLOOP_BLOCKED_TOOLS', key: 'blockedTools', kind: 'list' },
  { envVar: 'TOOLLOOP_ENABLE_TOOLS', key: 'enableTools', kind: 'boolean' },
];

/**
 * Reads overrides from the environment on top of `base`. Values that do not
 * coerce are passed through raw so validation reports them.
 */
export function runConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  base: RunConfigInput = {},
): RunConfig {
  const overrides: Record<string, unknown> = {};

  for (const config of RUN_CONFIG_ENV_VARS) {
    const raw = env[config.envVar];
    if (raw === undefined || raw.trim().length === 0) {
      continue;
    }
    overrides[config.key] = coerce(raw.trim(), config.kind);
  }

  return parseRunConfig({ ...base, ...overrides });
}

function coerce(raw: string, kind: EnvVarConfig['kind']): unknown {
  switch (kind) {
    case 'string':
      return raw;
    case 'integer':
      return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : raw;
    case 'list':
      return raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    case 'boolean':
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      return raw;
  }
}

function freeze(config: RunConfig): RunConfig {
  return Object.freeze({
    ...config,
    allowedTools: Object.freeze([...config.allowedTools]),
    blockedTools: Object.freeze([...config.blockedTools]),
  });
}
