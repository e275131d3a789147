import { ProvisionConfig } from '@zbx-provision/shared';
import { ProvisionError } from './errors.js';

export type { ProvisionConfig };

export type Env = Record<string, string | undefined>;

/** Raw values from flags; validated together with the environment */
export type ConfigOverrides = { [K in keyof ProvisionConfig]?: string | number };

function fromEnv(env: Env): ConfigOverrides {
  const input: ConfigOverrides = {};
  if (env.ZBX_SERVER) input.server = env.ZBX_SERVER;
  if (env.ZBX_VERSION) input.zabbixVersion = env.ZBX_VERSION;
  if (env.LOG_DIR) input.logDir = env.LOG_DIR;
  if (env.ZBX_DEBIAN_RELEASE) input.debianRelease = env.ZBX_DEBIAN_RELEASE;
  if (env.ZBX_PROBE_TIMEOUT) input.probeTimeoutSeconds = env.ZBX_PROBE_TIMEOUT;
  if (env.LOG_LEVEL) input.logLevel = env.LOG_LEVEL;
  return input;
}

/**
 * Effective configuration: CLI overrides, then environment, then defaults.
 * Called once at startup; the result is passed to everything that needs it.
 */
export function loadProvisionConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
): ProvisionConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const result = ProvisionConfig.safeParse({ ...fromEnv(env), ...defined });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ProvisionError('E_CONFIG_INVALID', `Invalid configuration: ${issues}`);
  }
  return result.data;
}
