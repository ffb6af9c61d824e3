import * as path from 'node:path';

/**
 * Environment variable names recognised by the service.
 */
export const ENV_HOST = 'HOST';
export const ENV_PORT = 'PORT';
export const ENV_COMMAND_TIMEOUT_MS = 'STATUS_COMMAND_TIMEOUT_MS';
export const ENV_FIPS_ENABLED_PATH = 'FIPS_ENABLED_PATH';
export const ENV_SSG_CONTENT_PATH = 'SSG_CONTENT_PATH';
export const ENV_VIEWS_DIR = 'VIEWS_DIR';
export const ENV_PUBLIC_DIR = 'PUBLIC_DIR';

/** DI token for the resolved {@link AppConfig}. */
export const APP_CONFIG = Symbol('APP_CONFIG');

/**
 * Strict config shape consumed by bootstrap and the status probes.
 */
export interface AppConfig {
  /** Interface the HTTP server binds to. */
  readonly host: string;
  readonly port: number;
  /** Upper bound for every external command a probe runs. */
  readonly commandTimeoutMs: number;
  /** Kernel flag file; "1" means FIPS mode is on. */
  readonly fipsEnabledPath: string;
  /** SCAP Security Guide content directory (presence check only). */
  readonly stigContentPath: string;
  /** Directory holding the dashboard page shell (index.html). */
  readonly viewsDir: string;
  /** Directory served under /static/. */
  readonly publicDir: string;
}

export const APP_CONFIG_DEFAULTS: Readonly<
  Omit<AppConfig, 'viewsDir' | 'publicDir'>
> = {
  host: '0.0.0.0',
  port: 8080,
  commandTimeoutMs: 5_000,
  fipsEnabledPath: '/proc/sys/crypto/fips_enabled',
  stigContentPath: '/usr/share/xml/scap/ssg/content',
};

/**
 * Parse a positive integer env value with a sensible default.
 */
function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const n = value ? Number.parseInt(value.trim(), 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= max ? n : fallback;
}

function readString(value: string | undefined, fallback: string): string {
  return (value && value.trim()) || fallback;
}

/**
 * Load strongly typed config from process.env.
 * Never throws; always returns a complete config with defaults.
 * Relative directories resolve against the working directory.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  return {
    host: readString(env[ENV_HOST], APP_CONFIG_DEFAULTS.host),
    port: parsePositiveInt(env[ENV_PORT], APP_CONFIG_DEFAULTS.port, 65_535),
    commandTimeoutMs: parsePositiveInt(
      env[ENV_COMMAND_TIMEOUT_MS],
      APP_CONFIG_DEFAULTS.commandTimeoutMs,
    ),
    fipsEnabledPath: readString(
      env[ENV_FIPS_ENABLED_PATH],
      APP_CONFIG_DEFAULTS.fipsEnabledPath,
    ),
    stigContentPath: readString(
      env[ENV_SSG_CONTENT_PATH],
      APP_CONFIG_DEFAULTS.stigContentPath,
    ),
    viewsDir: path.resolve(cwd, readString(env[ENV_VIEWS_DIR], 'views')),
    publicDir: path.resolve(cwd, readString(env[ENV_PUBLIC_DIR], 'public')),
  };
}
