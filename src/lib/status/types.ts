/**
 * Wire shapes of the status API. Field names are snake_case because the
 * dashboard script reads them as-is.
 */

export const UNKNOWN = 'Unknown';

/** External commands each probe shells out to. */
export const UPTIME_COMMAND = 'uptime -p';
export const CRYPTO_POLICY_COMMAND = 'update-crypto-policies --show';
export const BOOTC_STATUS_COMMAND = 'bootc status --json 2>/dev/null';

/** 1, 5 and 15 minute load averages. */
export type LoadAverage = [number, number, number];

export interface SystemInfo {
  hostname: string;
  os: string;
  release: string;
  architecture: string;
  node_version: string;
  uptime: string;
  load_average: LoadAverage;
  cpu_count: number;
}

export interface SecurityInfo {
  fips_enabled: boolean;
  crypto_policy: string;
  stig_installed: boolean;
}

export interface StatusReport {
  timestamp: string; // ISO-8601
  system: SystemInfo;
  security: SecurityInfo;
  /** Raw `bootc status --json` output; null when unavailable or empty. */
  bootc_status: string | null;
}

export interface HealthReport {
  status: 'healthy';
  timestamp: string; // ISO-8601
}
