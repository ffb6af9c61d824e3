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
  timestamp: string;
  system: SystemInfo;
  security: SecurityInfo;
  bootc_status: string | null;
}

export interface HealthReport {
  status: 'healthy';
  timestamp: string;
}
