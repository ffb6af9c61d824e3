// Response DTO for GET /api/status
// Exactly the report fields; nothing else is serialized.

import type {
  SecurityInfo,
  StatusReport,
  SystemInfo,
} from '../../../lib/status';

export class StatusReportResponseDto implements StatusReport {
  public readonly timestamp: string; // ISO-8601
  public readonly system: SystemInfo;
  public readonly security: SecurityInfo;
  public readonly bootc_status: string | null;

  public constructor(report: StatusReport) {
    this.timestamp = report.timestamp;
    this.system = {
      hostname: report.system.hostname,
      os: report.system.os,
      release: report.system.release,
      architecture: report.system.architecture,
      node_version: report.system.node_version,
      uptime: report.system.uptime,
      load_average: report.system.load_average,
      cpu_count: report.system.cpu_count,
    };
    this.security = {
      fips_enabled: report.security.fips_enabled,
      crypto_policy: report.security.crypto_policy,
      stig_installed: report.security.stig_installed,
    };
    this.bootc_status = report.bootc_status;
  }
}
