// Response DTO for GET /api/health
// Keep DTOs side-effect free and strictly typed.

import type { HealthReport } from '../../../lib/status';

export class HealthResponseDto implements HealthReport {
  public readonly status: 'healthy';
  public readonly timestamp: string; // ISO-8601

  public constructor(args: { timestamp: string }) {
    this.status = 'healthy';
    this.timestamp = args.timestamp;
  }
}
