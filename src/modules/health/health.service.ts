import { Injectable } from '@nestjs/common';
import type { HealthReport } from '../../lib/status';

@Injectable()
export class HealthService {
  /** Liveness only; deliberately independent of every host probe. */
  public check(): HealthReport {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
  }
}
