import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { APP_CONFIG, type AppConfig } from '../../config/app.config';

export const DASHBOARD_TEMPLATE = 'index.html';

/**
 * Serves the dashboard page shell. The page is static; all live data is
 * fetched by its script from /api/status.
 */
@Injectable()
export class DashboardService {
  private readonly logger = new Logger(DashboardService.name);

  public constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  public templatePath(): string {
    return path.join(this.config.viewsDir, DASHBOARD_TEMPLATE);
  }

  /** Read the page shell. Read per request so edits show up without restart. */
  public async renderIndex(): Promise<string> {
    const file = this.templatePath();
    try {
      return await fs.promises.readFile(file, 'utf8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Dashboard template unavailable: ${reason}`);
      throw new InternalServerErrorException('Dashboard unavailable');
    }
  }
}
