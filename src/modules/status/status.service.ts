import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs';
import * as os from 'node:os';
import { APP_CONFIG, type AppConfig } from '../../config/app.config';
import { ProbeError, wrapProbeError } from '../../lib/errors/ProbeError';
import {
  BOOTC_STATUS_COMMAND,
  CRYPTO_POLICY_COMMAND,
  UNKNOWN,
  UPTIME_COMMAND,
} from '../../lib/status';
import type {
  LoadAverage,
  SecurityInfo,
  StatusReport,
  SystemInfo,
} from '../../lib/status';
import { CommandRunner } from './internal/command.runner';

/** Synchronous OS read that falls back instead of throwing. */
function readOr<T>(read: () => T, fallback: T): T {
  try {
    return read();
  } catch {
    return fallback;
  }
}

function readLoadAverage(): LoadAverage {
  const [one = 0, five = 0, fifteen = 0] = os.loadavg();
  return [one, five, fifteen];
}

function describeFailure(err: unknown): string {
  if (err instanceof ProbeError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Status aggregator. Every probe is fault-isolated: a missing tool, a
 * restricted /proc or a slow command degrades its own field to a default
 * and never fails the report.
 */
@Injectable()
export class StatusService {
  private readonly logger = new Logger(StatusService.name);

  public constructor(
    private readonly runner: CommandRunner,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /** Run all probes concurrently and stamp the result. Never rejects. */
  public async buildReport(): Promise<StatusReport> {
    const [system, fipsEnabled, cryptoPolicy, bootcStatus] = await Promise.all(
      [
        this.collectSystemInfo(),
        this.checkFipsEnabled(),
        this.getCryptoPolicy(),
        this.getBootStatus(),
      ],
    );

    const security: SecurityInfo = {
      fips_enabled: fipsEnabled,
      crypto_policy: cryptoPolicy,
      stig_installed: this.checkStigContent(),
    };

    return {
      timestamp: new Date().toISOString(),
      system,
      security,
      bootc_status: bootcStatus,
    };
  }

  public async collectSystemInfo(): Promise<SystemInfo> {
    const uptime = await this.probe(
      'uptime',
      () => this.runner.run(UPTIME_COMMAND),
      UNKNOWN,
    );

    return {
      hostname: readOr(() => os.hostname(), ''),
      os: readOr(() => os.type(), ''),
      release: readOr(() => os.release(), ''),
      architecture: readOr(() => os.machine(), os.arch()),
      node_version: process.versions.node,
      uptime,
      load_average: readOr(readLoadAverage, [0, 0, 0]),
      cpu_count: readOr(() => os.cpus().length, 0),
    };
  }

  /** True only when the kernel flag file reads exactly "1" (trimmed). */
  public async checkFipsEnabled(): Promise<boolean> {
    const path = this.config.fipsEnabledPath;
    return this.probe(
      'fips',
      async () => {
        try {
          const raw = await fs.promises.readFile(path, 'utf8');
          return raw.trim() === '1';
        } catch (err) {
          throw wrapProbeError(
            'READ_FAILED',
            `Cannot read ${path}`,
            { path },
            err,
          );
        }
      },
      false,
    );
  }

  public async getCryptoPolicy(): Promise<string> {
    return this.probe(
      'crypto policy',
      () => this.runner.run(CRYPTO_POLICY_COMMAND),
      UNKNOWN,
    );
  }

  /** Presence of the SCAP Security Guide content; contents are not inspected. */
  public checkStigContent(): boolean {
    return fs.existsSync(this.config.stigContentPath);
  }

  /**
   * Raw `bootc status --json` output. Null means "status unavailable",
   * whether the tool is missing, slow, failing or silent.
   */
  public async getBootStatus(): Promise<string | null> {
    return this.probe(
      'bootc status',
      () => this.runner.run(BOOTC_STATUS_COMMAND),
      null,
    );
  }

  private async probe<T>(
    name: string,
    read: () => Promise<T>,
    fallback: T,
  ): Promise<T> {
    try {
      return await read();
    } catch (err) {
      this.logger.debug(
        `Probe "${name}" unavailable (${describeFailure(err)}); using default`,
      );
      return fallback;
    }
  }
}
