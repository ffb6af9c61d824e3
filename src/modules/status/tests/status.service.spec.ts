import { Test, TestingModule } from '@nestjs/testing';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { StatusService } from '../status.service';
import { CommandRunner } from '../internal/command.runner';
import { APP_CONFIG, loadAppConfig } from '../../../config/app.config';
import type { AppConfig } from '../../../config/app.config';
import { ProbeError } from '../../../lib/errors/ProbeError';
import {
  BOOTC_STATUS_COMMAND,
  CRYPTO_POLICY_COMMAND,
  UPTIME_COMMAND,
} from '../../../lib/status';

type RunMock = jest.Mock<ReturnType<CommandRunner['run']>, [string, number?]>;

const BOOTC_JSON = '{"apiVersion":"org.containers.bootc/v1","kind":"BootcHost"}';

function timeout(command: string): ProbeError {
  return new ProbeError('COMMAND_TIMEOUT', 'timed out', { command });
}

describe('StatusService', () => {
  let tmpDir: string;
  let fipsPath: string;
  let ssgPath: string;
  let moduleRef: TestingModule;
  let service: StatusService;
  let run: RunMock;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'status-service-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    fipsPath = path.join(tmpDir, 'fips_enabled');
    ssgPath = path.join(tmpDir, 'ssg-content');
    fs.rmSync(fipsPath, { force: true });
    fs.rmSync(ssgPath, { recursive: true, force: true });

    const cfg: AppConfig = {
      ...loadAppConfig({}),
      fipsEnabledPath: fipsPath,
      stigContentPath: ssgPath,
    };

    run = jest.fn<ReturnType<CommandRunner['run']>, [string, number?]>();
    run.mockImplementation((command: string) => {
      switch (command) {
        case UPTIME_COMMAND:
          return Promise.resolve('up 3 hours, 2 minutes');
        case CRYPTO_POLICY_COMMAND:
          return Promise.resolve('FIPS');
        case BOOTC_STATUS_COMMAND:
          return Promise.resolve(BOOTC_JSON);
        default:
          return Promise.reject(new Error(`unexpected command ${command}`));
      }
    });

    moduleRef = await Test.createTestingModule({
      providers: [
        StatusService,
        { provide: CommandRunner, useValue: { run } },
        { provide: APP_CONFIG, useValue: cfg },
      ],
    }).compile();

    service = moduleRef.get<StatusService>(StatusService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('checkFipsEnabled()', () => {
    it('is true when the flag file contains "1\\n"', async () => {
      fs.writeFileSync(fipsPath, '1\n');
      await expect(service.checkFipsEnabled()).resolves.toBe(true);
    });

    it('is true when the content trims to "1"', async () => {
      fs.writeFileSync(fipsPath, '  1 \n');
      await expect(service.checkFipsEnabled()).resolves.toBe(true);
    });

    it.each([
      ['"0"', '0\n'],
      ['empty', ''],
      ['multi-line', '1\n1\n'],
      ['other text', 'yes'],
    ])('is false for %s content', async (_label, content) => {
      fs.writeFileSync(fipsPath, content);
      await expect(service.checkFipsEnabled()).resolves.toBe(false);
    });

    it('is false when the file is absent', async () => {
      await expect(service.checkFipsEnabled()).resolves.toBe(false);
    });

    it('is false when the path cannot be read as a file', async () => {
      fs.mkdirSync(fipsPath);
      try {
        await expect(service.checkFipsEnabled()).resolves.toBe(false);
      } finally {
        fs.rmdirSync(fipsPath);
      }
    });
  });

  describe('checkStigContent()', () => {
    it('is true when the content path exists', () => {
      fs.mkdirSync(ssgPath);
      expect(service.checkStigContent()).toBe(true);
    });

    it('is false when the content path is missing', () => {
      expect(service.checkStigContent()).toBe(false);
    });
  });

  describe('getCryptoPolicy()', () => {
    it('returns the policy name printed by the command', async () => {
      await expect(service.getCryptoPolicy()).resolves.toBe('FIPS');
      expect(run).toHaveBeenCalledWith(CRYPTO_POLICY_COMMAND);
    });

    it('returns "Unknown" when the command fails', async () => {
      run.mockRejectedValueOnce(
        new ProbeError('COMMAND_NOT_FOUND', 'missing', {
          command: CRYPTO_POLICY_COMMAND,
        }),
      );
      await expect(service.getCryptoPolicy()).resolves.toBe('Unknown');
    });

    it('returns "Unknown" on a non-probe error too', async () => {
      run.mockRejectedValueOnce(new Error('spawn EACCES'));
      await expect(service.getCryptoPolicy()).resolves.toBe('Unknown');
    });
  });

  describe('getBootStatus()', () => {
    it('returns the raw JSON text', async () => {
      await expect(service.getBootStatus()).resolves.toBe(BOOTC_JSON);
      expect(run).toHaveBeenCalledWith(BOOTC_STATUS_COMMAND);
    });

    it('returns null when the command times out', async () => {
      run.mockRejectedValueOnce(timeout(BOOTC_STATUS_COMMAND));
      await expect(service.getBootStatus()).resolves.toBeNull();
    });

    it('returns null when the command prints nothing', async () => {
      run.mockRejectedValueOnce(
        new ProbeError('EMPTY_OUTPUT', 'no output', {
          command: BOOTC_STATUS_COMMAND,
        }),
      );
      await expect(service.getBootStatus()).resolves.toBeNull();
    });
  });

  describe('collectSystemInfo()', () => {
    it('reports runtime identity and the uptime command output', async () => {
      const info = await service.collectSystemInfo();

      expect(info.hostname).toBe(os.hostname());
      expect(info.os).toBe(os.type());
      expect(info.release).toBe(os.release());
      expect(info.architecture).toBe(os.machine());
      expect(info.node_version).toBe(process.versions.node);
      expect(info.uptime).toBe('up 3 hours, 2 minutes');
      expect(info.load_average).toHaveLength(3);
      info.load_average.forEach((l) => expect(typeof l).toBe('number'));
      expect(info.cpu_count).toBe(os.cpus().length);
    });

    it('falls back to "Unknown" uptime when the command fails', async () => {
      run.mockRejectedValueOnce(timeout(UPTIME_COMMAND));
      const info = await service.collectSystemInfo();

      expect(info.uptime).toBe('Unknown');
      expect(info.hostname).toBe(os.hostname());
    });
  });

  describe('buildReport()', () => {
    it('aggregates every probe', async () => {
      fs.writeFileSync(fipsPath, '1\n');
      fs.mkdirSync(ssgPath);

      const report = await service.buildReport();

      expect(Object.keys(report).sort()).toEqual([
        'bootc_status',
        'security',
        'system',
        'timestamp',
      ]);
      expect(Object.keys(report.system).sort()).toEqual([
        'architecture',
        'cpu_count',
        'hostname',
        'load_average',
        'node_version',
        'os',
        'release',
        'uptime',
      ]);
      expect(report.security).toEqual({
        fips_enabled: true,
        crypto_policy: 'FIPS',
        stig_installed: true,
      });
      expect(report.bootc_status).toBe(BOOTC_JSON);
      expect(new Date(report.timestamp).toISOString()).toBe(report.timestamp);
      expect(run).toHaveBeenCalledTimes(3);
    });

    it('degrades every field to its default when all probes fail', async () => {
      run.mockImplementation((command: string) =>
        Promise.reject(timeout(command)),
      );

      const report = await service.buildReport();

      expect(report.system.uptime).toBe('Unknown');
      expect(report.security).toEqual({
        fips_enabled: false,
        crypto_policy: 'Unknown',
        stig_installed: false,
      });
      expect(report.bootc_status).toBeNull();
    });

    it('stamps non-decreasing timestamps on consecutive reports', async () => {
      const first = await service.buildReport();
      const second = await service.buildReport();

      expect(Date.parse(second.timestamp)).toBeGreaterThanOrEqual(
        Date.parse(first.timestamp),
      );
      expect(second.system.hostname).toBe(first.system.hostname);
    });
  });
});
