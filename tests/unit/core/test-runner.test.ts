import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SpeedTestRunner, PING_COUNT, cliSpeedTest, speedTest } from '../../../src/core/test-runner';
import { SpeedTestError } from '../../../src/core/errors';
import { DEFAULT_OPTIONS, DEFAULT_TELEMETRY } from '../../../src/config/options';
import { TestOptions } from '../../../src/config/types';
import { LatencyResult, TransferResult } from '../../../src/measurement/base';
import { IPInfoResult } from '../../../src/reporting/types';
import { TelemetryLog } from '../../../src/telemetry/telemetry-log';
import { TelemetryLevel } from '../../../src/telemetry/levels';
import { TelemetryPayload, TelemetrySubmitter } from '../../../src/telemetry/client';
import { Logger, LogLevel } from '../../../src/utils/logger';

const silentLogger = new Logger(LogLevel.SILENT);

function fakeServer(name: string) {
  return {
    name,
    log: new TelemetryLog(),
    resolveURL: vi.fn(() => new URL(`https://${name.toLowerCase()}.example.test/`)),
    sponsorText: vi.fn(() => ''),
    isReachable: vi.fn(async () => true),
    lookupISPInfo: vi.fn(async (): Promise<IPInfoResult> => ({
      processedString: '203.0.113.5 - Example ISP',
      rawIspInfo: { ip: '203.0.113.5', org: 'Example ISP', readme: 'not part of a report' }
    })),
    sampleLatencyJitter: vi.fn(async (): Promise<LatencyResult> => ({ ping: 12.346, jitter: 1.204 })),
    sampleDownload: vi.fn(async (): Promise<TransferResult> => ({ mbps: 93.456, bytes: 5000 })),
    sampleUpload: vi.fn(async (): Promise<TransferResult> => ({ mbps: 41.004, bytes: 3000 }))
  };
}

function options(overrides: Partial<TestOptions> = {}): TestOptions {
  return { ...DEFAULT_OPTIONS, telemetry: { ...DEFAULT_TELEMETRY }, ...overrides };
}

function stubSubmitter(outcome: string | Error) {
  const submit = vi.fn(async (_payload: TelemetryPayload): Promise<string> => {
    if (outcome instanceof Error) throw outcome;
    return outcome;
  });
  const submitter: TelemetrySubmitter = { submit };
  return { submitter, submit };
}

describe('SpeedTestRunner', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-06T07:08:09.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('a single server', () => {
    it('should produce one rounded report without a share link', async () => {
      const server = fakeServer('Alpha');

      const reports = await speedTest([server], options(), { logger: silentLogger });

      expect(reports).toHaveLength(1);
      const [report] = reports;
      expect(report.timestamp.toISOString()).toBe('2024-05-06T07:08:09.000Z');
      expect(report.server).toEqual({ name: 'Alpha', url: 'https://alpha.example.test/' });
      expect(report.client.ip).toBe('203.0.113.5');
      expect(report.client.org).toBe('Example ISP');
      expect('readme' in report.client).toBe(false);
      expect(report.ping).toBe(12.35);
      expect(report.jitter).toBe(1.2);
      expect(report.download).toBe(93.46);
      expect(report.upload).toBe(41);
      expect(report.bytes_received).toBe(5000);
      expect(report.bytes_sent).toBe(3000);
      expect(report.share).toBe('');
    });

    it('should probe latency with the configured source and network', async () => {
      const server = fakeServer('Alpha');

      await speedTest([server], options({ source_address: '192.0.2.1', network: 'ip4' }), { logger: silentLogger });

      expect(server.sampleLatencyJitter).toHaveBeenCalledWith(PING_COUNT, '192.0.2.1', 'ip4');
    });

    it('should pass transfer settings to the server', async () => {
      const server = fakeServer('Alpha');

      await speedTest([server], options({ concurrent: 2, chunks: 10, duration: 500, no_preallocate: true }),
        { logger: silentLogger });

      expect(server.sampleDownload).toHaveBeenCalledWith({
        silent: true,
        bytes: false,
        binaryBase: false,
        concurrent: 2,
        chunks: 10,
        duration: 500
      });
      expect(server.sampleUpload).toHaveBeenCalledWith({
        silent: true,
        bytes: false,
        binaryBase: false,
        concurrent: 2,
        chunks: 10,
        duration: 500,
        noPreallocate: true
      });
    });

    it('should look up ISP info with the distance unit', async () => {
      const server = fakeServer('Alpha');

      await speedTest([server], options({ distance_unit: 'mi' }), { logger: silentLogger });

      expect(server.lookupISPInfo).toHaveBeenCalledWith('mi');
    });
  });

  describe('disabled transfers', () => {
    it('should skip the download test and report zero', async () => {
      const server = fakeServer('Alpha');

      const [report] = await speedTest([server], options({ no_download: true }), { logger: silentLogger });

      expect(server.sampleDownload).not.toHaveBeenCalled();
      expect(report.download).toBe(0);
      expect(report.bytes_received).toBe(0);
      expect(report.upload).toBe(41);
    });

    it('should skip the upload test and report zero', async () => {
      const server = fakeServer('Alpha');

      const [report] = await speedTest([server], options({ no_upload: true }), { logger: silentLogger });

      expect(server.sampleUpload).not.toHaveBeenCalled();
      expect(report.upload).toBe(0);
      expect(report.bytes_sent).toBe(0);
      expect(report.download).toBe(93.46);
    });
  });

  describe('failures', () => {
    it('should reject the whole run when a later server fails', async () => {
      const first = fakeServer('Alpha');
      const second = fakeServer('Beta');
      second.sampleUpload.mockRejectedValue(new Error('connection reset'));

      const run = speedTest([first, second], options(), { logger: silentLogger });

      await expect(run).rejects.toBeInstanceOf(SpeedTestError);
      await expect(run).rejects.toThrow('Failed to get upload speed (Beta): connection reset');
      expect(first.sampleUpload).toHaveBeenCalledTimes(1);
    });

    it('should stop before ISP lookup when the URL cannot be resolved', async () => {
      const server = fakeServer('Alpha');
      server.resolveURL.mockImplementation(() => {
        throw new Error('Invalid URL');
      });

      await expect(speedTest([server], options(), { logger: silentLogger }))
        .rejects.toThrow('Failed to get server URL (Alpha): Invalid URL');
      expect(server.lookupISPInfo).not.toHaveBeenCalled();
    });

    it('should record the failing phase', async () => {
      const server = fakeServer('Alpha');
      server.sampleLatencyJitter.mockRejectedValue(new Error('timeout'));

      let caught: unknown;
      try {
        await speedTest([server], options(), { logger: silentLogger });
      } catch (error) {
        caught = error;
      }

      expect(caught instanceof SpeedTestError ? caught.phase : undefined).toBe('ping');
      expect(server.sampleDownload).not.toHaveBeenCalled();
    });

    it('should discard earlier reports when the ISP lookup fails', async () => {
      const first = fakeServer('Alpha');
      const second = fakeServer('Beta');
      second.lookupISPInfo.mockRejectedValue(new Error('lookup refused'));

      let caught: unknown;
      let reports: unknown;
      try {
        reports = await speedTest([first, second], options(), { logger: silentLogger });
      } catch (error) {
        caught = error;
      }

      expect(reports).toBeUndefined();
      expect(caught instanceof SpeedTestError ? caught.phase : undefined).toBe('isp_info');
      expect(caught instanceof SpeedTestError ? caught.server : undefined).toBe('Beta');
      expect(first.sampleUpload).toHaveBeenCalledTimes(1);
      expect(second.sampleLatencyJitter).not.toHaveBeenCalled();
      expect(second.sampleDownload).not.toHaveBeenCalled();
    });

    it('should stop before the upload when the download fails', async () => {
      const server = fakeServer('Alpha');
      server.sampleDownload.mockRejectedValue(new Error('stream reset'));

      let caught: unknown;
      try {
        await speedTest([server], options(), { logger: silentLogger });
      } catch (error) {
        caught = error;
      }

      expect(caught instanceof SpeedTestError ? caught.phase : undefined).toBe('download');
      expect(caught instanceof Error ? caught.message : undefined)
        .toBe('Failed to get download speed (Alpha): stream reset');
      expect(server.sampleUpload).not.toHaveBeenCalled();
    });

    it('should continue when the liveness check fails', async () => {
      const quiet = fakeServer('Alpha');
      quiet.isReachable.mockResolvedValue(false);
      const broken = fakeServer('Beta');
      broken.isReachable.mockRejectedValue(new Error('refused'));

      const reports = await speedTest([quiet, broken], options(), { logger: silentLogger });

      expect(reports.map(report => report.server.name)).toEqual(['Alpha', 'Beta']);
    });
  });

  describe('telemetry', () => {
    it('should not submit when telemetry is disabled', async () => {
      const { submitter, submit } = stubSubmitter(('https://results.example.test/?id=1'));

      const [report] = await speedTest([fakeServer('Alpha')], options(), { logger: silentLogger, telemetry: submitter });

      expect(submit).not.toHaveBeenCalled();
      expect(report.share).toBe('');
    });

    it('should submit rounded metrics and keep the share link', async () => {
      const { submitter, submit } = stubSubmitter(('https://results.example.test/?id=42'));
      const server = fakeServer('Alpha');
      const runOptions = options({
        telemetry: { ...DEFAULT_TELEMETRY, level: 'basic', server: 'https://results.example.test' },
        telemetry_extra: 'lab-3'
      });

      const [report] = await speedTest([server], runOptions, { logger: silentLogger, telemetry: submitter });

      expect(report.share).toBe('https://results.example.test/?id=42');
      expect(submit).toHaveBeenCalledTimes(1);
      expect(submit).toHaveBeenCalledWith({
        ispInfo: {
          processedString: '203.0.113.5 - Example ISP',
          rawIspInfo: { ip: '203.0.113.5', org: 'Example ISP', readme: 'not part of a report' }
        },
        ping: 12.35,
        jitter: 1.2,
        download: 93.46,
        upload: 41,
        log: '',
        extra: { server: 'Alpha', extra: 'lab-3' }
      });
    });

    it('should keep the report when submission fails', async () => {
      const { submitter } = stubSubmitter((new Error('bad gateway')));
      const runOptions = options({
        telemetry: { ...DEFAULT_TELEMETRY, level: 'full', server: 'https://results.example.test' }
      });

      const [report] = await speedTest([fakeServer('Alpha')], runOptions, { logger: silentLogger, telemetry: submitter });

      expect(report.share).toBe('');
      expect(report.download).toBe(93.46);
    });

    it('should not resend entries from an earlier run', async () => {
      const { submitter, submit } = stubSubmitter('https://results.example.test/?id=8');
      const server = fakeServer('Alpha');
      server.log.setLevel(TelemetryLevel.FULL);
      server.log.info('left over from a previous run');
      const runOptions = options({
        telemetry: { ...DEFAULT_TELEMETRY, level: 'full', server: 'https://results.example.test' }
      });

      await speedTest([server], runOptions, { logger: silentLogger, telemetry: submitter });

      expect(submit.mock.calls[0][0].log).toBe('');
    });

    it('should set the diagnostic log level on every server', async () => {
      const { submitter } = stubSubmitter(('https://results.example.test/?id=7'));
      const servers = [fakeServer('Alpha'), fakeServer('Beta')];
      const runOptions = options({
        telemetry: { ...DEFAULT_TELEMETRY, level: 'debug', server: 'https://results.example.test' }
      });

      await speedTest(servers, runOptions, { logger: silentLogger, telemetry: submitter });

      expect(servers.map(server => server.log.getLevel())).toEqual([TelemetryLevel.DEBUG, TelemetryLevel.DEBUG]);
    });
  });

  describe('interactive output', () => {
    function collect() {
      const chunks: string[] = [];
      return { chunks, write: (chunk: string) => { chunks.push(chunk); } };
    }

    it('should write plain text per server separated by blank lines', async () => {
      const { chunks, write } = collect();

      await cliSpeedTest([fakeServer('Alpha'), fakeServer('Beta')], options(),
        { logger: silentLogger, write, progress: false });

      const block = 'Ping:\t12.35 ms\tJitter:\t1.20 ms\nDownload rate:\t93.46 Mbps\nUpload rate:\t41.00 Mbps\n';
      expect(chunks).toEqual([block, '\n', block, '\n']);
    });

    it('should not separate a single server', async () => {
      const { chunks, write } = collect();

      await cliSpeedTest([fakeServer('Alpha')], options(), { logger: silentLogger, write, progress: false });

      expect(chunks).toHaveLength(1);
    });

    it('should write CSV rows in server order after the run', async () => {
      const { chunks, write } = collect();

      await cliSpeedTest([fakeServer('Alpha'), fakeServer('Beta')], options({ csv: true }),
        { logger: silentLogger, write, progress: false });

      expect(chunks).toEqual([
        '2024-05-06T07:08:09.000Z,Alpha,https://alpha.example.test/,12.35,1.2,93.46,41,5000,3000,,203.0.113.5\n' +
        '2024-05-06T07:08:09.000Z,Beta,https://beta.example.test/,12.35,1.2,93.46,41,5000,3000,,203.0.113.5\n'
      ]);
    });

    it('should prefer CSV when JSON is also requested', async () => {
      const { chunks, write } = collect();

      await cliSpeedTest([fakeServer('Alpha')], options({ csv: true, json: true, csv_delimiter: ';' }),
        { logger: silentLogger, write, progress: false });

      expect(chunks).toEqual([
        '2024-05-06T07:08:09.000Z;Alpha;https://alpha.example.test/;12.35;1.2;93.46;41;5000;3000;;203.0.113.5\n'
      ]);
    });

    it('should write a JSON array after the run', async () => {
      const { chunks, write } = collect();

      await cliSpeedTest([fakeServer('Alpha'), fakeServer('Beta')], options({ json: true }),
        { logger: silentLogger, write, progress: false });

      expect(chunks).toHaveLength(1);
      const parsed: unknown = JSON.parse(chunks[0]);
      expect(parsed).toEqual([
        expect.objectContaining({ timestamp: '2024-05-06T07:08:09.000Z', server: { name: 'Alpha', url: 'https://alpha.example.test/' } }),
        expect.objectContaining({ timestamp: '2024-05-06T07:08:09.000Z', server: { name: 'Beta', url: 'https://beta.example.test/' } })
      ]);
    });

    it('should never render spinners in library mode', async () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      try {
        await speedTest([fakeServer('Alpha')], options(), { logger: silentLogger, progress: true });

        expect(stderr.mock.calls).toEqual([]);
      } finally {
        stderr.mockRestore();
      }
    });

    it('should write nothing in library mode', async () => {
      const { chunks, write } = collect();

      await new SpeedTestRunner([fakeServer('Alpha')], options(), { logger: silentLogger, write }).run();

      expect(chunks).toEqual([]);
    });
  });
});
