import ora, { Ora } from 'ora';
import { TestOptions } from '../config/types';
import { MeasurementServer, TransferResult } from '../measurement/base';
import { IPInfoResult, Report } from '../reporting/types';
import { Metrics, createReport, roundMetrics } from '../reporting/report';
import { ReportOutput } from '../outputs/base';
import { createReportOutput } from './factories/output-handler-factory';
import { TelemetryClient, TelemetrySubmitter } from '../telemetry/client';
import { TelemetryLevel, parseTelemetryLevel } from '../telemetry/levels';
import { SpeedTestError, TestPhase, errorMessage } from './errors';
import { Logger, LogLevel, logger as defaultLogger } from '../utils/logger';

// Number of probes used for ping and jitter
export const PING_COUNT = 10;

export interface RunSink {
  /** Interactive runs print progress and formatted output; library runs only return reports. */
  interactive?: boolean;
  logger?: Logger;
  write?: (chunk: string) => void;
  telemetry?: TelemetrySubmitter;
  /** Allow spinners. Never honoured for silent runs. */
  progress?: boolean;
}

export class SpeedTestRunner {
  private servers: MeasurementServer[];
  private options: TestOptions;
  private interactive: boolean;
  private silent: boolean;
  private progress: boolean;
  private logger: Logger;
  private write: (chunk: string) => void;
  private telemetryLevel: TelemetryLevel;
  private telemetry?: TelemetrySubmitter;
  private output: ReportOutput;

  constructor(servers: MeasurementServer[], options: TestOptions, sink: RunSink = {}) {
    this.servers = servers;
    this.options = options;
    this.interactive = sink.interactive ?? false;
    this.silent = !this.interactive || options.simple || options.csv || options.json;
    this.progress = !this.silent && (sink.progress ?? true);
    this.logger = sink.logger ?? (this.interactive ? defaultLogger : new Logger(LogLevel.SILENT));
    this.write = sink.write ?? ((chunk: string) => { process.stdout.write(chunk); });
    this.telemetryLevel = parseTelemetryLevel(options.telemetry.level);
    this.telemetry = sink.telemetry;
    this.output = createReportOutput(options, this.logger);
  }

  /**
   * Tests every server in order. The first hard failure rejects the whole
   * run and no reports are returned.
   */
  async run(): Promise<Report[]> {
    if (this.servers.length > 1) {
      this.note(`Testing against ${this.servers.length} servers`);
    }

    const reports: Report[] = [];

    for (const server of this.servers) {
      const report = await this.testServer(server);
      reports.push(report);

      if (this.interactive) {
        const text = this.output.writeReport(report);
        if (text !== null) this.write(text);

        if (this.servers.length > 1 && !this.silent) {
          this.write('\n');
        }
      }
    }

    if (this.interactive) {
      const text = this.output.finalize(reports);
      if (text !== null) this.write(text);
    }

    return reports;
  }

  private async testServer(server: MeasurementServer): Promise<Report> {
    server.log.setLevel(this.telemetryLevel);

    const url = this.hardStep('resolve_url', server, () => server.resolveURL());
    this.note(`Selected server: ${server.name} [${url.hostname}]`);

    const sponsor = server.sponsorText();
    if (sponsor) {
      this.note(`Sponsored by: ${sponsor}`);
    }

    if (!(await this.checkReachable(server))) {
      this.note(`Selected server ${server.name} (${url.hostname}) is not responding at the moment, try again later`);
    }

    const ispInfo = await this.hardStepAsync('isp_info', server,
      () => server.lookupISPInfo(this.options.distance_unit));
    this.note(`You're testing from: ${ispInfo.processedString}`);

    const spinner = this.startSpinner('Pinging server...');
    const latency = await this.hardStepAsync('ping', server,
      () => server.sampleLatencyJitter(PING_COUNT, this.options.source_address, this.options.network),
      spinner);
    spinner?.stop();

    const download = await this.transfer('download', server);
    const upload = await this.transfer('upload', server);

    const metrics = roundMetrics({
      ping: latency.ping,
      jitter: latency.jitter,
      download: download.mbps,
      upload: upload.mbps
    });

    const share = this.telemetryLevel > TelemetryLevel.DISABLED
      ? await this.submitTelemetry(server, ispInfo, metrics)
      : '';

    return createReport({
      serverName: server.name,
      serverUrl: url.toString(),
      ispInfo: ispInfo.rawIspInfo,
      metrics,
      bytesReceived: download.bytes,
      bytesSent: upload.bytes,
      share
    });
  }

  private async transfer(phase: 'download' | 'upload', server: MeasurementServer): Promise<TransferResult> {
    const disabled = phase === 'download' ? this.options.no_download : this.options.no_upload;
    if (disabled) {
      this.note(`${phase === 'download' ? 'Download' : 'Upload'} test is disabled`);
      return { mbps: 0, bytes: 0 };
    }

    const transferOptions = {
      silent: this.silent || !this.progress,
      bytes: this.options.bytes,
      binaryBase: this.options.binary_base,
      concurrent: this.options.concurrent,
      chunks: this.options.chunks,
      duration: this.options.duration
    };

    if (phase === 'download') {
      return this.hardStepAsync('download', server, () => server.sampleDownload(transferOptions));
    }
    return this.hardStepAsync('upload', server,
      () => server.sampleUpload({ ...transferOptions, noPreallocate: this.options.no_preallocate }));
  }

  private async submitTelemetry(
    server: MeasurementServer,
    ispInfo: IPInfoResult,
    metrics: Metrics
  ): Promise<string> {
    try {
      const client = this.telemetry ?? new TelemetryClient(this.options.telemetry, undefined, this.logger);
      return await client.submit({
        ispInfo,
        ...metrics,
        log: server.log.toString(),
        extra: { server: server.name, extra: this.options.telemetry_extra }
      });
    } catch (error) {
      this.logger.error(`Error when sending telemetry data: ${errorMessage(error)}`);
      return '';
    }
  }

  // Liveness is advisory: a failed check never stops the test
  private async checkReachable(server: MeasurementServer): Promise<boolean> {
    try {
      return await server.isReachable();
    } catch (error) {
      this.logger.debug(`Liveness check for ${server.name} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private hardStep<T>(phase: TestPhase, server: MeasurementServer, step: () => T): T {
    try {
      return step();
    } catch (error) {
      throw this.fail(phase, server, error);
    }
  }

  private async hardStepAsync<T>(
    phase: TestPhase,
    server: MeasurementServer,
    step: () => Promise<T>,
    spinner?: Ora | null
  ): Promise<T> {
    try {
      return await step();
    } catch (error) {
      spinner?.fail();
      throw this.fail(phase, server, error);
    }
  }

  private fail(phase: TestPhase, server: MeasurementServer, error: unknown): SpeedTestError {
    const failure = new SpeedTestError(phase, server.name, error);
    this.logger.error(failure.message);
    return failure;
  }

  private startSpinner(text: string): Ora | null {
    if (!this.progress) return null;
    return ora(text).start();
  }

  private note(message: string): void {
    if (this.interactive) {
      this.logger.info(message);
    } else {
      this.logger.debug(message);
    }
  }
}

/** Runs the test for the command line: writes formatted output, returns nothing. */
export async function cliSpeedTest(
  servers: MeasurementServer[],
  options: TestOptions,
  sink: Omit<RunSink, 'interactive'> = {}
): Promise<void> {
  await new SpeedTestRunner(servers, options, { ...sink, interactive: true }).run();
}

/** Runs the test without console output and returns the reports. */
export async function speedTest(
  servers: MeasurementServer[],
  options: TestOptions,
  sink: Omit<RunSink, 'interactive' | 'write'> = {}
): Promise<Report[]> {
  return new SpeedTestRunner(servers, options, { ...sink, interactive: false }).run();
}
