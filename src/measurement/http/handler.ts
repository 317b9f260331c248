import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { randomBytes } from 'crypto';
import { Readable } from 'stream';
import ora from 'ora';
import { DistanceUnit, NetworkFamily, ServerDefinition } from '../../config/types';
import { IPInfoResult } from '../../reporting/types';
import { TelemetryLog } from '../../telemetry/telemetry-log';
import { LatencyResult, MeasurementServer, TransferOptions, TransferResult, UploadOptions } from '../base';
import { jitter, mean } from '../statistics';
import { parseIPInfo } from './ip-info';
import { formatRate } from '../../utils/units';
import { errorMessage } from '../../core/errors';
import { USER_AGENT } from '../../version';

export interface ConnectionOptions {
  sourceAddress?: string;
  network?: NetworkFamily;
  /** Upload payload size in KiB */
  uploadSize?: number;
  timeout?: number;
}

type Agents = Pick<AxiosRequestConfig, 'httpAgent' | 'httpsAgent'>;

type Worker = (signal: AbortSignal, count: (bytes: number) => void) => Promise<void>;

const KIB = 1024;

/**
 * Measures against a LibreSpeed-style HTTP server: `pingURL` for latency,
 * `dlURL?ckSize=N` for download and `ulURL` for upload.
 */
export class HttpMeasurementServer implements MeasurementServer {
  readonly name: string;
  readonly log = new TelemetryLog();
  private definition: ServerDefinition;
  private connection: ConnectionOptions;
  private axiosInstance: AxiosInstance;
  private uploadSize: number;

  constructor(definition: ServerDefinition, connection: ConnectionOptions = {}, axiosInstance?: AxiosInstance) {
    this.definition = definition;
    this.name = definition.name;
    this.connection = connection;
    this.uploadSize = (connection.uploadSize ?? 1024) * KIB;

    this.axiosInstance = axiosInstance ?? axios.create({
      timeout: connection.timeout ?? 30000,
      headers: {
        'User-Agent': USER_AGENT,
        'Connection': 'keep-alive'
      },
      maxRedirects: 3,
      ...createAgents(connection.sourceAddress, connection.network)
    });
  }

  get id(): number {
    return this.definition.id;
  }

  resolveURL(): URL {
    const server = this.definition.server.startsWith('//')
      ? `https:${this.definition.server}`
      : this.definition.server;
    return new URL(server);
  }

  sponsorText(): string {
    const { sponsorName, sponsorURL } = this.definition;
    if (!sponsorName) return '';
    if (!sponsorURL) return sponsorName;

    const url = /^[a-z][a-z\d+.-]*:/i.test(sponsorURL) ? sponsorURL : `https://${sponsorURL.replace(/^\/\//, '')}`;
    return `${sponsorName} @ ${url}`;
  }

  async isReachable(): Promise<boolean> {
    try {
      const response = await this.axiosInstance.get(this.endpoint(this.definition.pingURL).toString(), {
        responseType: 'text',
        validateStatus: () => true
      });
      this.log.info(`Liveness check returned HTTP ${response.status}`);
      return response.status === 200;
    } catch (error) {
      this.log.info(`Liveness check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async lookupISPInfo(distanceUnit: DistanceUnit): Promise<IPInfoResult> {
    const url = this.endpoint(this.definition.getIpURL);
    this.log.debug(`Fetching IP info from ${url.toString()}`);

    const response = await this.axiosInstance.get<unknown>(url.toString(), {
      params: { isp: true, distance: distanceUnit }
    });
    const info = parseIPInfo(response.data);
    this.log.info(`IP info: ${info.processedString}`);
    return info;
  }

  async sampleLatencyJitter(count: number, sourceAddress: string | undefined, network: NetworkFamily): Promise<LatencyResult> {
    const url = this.endpoint(this.definition.pingURL).toString();
    const agents = this.agentsFor(sourceAddress, network);
    const samples: number[] = [];

    for (let i = 0; i < count; i++) {
      const start = performance.now();
      await this.axiosInstance.get(url, { ...agents, responseType: 'text', params: { r: Math.random() } });
      const elapsed = performance.now() - start;
      samples.push(elapsed);
      this.log.debug(`Ping sample ${i + 1}/${count}: ${elapsed.toFixed(2)} ms`);
    }

    const result = { ping: mean(samples), jitter: jitter(samples) };
    this.log.info(`Ping ${result.ping.toFixed(2)} ms, jitter ${result.jitter.toFixed(2)} ms`);
    return result;
  }

  async sampleDownload(options: TransferOptions): Promise<TransferResult> {
    const url = this.endpoint(this.definition.dlURL).toString();
    const result = await this.measure('Download', options, (signal, count) =>
      this.downloadWorker(url, options.chunks, signal, count));
    this.log.info(`Download ${result.mbps.toFixed(2)} Mbps, ${result.bytes} bytes`);
    return result;
  }

  async sampleUpload(options: UploadOptions): Promise<TransferResult> {
    const url = this.endpoint(this.definition.ulURL).toString();
    const preallocated = options.noPreallocate ? null : randomBytes(this.uploadSize);
    const payload = () => preallocated ?? randomBytes(this.uploadSize);

    const result = await this.measure('Upload', options, (signal, count) =>
      this.uploadWorker(url, payload, signal, count));
    this.log.info(`Upload ${result.mbps.toFixed(2)} Mbps, ${result.bytes} bytes`);
    return result;
  }

  /**
   * Runs `concurrent` workers until `duration` elapses and turns the byte
   * count into Mbps.
   */
  private async measure(label: string, options: TransferOptions, worker: Worker): Promise<TransferResult> {
    const controller = new AbortController();
    const spinner = options.silent ? null : ora(`${label}...`).start();
    const start = performance.now();
    let bytes = 0;

    const rate = () => {
      const seconds = Math.max((performance.now() - start) / 1000, 0.001);
      return (bytes * 8) / 1e6 / seconds;
    };

    const ticker = spinner
      ? setInterval(() => {
          spinner.text = `${label} rate: ${formatRate(rate(), options.bytes, options.binaryBase)}`;
        }, 200)
      : undefined;
    const deadline = setTimeout(() => controller.abort(), options.duration);

    try {
      await Promise.all(Array.from({ length: options.concurrent }, () =>
        worker(controller.signal, (count) => { bytes += count; })));
    } catch (error) {
      controller.abort();
      spinner?.fail(`${label} failed`);
      this.log.info(`${label} failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      clearTimeout(deadline);
      clearInterval(ticker);
    }

    spinner?.stop();
    return { mbps: rate(), bytes };
  }

  private async downloadWorker(url: string, chunks: number, signal: AbortSignal, count: (bytes: number) => void): Promise<void> {
    while (!signal.aborted) {
      try {
        const response = await this.axiosInstance.get<Readable>(url, {
          params: { ckSize: chunks },
          responseType: 'stream',
          signal
        });
        for await (const chunk of response.data) {
          count(Buffer.byteLength(chunk));
        }
      } catch (error) {
        // The deadline aborts whatever transfer is in flight
        if (signal.aborted) return;
        throw error;
      }
    }
  }

  private async uploadWorker(url: string, payload: () => Buffer, signal: AbortSignal, count: (bytes: number) => void): Promise<void> {
    while (!signal.aborted) {
      const body = payload();
      let sent = 0;
      try {
        await this.axiosInstance.post(url, body, {
          headers: { 'Content-Type': 'application/octet-stream' },
          signal,
          onUploadProgress: (event) => {
            count(event.loaded - sent);
            sent = event.loaded;
          }
        });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
      if (sent < body.length) {
        count(body.length - sent);
      }
    }
  }

  private endpoint(path: string): URL {
    return new URL(path, this.resolveURL());
  }

  private agentsFor(sourceAddress: string | undefined, network: NetworkFamily): Agents {
    if (sourceAddress === this.connection.sourceAddress && network === (this.connection.network ?? 'ip')) {
      return {};
    }
    return createAgents(sourceAddress, network);
  }
}

function createAgents(sourceAddress?: string, network?: NetworkFamily): Agents {
  const family = network === 'ip4' ? 4 : network === 'ip6' ? 6 : undefined;
  const agentOptions: http.AgentOptions = { keepAlive: true };
  if (sourceAddress) agentOptions.localAddress = sourceAddress;
  if (family) agentOptions.family = family;

  return {
    httpAgent: new http.Agent(agentOptions),
    httpsAgent: new https.Agent(agentOptions)
  };
}
