import { DistanceUnit, NetworkFamily } from '../config/types';
import { IPInfoResult } from '../reporting/types';
import { TelemetryLog } from '../telemetry/telemetry-log';

export interface LatencyResult {
  ping: number;    // ms
  jitter: number;  // ms
}

export interface TransferResult {
  mbps: number;
  bytes: number;
}

export interface TransferOptions {
  /** Suppress progress output */
  silent: boolean;
  /** Show byte rates instead of Mbps in progress output */
  bytes: boolean;
  binaryBase: boolean;
  concurrent: number;
  chunks: number;
  /** Upper bound of the transfer, in ms */
  duration: number;
}

export interface UploadOptions extends TransferOptions {
  noPreallocate: boolean;
}

/**
 * One measurement endpoint. Implementations own the transport; the test
 * runner only sees the aggregate numbers.
 */
export interface MeasurementServer {
  readonly name: string;
  readonly log: TelemetryLog;

  resolveURL(): URL;
  sponsorText(): string;
  isReachable(): Promise<boolean>;
  lookupISPInfo(distanceUnit: DistanceUnit): Promise<IPInfoResult>;
  sampleLatencyJitter(count: number, sourceAddress: string | undefined, network: NetworkFamily): Promise<LatencyResult>;
  sampleDownload(options: TransferOptions): Promise<TransferResult>;
  sampleUpload(options: UploadOptions): Promise<TransferResult>;
}
