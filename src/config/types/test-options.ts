import { TelemetryConfig } from './telemetry-config';

export type DistanceUnit = 'km' | 'mi' | 'NM';
export type NetworkFamily = 'ip' | 'ip4' | 'ip6';

export interface TestOptions {
  no_download: boolean;
  no_upload: boolean;
  no_preallocate: boolean;
  /** Display rates as bytes per second instead of Mbps */
  bytes: boolean;
  /** Use 1024 instead of 1000 when scaling byte rates */
  binary_base: boolean;
  concurrent: number;
  chunks: number;
  /** Upper bound of each transfer test, in ms */
  duration: number;
  /** Upload payload size in KiB */
  upload_size: number;
  source_address?: string;
  network: NetworkFamily;
  distance_unit: DistanceUnit;

  simple: boolean;
  csv: boolean;
  json: boolean;
  csv_delimiter: string;

  telemetry: TelemetryConfig;
  telemetry_extra?: string;
}

/**
 * Option values as written in a config file. Durations may be strings
 * like "15s".
 */
export type FileTestOptions = Partial<Omit<TestOptions, 'duration' | 'telemetry'>> & {
  duration?: string | number;
};
