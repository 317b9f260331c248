import { FileTestOptions, TelemetryConfig, TestOptions } from './types';
import { parseDuration } from '../utils/time';

export const DEFAULT_TELEMETRY: TelemetryConfig = {
  level: 'disabled',
  path: '/results/telemetry.php',
  share: '/results/'
};

export const DEFAULT_OPTIONS: TestOptions = {
  no_download: false,
  no_upload: false,
  no_preallocate: false,
  bytes: false,
  binary_base: false,
  concurrent: 3,
  chunks: 100,
  duration: 15000,
  upload_size: 1024,
  network: 'ip',
  distance_unit: 'km',
  simple: false,
  csv: false,
  json: false,
  csv_delimiter: ',',
  telemetry: DEFAULT_TELEMETRY
};

/**
 * Layers defaults, config file values and command line overrides, in that
 * order, for both the test options and the telemetry target. `undefined`
 * values never override.
 */
export function resolveTestOptions(
  fileOptions: FileTestOptions = {},
  overrides: FileTestOptions = {},
  telemetry: Partial<TelemetryConfig> = {},
  telemetryOverrides: Partial<TelemetryConfig> = {}
): TestOptions {
  const { duration, ...rest }: FileTestOptions = { ...defined(fileOptions), ...defined(overrides) };

  return {
    ...DEFAULT_OPTIONS,
    ...rest,
    duration: duration === undefined ? DEFAULT_OPTIONS.duration : parseDuration(duration),
    telemetry: { ...DEFAULT_TELEMETRY, ...defined(telemetry), ...defined(telemetryOverrides) }
  };
}

function defined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}
