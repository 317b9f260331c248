import { ServerDefinition } from './server-config';
import { TelemetryConfig } from './telemetry-config';
import { FileTestOptions } from './test-options';

export interface SpeedTestConfiguration {
  servers: ServerDefinition[];
  telemetry?: TelemetryConfig;
  options?: FileTestOptions;
}
