export type TelemetryLevelName = 'disabled' | 'basic' | 'full' | 'debug';

export interface TelemetryConfig {
  level: TelemetryLevelName;
  /** Base URL of the telemetry server */
  server?: string;
  /** Submission path, resolved against `server` */
  path?: string;
  /** Share page path, resolved against `server` */
  share?: string;
}

export interface TelemetryExtra {
  server: string;
  extra?: string;
}
