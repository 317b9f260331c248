// src/index.ts (builds to dist/index.js)

export { SpeedTestRunner, speedTest, cliSpeedTest, PING_COUNT } from './core/test-runner';
export type { RunSink } from './core/test-runner';
export { SpeedTestError, TelemetryError } from './core/errors';
export type { TestPhase } from './core/errors';

export { ConfigParser } from './config/parser';
export { ConfigValidator } from './config/validator';
export { resolveTestOptions, DEFAULT_OPTIONS } from './config/options';
export { selectServers } from './config/server-selection';

export { HttpMeasurementServer } from './measurement/http/handler';
export { createMeasurementServers } from './measurement/factory';
export type {
  MeasurementServer, LatencyResult, TransferResult, TransferOptions, UploadOptions
} from './measurement/base';

export { TelemetryClient, buildTelemetryForm } from './telemetry/client';
export type { TelemetryPayload, TelemetrySubmitter } from './telemetry/client';
export { parseTelemetryResponse, buildShareUrl } from './telemetry/response';
export { TelemetryLog } from './telemetry/telemetry-log';
export { TelemetryLevel } from './telemetry/levels';

export { createReportOutput, selectOutputFormat } from './core/factories/output-handler-factory';
export { CSVOutput } from './outputs/csv';
export { JSONOutput } from './outputs/json';
export { PlainOutput } from './outputs/plain';
export { humanizeMbps } from './utils/units';
export { round2, toFlatReport } from './reporting/report';
export { Logger, LogLevel } from './utils/logger';

export type { Report, FlatReport, IPInfoResult, IPInfoResponse } from './reporting/types';
export type {
  TestOptions, ServerDefinition, TelemetryConfig, TelemetryExtra, SpeedTestConfiguration
} from './config/types';
