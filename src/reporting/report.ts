import { ClientInfo, FlatReport, IPInfoResponse, Report } from './types';

/** Rounds half away from zero to two decimal places. */
export function round2(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value) * 100) / 100;
}

export interface Metrics {
  ping: number;
  jitter: number;
  download: number;
  upload: number;
}

export function roundMetrics(metrics: Metrics): Metrics {
  return {
    ping: round2(metrics.ping),
    jitter: round2(metrics.jitter),
    download: round2(metrics.download),
    upload: round2(metrics.upload)
  };
}

export interface ReportInput {
  serverName: string;
  serverUrl: string;
  ispInfo: IPInfoResponse;
  /** Already rounded */
  metrics: Metrics;
  bytesReceived: number;
  bytesSent: number;
  share: string;
  timestamp?: Date;
}

export function createReport(input: ReportInput): Report {
  return Object.freeze({
    timestamp: input.timestamp ?? new Date(),
    server: Object.freeze({ name: input.serverName, url: input.serverUrl }),
    client: Object.freeze(toClientInfo(input.ispInfo)),
    bytes_sent: input.bytesSent,
    bytes_received: input.bytesReceived,
    ping: input.metrics.ping,
    jitter: input.metrics.jitter,
    upload: input.metrics.upload,
    download: input.metrics.download,
    share: input.share
  });
}

// The free-text readme never makes it into a report
function toClientInfo(raw: IPInfoResponse): ClientInfo {
  return {
    ip: raw.ip,
    hostname: raw.hostname,
    city: raw.city,
    region: raw.region,
    country: raw.country,
    loc: raw.loc,
    org: raw.org,
    postal: raw.postal,
    timezone: raw.timezone
  };
}

export function toFlatReport(report: Report): FlatReport {
  return {
    timestamp: report.timestamp.toISOString(),
    server_name: report.server.name,
    address: report.server.url,
    ping: report.ping,
    jitter: report.jitter,
    download: report.download,
    upload: report.upload,
    bytes_received: report.bytes_received,
    bytes_sent: report.bytes_sent,
    share: report.share,
    ip: report.client.ip ?? ''
  };
}
