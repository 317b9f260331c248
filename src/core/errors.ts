export type TestPhase = 'resolve_url' | 'isp_info' | 'ping' | 'download' | 'upload';

const PHASE_DESCRIPTIONS: Record<TestPhase, string> = {
  resolve_url: 'Failed to get server URL',
  isp_info: 'Failed to get IP info',
  ping: 'Failed to get ping and jitter',
  download: 'Failed to get download speed',
  upload: 'Failed to get upload speed'
};

/** A hard failure: the whole run stops and no reports are returned. */
export class SpeedTestError extends Error {
  readonly phase: TestPhase;
  readonly server: string;

  constructor(phase: TestPhase, server: string, cause: unknown) {
    super(`${PHASE_DESCRIPTIONS[phase]} (${server}): ${errorMessage(cause)}`, { cause });
    this.name = 'SpeedTestError';
    this.phase = phase;
    this.server = server;
  }
}

export class TelemetryError extends Error {
  readonly responseBody?: string;

  constructor(message: string, responseBody?: string) {
    super(message);
    this.name = 'TelemetryError';
    this.responseBody = responseBody;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
