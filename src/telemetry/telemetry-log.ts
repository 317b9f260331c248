import { TelemetryLevel } from './levels';

/**
 * Per-server diagnostic log that is shipped with a telemetry submission.
 * Nothing is captured below the `full` level.
 */
export class TelemetryLog {
  private level: TelemetryLevel = TelemetryLevel.DISABLED;
  private entries: string[] = [];

  /** Starts a fresh log at the given level. */
  setLevel(level: TelemetryLevel): void {
    this.level = level;
    this.entries = [];
  }

  getLevel(): TelemetryLevel {
    return this.level;
  }

  info(message: string): void {
    if (this.level >= TelemetryLevel.FULL) {
      this.append(message);
    }
  }

  debug(message: string): void {
    if (this.level >= TelemetryLevel.DEBUG) {
      this.append(message);
    }
  }

  toString(): string {
    return this.entries.join('\n');
  }

  private append(message: string): void {
    this.entries.push(`${new Date().toISOString()}: ${message}`);
  }
}
