import { TelemetryLevelName } from '../config/types';

export enum TelemetryLevel { DISABLED = 0, BASIC = 1, FULL = 2, DEBUG = 3 }

const LEVELS: Record<TelemetryLevelName, TelemetryLevel> = {
  disabled: TelemetryLevel.DISABLED,
  basic: TelemetryLevel.BASIC,
  full: TelemetryLevel.FULL,
  debug: TelemetryLevel.DEBUG
};

export const TELEMETRY_LEVEL_NAMES: TelemetryLevelName[] = ['disabled', 'basic', 'full', 'debug'];

export function isTelemetryLevelName(value: unknown): value is TelemetryLevelName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseTelemetryLevel(name: string): TelemetryLevel {
  if (!isTelemetryLevelName(name)) {
    throw new Error(`Invalid telemetry level: ${name}. Valid levels: ${TELEMETRY_LEVEL_NAMES.join(', ')}`);
  }
  return LEVELS[name];
}
