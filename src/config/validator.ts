import { ServerDefinition, TestOptions } from './types';
import { isTelemetryLevelName, TELEMETRY_LEVEL_NAMES } from '../telemetry/levels';
import { CSV_DELIMITERS } from '../outputs/csv';

const DISTANCE_UNITS = ['km', 'mi', 'NM'];
const NETWORKS = ['ip', 'ip4', 'ip6'];
const ENDPOINT_FIELDS = ['dlURL', 'ulURL', 'pingURL', 'getIpURL'] as const;

export class ConfigValidator {
  validate(servers: ServerDefinition[], options: TestOptions): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!servers || servers.length === 0) {
      errors.push('At least one server must be configured');
    } else {
      this.validateServers(servers, errors);
    }

    this.validateOptions(options, errors, warnings);
    this.validateTelemetry(options, errors);

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  private validateServers(servers: ServerDefinition[], errors: string[]): void {
    const seen = new Set<number>();

    servers.forEach((server, index) => {
      if (typeof server.id !== 'number') {
        errors.push(`Server at index ${index} must have a numeric id`);
      } else if (seen.has(server.id)) {
        errors.push(`Duplicate server id ${server.id}`);
      } else {
        seen.add(server.id);
      }

      if (!server.name) {
        errors.push(`Server at index ${index} must have a name`);
      }

      const label = server.name || `at index ${index}`;
      if (!server.server) {
        errors.push(`Server '${label}' must have a server URL`);
      } else if (!isParsableUrl(server.server.startsWith('//') ? `https:${server.server}` : server.server)) {
        errors.push(`Server '${label}' has an invalid URL: ${server.server}`);
      }

      for (const field of ENDPOINT_FIELDS) {
        if (typeof server[field] !== 'string') {
          errors.push(`Server '${label}' must have ${field}`);
        }
      }
    });
  }

  private validateOptions(options: TestOptions, errors: string[], warnings: string[]): void {
    for (const key of ['concurrent', 'chunks', 'upload_size'] as const) {
      if (!Number.isInteger(options[key]) || options[key] < 1) {
        errors.push(`${key} must be a positive integer, got ${options[key]}`);
      }
    }

    if (!(options.duration > 0)) {
      errors.push(`duration must be positive, got ${options.duration}ms`);
    }

    if (!DISTANCE_UNITS.includes(options.distance_unit)) {
      errors.push(`Invalid distance unit: ${options.distance_unit}. Valid units: ${DISTANCE_UNITS.join(', ')}`);
    }

    if (!NETWORKS.includes(options.network)) {
      errors.push(`Invalid network: ${options.network}. Valid networks: ${NETWORKS.join(', ')}`);
    }

    if (!CSV_DELIMITERS.includes(options.csv_delimiter)) {
      errors.push(`Invalid CSV delimiter '${options.csv_delimiter}'. Valid delimiters: ${CSV_DELIMITERS.join(' ')}`);
    }

    if (options.csv && options.json) {
      warnings.push('Both CSV and JSON output requested; only CSV will be produced');
    }

    if (options.no_download && options.no_upload) {
      warnings.push('Both download and upload tests are disabled');
    }
  }

  private validateTelemetry(options: TestOptions, errors: string[]): void {
    const { level, server } = options.telemetry;

    if (!isTelemetryLevelName(level)) {
      errors.push(`Invalid telemetry level: ${level}. Valid levels: ${TELEMETRY_LEVEL_NAMES.join(', ')}`);
      return;
    }

    if (level !== 'disabled') {
      if (!server) {
        errors.push(`Telemetry level '${level}' requires a telemetry server`);
      } else if (!isParsableUrl(server)) {
        errors.push(`Invalid telemetry server URL: ${server}`);
      }
    }
  }
}

function isParsableUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
