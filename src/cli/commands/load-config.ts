import { ConfigParser } from '../../config/parser';
import { resolveTestOptions } from '../../config/options';
import { selectServers } from '../../config/server-selection';
import {
  DistanceUnit, FileTestOptions, NetworkFamily, ServerDefinition, TelemetryConfig, TestOptions
} from '../../config/types';
import { TELEMETRY_LEVEL_NAMES } from '../../telemetry/levels';

export interface RunOptions {
  env?: string;
  server?: string[];
  exclude?: string[];
  download?: boolean;
  upload?: boolean;
  preAllocate?: boolean;
  concurrent?: string;
  chunks?: string;
  duration?: string;
  uploadSize?: string;
  bytes?: boolean;
  mebibytes?: boolean;
  distance?: string;
  source?: string;
  ipv4?: boolean;
  ipv6?: boolean;
  simple?: boolean;
  csv?: boolean;
  csvDelimiter?: string;
  json?: boolean;
  share?: boolean;
  telemetryLevel?: string;
  telemetryServer?: string;
  telemetryPath?: string;
  telemetryShare?: string;
  telemetryExtra?: string;
  verbose?: boolean;
}

export interface LoadedRun {
  servers: ServerDefinition[];
  options: TestOptions;
}

const DISTANCE_UNITS: readonly DistanceUnit[] = ['km', 'mi', 'NM'];

export async function loadRunConfig(configPath: string, cli: RunOptions): Promise<LoadedRun> {
  const parser = new ConfigParser();
  const config = await parser.parse(configPath, cli.env);

  const servers = selectServers(config.servers, parseIds(cli.server), parseIds(cli.exclude));
  const options = resolveTestOptions(config.options, toOverrides(cli), config.telemetry, telemetryOverrides(cli));

  if (cli.share && options.telemetry.level === 'disabled') {
    options.telemetry = { ...options.telemetry, level: 'basic' };
  }

  return { servers, options };
}

function toOverrides(cli: RunOptions): FileTestOptions {
  if (cli.ipv4 && cli.ipv6) {
    throw new Error('--ipv4 and --ipv6 cannot be used together');
  }

  return {
    no_download: cli.download === false ? true : undefined,
    no_upload: cli.upload === false ? true : undefined,
    no_preallocate: cli.preAllocate === false ? true : undefined,
    bytes: cli.bytes || undefined,
    binary_base: cli.mebibytes || undefined,
    concurrent: parseInteger(cli.concurrent, '--concurrent'),
    chunks: parseInteger(cli.chunks, '--chunks'),
    upload_size: parseInteger(cli.uploadSize, '--upload-size'),
    duration: cli.duration,
    distance_unit: cli.distance === undefined ? undefined : parseChoice(cli.distance, DISTANCE_UNITS, 'distance unit'),
    source_address: cli.source,
    network: parseNetwork(cli),
    simple: cli.simple || undefined,
    csv: cli.csv || undefined,
    json: cli.json || undefined,
    csv_delimiter: cli.csvDelimiter,
    telemetry_extra: cli.telemetryExtra
  };
}

function telemetryOverrides(cli: RunOptions): Partial<TelemetryConfig> {
  return {
    level: cli.telemetryLevel === undefined
      ? undefined
      : parseChoice(cli.telemetryLevel, TELEMETRY_LEVEL_NAMES, 'telemetry level'),
    server: cli.telemetryServer,
    path: cli.telemetryPath,
    share: cli.telemetryShare
  };
}

function parseNetwork(cli: RunOptions): NetworkFamily | undefined {
  if (cli.ipv4) return 'ip4';
  if (cli.ipv6) return 'ip6';
  return undefined;
}

function parseIds(values?: string[]): number[] {
  return (values ?? [])
    .flatMap(value => value.split(','))
    .map(value => value.trim())
    .filter(value => value.length > 0)
    .map(value => {
      const id = Number(value);
      if (!Number.isInteger(id)) {
        throw new Error(`Invalid server id: ${value}`);
      }
      return id;
    });
}

function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got '${value}'`);
  }
  return parsed;
}

function parseChoice<T extends string>(value: string, choices: readonly T[], name: string): T {
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new Error(`Invalid ${name}: ${value}. Valid values: ${choices.join(', ')}`);
  }
  return match;
}
