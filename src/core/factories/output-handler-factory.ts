import { TestOptions } from '../../config/types';
import { ReportOutput } from '../../outputs/base';
import { CSVOutput } from '../../outputs/csv';
import { JSONOutput } from '../../outputs/json';
import { PlainOutput } from '../../outputs/plain';
import { Logger } from '../../utils/logger';

export type OutputFormat = 'csv' | 'json' | 'plain';

type OutputFlags = Pick<TestOptions, 'csv' | 'json'>;

/** CSV wins over JSON, JSON over plain text. */
export function selectOutputFormat(options: OutputFlags): OutputFormat {
  if (options.csv) return 'csv';
  if (options.json) return 'json';
  return 'plain';
}

export function createReportOutput(
  options: Pick<TestOptions, 'csv' | 'json' | 'csv_delimiter' | 'bytes' | 'binary_base'>,
  logger: Logger
): ReportOutput {
  switch (selectOutputFormat(options)) {
    case 'csv':
      return new CSVOutput(options.csv_delimiter, logger);
    case 'json':
      return new JSONOutput(logger);
    case 'plain':
      return new PlainOutput(options.bytes, options.binary_base);
  }
}
