import { createObjectCsvStringifier } from 'csv-writer';
import { ReportOutput } from './base';
import { Report } from '../reporting/types';
import { toFlatReport } from '../reporting/report';
import { Logger } from '../utils/logger';
import { errorMessage } from '../core/errors';

export const CSV_DELIMITERS = [',', ';'];

export const CSV_COLUMNS = [
  { id: 'timestamp', title: 'Timestamp' },
  { id: 'server_name', title: 'Server Name' },
  { id: 'address', title: 'Address' },
  { id: 'ping', title: 'Ping' },
  { id: 'jitter', title: 'Jitter' },
  { id: 'download', title: 'Download' },
  { id: 'upload', title: 'Upload' },
  { id: 'bytes_received', title: 'Bytes Received' },
  { id: 'bytes_sent', title: 'Bytes Sent' },
  { id: 'share', title: 'Share' },
  { id: 'ip', title: 'IP' }
];

/** Headerless CSV rows, one per report, written after the run. */
export class CSVOutput implements ReportOutput {
  private delimiter: string;
  private logger: Logger;

  constructor(delimiter: string, logger: Logger) {
    this.delimiter = delimiter;
    this.logger = logger;
  }

  writeReport(): string | null {
    return null;
  }

  finalize(reports: readonly Report[]): string | null {
    try {
      if (reports.length === 0) {
        return '';
      }
      return this.createStringifier().stringifyRecords(reports.map(toFlatReport));
    } catch (error) {
      this.logger.error(`Error generating CSV report: ${errorMessage(error)}`);
      return null;
    }
  }

  header(): string {
    return this.createStringifier().getHeaderString() ?? '';
  }

  private createStringifier() {
    return createObjectCsvStringifier({
      header: CSV_COLUMNS,
      fieldDelimiter: this.delimiter
    });
  }
}
