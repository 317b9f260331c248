import { ReportOutput } from './base';
import { Report } from '../reporting/types';
import { formatRate } from '../utils/units';

export class PlainOutput implements ReportOutput {
  private bytes: boolean;
  private binaryBase: boolean;

  constructor(bytes: boolean, binaryBase: boolean) {
    this.bytes = bytes;
    this.binaryBase = binaryBase;
  }

  writeReport(report: Report): string {
    const lines = [
      `Ping:\t${report.ping.toFixed(2)} ms\tJitter:\t${report.jitter.toFixed(2)} ms`,
      `Download rate:\t${formatRate(report.download, this.bytes, this.binaryBase)}`,
      `Upload rate:\t${formatRate(report.upload, this.bytes, this.binaryBase)}`
    ];
    if (report.share) {
      lines.push(`Share your result:\t${report.share}`);
    }
    return `${lines.join('\n')}\n`;
  }

  finalize(): string | null {
    return null;
  }
}
