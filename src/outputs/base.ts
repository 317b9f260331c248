import { Report } from '../reporting/types';

export interface ReportOutput {
  /** Text to emit as soon as one server's report is ready, if any. */
  writeReport(report: Report): string | null;
  /** Text to emit once every server has been tested, if any. */
  finalize(reports: readonly Report[]): string | null;
}
