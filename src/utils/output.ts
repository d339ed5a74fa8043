/**
 * Destination for the run report.
 *
 * Report lines are the tool's actual output and stay on stdout,
 * separate from winston diagnostics which go to stderr and the log file.
 */
export interface ReportWriter {
  line(text: string): void;
  error(text: string): void;
}

export const consoleReportWriter: ReportWriter = {
  line: (text: string): void => {
    process.stdout.write(`${text}\n`);
  },
  error: (text: string): void => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Formats a calendar day as YYYY-MM-DD.
 */
export function formatDay(day: Date): string {
  return day.toISOString().slice(0, 10);
}
