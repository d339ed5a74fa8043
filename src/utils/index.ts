export { default as logger } from './logger';
export { MatcherError } from './MatcherError';
export type { MatcherErrorKind } from './MatcherError';
export { consoleReportWriter, formatDay } from './output';
export type { ReportWriter } from './output';
