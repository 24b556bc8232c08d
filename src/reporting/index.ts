export { CsvReportSink, CSV_COLUMNS, toCsvRow, toCsvLine, escapeCsvField } from './CsvReportSink.js';
export { TelegramClient } from './TelegramClient.js';
export type { TelegramClientConfig } from './TelegramClient.js';
export { TelegramReportSink } from './TelegramReportSink.js';
export {
  formatWindowMessage,
  formatStartupMessage,
  formatShutdownMessage,
  formatSessionSummary,
  formatUsd,
  formatSignedUsd,
  formatSignedPercent,
  escapeMarkdown,
} from './formatter.js';
export type { WindowReport, ReportSink, MessageSender } from './types.js';
export type { CsvReportSinkConfig } from './CsvReportSink.js';
