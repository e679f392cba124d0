/**
 * Progress module exports
 */

export type { DepthReport, ProgressReporterOptions } from './reporter.js';
export { ProgressReporter } from './reporter.js';
export {
  formatConfigDisplay,
  formatCount,
  formatDepthLine,
  formatDepthStats,
  formatDuration,
  formatScore,
} from './formatters.js';
