export { ProgressReporter, type BuildSummary } from './reporter.js';
export type { BuildPhase, ProgressReporterOptions } from './types.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatFileSize,
  formatProgressBar,
  formatPercentage,
} from './formatters.js';
