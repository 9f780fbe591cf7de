export {
  CRITERION_LABELS,
  EXIT_CODES,
  exitCodeFor,
  formatReportJson,
  formatReportText,
  formatScoreLine,
  toReportDocument,
} from './format.js';
export type { ExitCode, ReportDocument, ScoreEntry } from './format.js';
