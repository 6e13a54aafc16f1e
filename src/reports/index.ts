export { buildAnalysisReport, saveAnalysisReport } from './report';
export {
  buildListing,
  DEFAULT_SUMMARY_LIMITS,
  entriesOf,
  formatAnalysisSummary,
  formatListingLine,
  formatSelectionSummary
} from './format';

export type {
  AnalysisReport,
  ListingRow,
  ReportControl,
  ReportControllerSummary,
  ReportRoom,
  SummaryLimits
} from './types';
