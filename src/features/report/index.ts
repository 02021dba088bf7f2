export { summarizeState, formatStateList, formatStateBlock, formatReport } from './report';
export { formatFixed, formatInstant, average, NOT_AVAILABLE } from './helpers';
export type { StateSummary, ReportOptions } from './types';
