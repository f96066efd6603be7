import { formatTextReport } from './text.js';
import { formatJsonReport } from './json.js';
import type { AnalysisReport, FormatOptions, OutputFormat } from './types.js';

export { formatTextReport, formatJsonReport };
export { formatPlan, formatPlanText, formatPlanJson } from './plan.js';
export { OUTPUT_FORMATS } from './types.js';
export type { AnalysisReport, FormatOptions, OutputFormat } from './types.js';

/**
 * Format an analysis report in the requested format
 */
export function formatReport(
  report: AnalysisReport,
  format: OutputFormat,
  options: FormatOptions = {},
): string {
  switch (format) {
    case 'json':
      return formatJsonReport(report, options);
    case 'text':
    default:
      return formatTextReport(report, options);
  }
}
