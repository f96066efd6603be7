import type { FileAnalysis, ProjectStats, ProjectSummary } from '@pyscope/parser';

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * What `pyscope analyze` prints: one entry per analyzed file plus totals.
 * `stats` is only present when a directory was scanned.
 */
export interface AnalysisReport {
  target: string;
  analyses: FileAnalysis[];
  summary: ProjectSummary;
  stats?: ProjectStats;
}

export interface FormatOptions {
  /** Append each file's Mermaid class diagram */
  diagram?: boolean;
}
