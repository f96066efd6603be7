import type { Thresholds } from '../config/schema.js';
import type { ClassComplexity, RiskArea, RiskKind, RiskMetric } from './types.js';

export interface RiskReport {
  riskAreas: RiskArea[];
  /** `suggestions[i]` belongs to `riskAreas[i]` */
  suggestions: string[];
}

interface RiskCheck<T> {
  kind: RiskKind;
  metric: RiskMetric;
  issue: string;
  advice: string;
  value: (subject: T) => number;
  threshold: (thresholds: Thresholds) => number;
}

const CLASS_CHECKS: RiskCheck<ClassComplexity>[] = [
  {
    kind: 'class',
    metric: 'methodCount',
    issue: 'too many methods',
    advice: 'Consider splitting into multiple classes',
    value: cls => cls.methodCount,
    threshold: t => t.class.methods,
  },
  {
    kind: 'class',
    metric: 'totalLineCount',
    issue: 'excessive class size',
    advice: 'Consider extracting functionality',
    value: cls => cls.totalLineCount,
    threshold: t => t.class.lines,
  },
];

const METHOD_CHECKS: RiskCheck<{ cyclomaticComplexity: number; nestedDepth: number }>[] = [
  {
    kind: 'method',
    metric: 'cyclomaticComplexity',
    issue: 'high cyclomatic complexity',
    advice: 'Simplify method logic',
    value: method => method.cyclomaticComplexity,
    threshold: t => t.method.cyclomatic,
  },
  {
    kind: 'method',
    metric: 'nestedDepth',
    issue: 'deep nesting',
    advice: 'Refactor to reduce nesting',
    value: method => method.nestedDepth,
    threshold: t => t.method.nesting,
  },
];

/**
 * Compare class and method metrics against thresholds.
 *
 * Emits in class order; each class's own checks come before its methods'.
 * A metric is a risk only when strictly above its threshold.
 */
export function classifyRisks(
  classes: Iterable<ClassComplexity>,
  thresholds: Thresholds,
): RiskReport {
  const report: RiskReport = { riskAreas: [], suggestions: [] };

  const apply = <T>(checks: RiskCheck<T>[], subject: T, location: string) => {
    for (const check of checks) {
      const value = check.value(subject);
      const threshold = check.threshold(thresholds);
      if (value <= threshold) continue;

      report.riskAreas.push({
        kind: check.kind,
        location,
        issue: check.issue,
        metric: check.metric,
        value,
        threshold,
      });
      report.suggestions.push(`${location}: ${check.advice}`);
    }
  };

  for (const cls of classes) {
    apply(CLASS_CHECKS, cls, cls.name);
    for (const [methodName, method] of cls.methods) {
      apply(METHOD_CHECKS, method, `${cls.name}.${methodName}`);
    }
  }

  return report;
}
