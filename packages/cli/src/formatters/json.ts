import { literalToValue, renderDiagram } from '@pyscope/parser';
import type {
  ComplexityAnalysis,
  ConfigAnalysis,
  FailureKind,
  FileAnalysis,
  PyscopeError,
  StructureAnalysis,
} from '@pyscope/parser';
import type { AnalysisReport, FormatOptions } from './types.js';

function failureToJson(result: { failureKind: FailureKind; message: string; error: PyscopeError }) {
  return { success: false, failureKind: result.failureKind, code: result.error.code, message: result.message };
}

function structureToJson(result: StructureAnalysis) {
  if (!result.success) return failureToJson(result);

  const classes = [...result.classes.values()].map(info => ({
    ...info,
    instanceVars: [...info.instanceVars],
    dependencies: [...info.dependencies],
  }));

  return {
    success: true,
    classes,
    inheritanceTree: Object.fromEntries(result.inheritanceTree),
    imports: Object.fromEntries(result.imports),
  };
}

function complexityToJson(result: ComplexityAnalysis) {
  if (!result.success) return failureToJson(result);

  const classes = [...result.classes.values()].map(cls => ({
    ...cls,
    methods: [...cls.methods.values()],
  }));

  return {
    success: true,
    totalComplexity: result.totalComplexity,
    globalScopeComplexity: result.globalScopeComplexity,
    classes,
    riskAreas: result.riskAreas.map((risk, i) => ({ ...risk, suggestion: result.suggestions[i] })),
    visitFaults: result.visitFaults.map(({ nodeType, line, message }) => ({ nodeType, line, message })),
  };
}

function configToJson(result: ConfigAnalysis) {
  if (!result.success) return failureToJson(result);

  return {
    success: true,
    totalItems: result.totalItems,
    configItems: result.configItems.map(item => ({
      ...item,
      value: literalToValue(item.value),
      valueKind: item.value.kind,
    })),
  };
}

function fileToJson(analysis: FileAnalysis, options: FormatOptions) {
  return {
    path: analysis.path,
    structure: structureToJson(analysis.structure),
    complexity: complexityToJson(analysis.complexity),
    config: configToJson(analysis.config),
    ...(options.diagram ? { diagram: renderDiagram(analysis.structure) } : {}),
  };
}

/**
 * Format an analysis report as JSON. Maps and sets become plain objects
 * and arrays; each risk area carries its suggestion.
 */
export function formatJsonReport(report: AnalysisReport, options: FormatOptions = {}): string {
  return JSON.stringify(
    {
      target: report.target,
      summary: report.summary,
      ...(report.stats ? { stats: report.stats } : {}),
      files: report.analyses.map(analysis => fileToJson(analysis, options)),
    },
    null,
    2,
  );
}
