import { describe, it, expect } from 'vitest';
import { createFailedAnalysis, createShapesAnalysis, createTestSummary } from '../test-helpers.js';
import { formatJsonReport } from './json.js';
import { formatReport } from './index.js';
import type { AnalysisReport } from './types.js';

function createReport(): AnalysisReport {
  return {
    target: 'src',
    analyses: [createShapesAnalysis(), createFailedAnalysis()],
    summary: createTestSummary(),
  };
}

describe('formatJsonReport', () => {
  it('produces valid JSON with the summary', () => {
    const parsed = JSON.parse(formatJsonReport(createReport()));

    expect(parsed.target).toBe('src');
    expect(parsed.summary).toEqual(createTestSummary());
    expect(parsed).not.toHaveProperty('stats');
    expect(parsed.files).toHaveLength(2);
  });

  it('turns structure maps and sets into objects and arrays', () => {
    const [shapes] = JSON.parse(formatJsonReport(createReport())).files;

    expect(shapes.structure.classes[0]).toEqual({
      name: 'Shape',
      bases: [],
      methods: ['area'],
      instanceVars: ['sides'],
      dependencies: [],
      lineCount: 4,
      startLine: 3,
      endLine: 6,
      docstring: null,
      enclosingClass: null,
    });
    expect(shapes.structure.inheritanceTree).toEqual({ Shape: ['Square'] });
    expect(shapes.structure.imports).toEqual({ math: 'math' });
  });

  it('pairs each risk area with its suggestion', () => {
    const [shapes] = JSON.parse(formatJsonReport(createReport())).files;

    expect(shapes.complexity.riskAreas).toEqual([
      {
        kind: 'method',
        location: 'Square.area',
        issue: 'high cyclomatic complexity',
        metric: 'cyclomaticComplexity',
        value: 12,
        threshold: 10,
        suggestion: 'Square.area: Simplify method logic',
      },
    ]);
    expect(shapes.complexity.classes[1].methods[0].cyclomaticComplexity).toBe(12);
  });

  it('decodes configuration values', () => {
    const [shapes] = JSON.parse(formatJsonReport(createReport())).files;

    expect(shapes.config.configItems[0]).toEqual({
      name: 'MAX_SIDES',
      value: 4,
      valueKind: 'integer',
      location: 'module',
      context: 'module',
      lineNumber: 1,
      suggestion: "Consider making 'MAX_SIDES' configurable",
    });
  });

  it('reports failures without tables', () => {
    const [, broken] = JSON.parse(formatJsonReport(createReport())).files;

    expect(broken.structure).toEqual({
      success: false,
      failureKind: 'parse',
      code: 'PARSE_FAILED',
      message: 'invalid syntax at line 1',
    });
  });

  it('adds diagrams only when asked', () => {
    const plain = JSON.parse(formatJsonReport(createReport())).files[0];
    const withDiagram = JSON.parse(formatJsonReport(createReport(), { diagram: true })).files[0];

    expect(plain).not.toHaveProperty('diagram');
    expect(withDiagram.diagram.split('\n')[1]).toBe('    Shape <|-- Square');
  });
});

describe('formatReport', () => {
  it('dispatches on the format', () => {
    const report = createReport();

    expect(formatReport(report, 'json')).toBe(formatJsonReport(report));
    expect(formatReport(report, 'text')).toContain('🔍 Python Analysis');
  });
});
