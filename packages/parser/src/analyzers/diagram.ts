import type { StructureAnalysis } from './types.js';

const INDENT = '    ';

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Render a structure result as a Mermaid class diagram.
 *
 * Output is a pure function of the result: inheritance edges first (in
 * inheritance-tree order), then per class its box with sorted members
 * followed by its association edges to local, non-base dependencies.
 */
export function renderDiagram(result: StructureAnalysis): string {
  if (!result.success) {
    return `classDiagram\n${INDENT}note "Analysis failed: ${result.message}"`;
  }

  const lines = ['classDiagram'];
  const { classes, inheritanceTree } = result;

  for (const [base, children] of inheritanceTree) {
    for (const child of children) {
      if (classes.has(child)) {
        lines.push(`${INDENT}${base} <|-- ${child}`);
      }
    }
  }

  for (const info of classes.values()) {
    lines.push(`${INDENT}class ${info.name} {`);
    for (const variable of [...info.instanceVars].sort(byName)) {
      lines.push(`${INDENT}${INDENT}+${variable}`);
    }
    for (const method of [...info.methods].sort(byName)) {
      lines.push(`${INDENT}${INDENT}+${method}()`);
    }
    lines.push(`${INDENT}}`);

    for (const dependency of info.dependencies) {
      if (info.bases.includes(dependency)) continue;
      if (!classes.has(dependency)) continue;
      lines.push(`${INDENT}${info.name} --> ${dependency}`);
    }
  }

  return lines.join('\n');
}
