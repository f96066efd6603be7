import type Parser from 'tree-sitter';

/**
 * Split an import name entry into (qualified name, local alias).
 */
function readImportName(node: Parser.SyntaxNode): { name: string; alias: string } | null {
  if (node.type === 'dotted_name') {
    return { name: node.text, alias: node.text };
  }

  if (node.type === 'aliased_import') {
    const name = node.childForFieldName('name')?.text;
    const alias = node.childForFieldName('alias')?.text;
    if (!name) return null;
    return { name, alias: alias ?? name };
  }

  return null;
}

/**
 * Module path of a `from X import ...` statement. Relative markers are
 * dropped, so `from .models import User` resolves under `models`.
 */
function readFromModule(node: Parser.SyntaxNode): string {
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return '';
  return moduleNode.text.replace(/^\.+/, '');
}

/**
 * Map every imported local name to what it refers to.
 *
 * - `import os.path` → os.path: os.path
 * - `import numpy as np` → np: numpy
 * - `from app.models import User as U` → U: app.models.User
 * - `from app import *` → *: app.*
 *
 * Imports nested in functions or conditionals are included.
 */
export function extractImports(root: Parser.SyntaxNode): Map<string, string> {
  const imports = new Map<string, string>();

  for (const node of root.descendantsOfType(['import_statement', 'import_from_statement'])) {
    if (node.type === 'import_statement') {
      for (const entry of node.childrenForFieldName('name')) {
        const parsed = readImportName(entry);
        if (parsed) imports.set(parsed.alias, parsed.name);
      }
      continue;
    }

    const module = readFromModule(node);
    const wildcard = node.namedChildren.find(child => child.type === 'wildcard_import');
    if (wildcard) {
      imports.set('*', `${module}.*`);
      continue;
    }

    for (const entry of node.childrenForFieldName('name')) {
      const parsed = readImportName(entry);
      if (parsed) imports.set(parsed.alias, `${module}.${parsed.name}`);
    }
  }

  return imports;
}
