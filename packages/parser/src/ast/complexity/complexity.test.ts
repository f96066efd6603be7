import { describe, it, expect } from 'vitest';
import type Parser from 'tree-sitter';
import { parsePython } from '../parser.js';
import {
  calculateComplexity,
  calculateNestingDepth,
  calculateScopeComplexity,
  countExceptHandlers,
} from './index.js';

function parseRoot(source: string): Parser.SyntaxNode {
  const { tree } = parsePython(source);
  if (!tree) throw new Error('parse failed');
  return tree.rootNode;
}

function firstFunction(source: string): Parser.SyntaxNode {
  const [fn] = parseRoot(source).descendantsOfType('function_definition');
  return fn;
}

describe('calculateComplexity', () => {
  it('is 1 for straight-line code', () => {
    expect(calculateComplexity(firstFunction('def f():\n    return 1\n'))).toBe(1);
  });

  it('counts if, elif, for and while', () => {
    const fn = firstFunction(`def f(x):
    if x:
        pass
    elif x > 1:
        pass
    else:
        pass
    for i in x:
        while i:
            i -= 1
`);
    expect(calculateComplexity(fn)).toBe(5);
  });

  it('counts one per extra boolean operand', () => {
    const fn = firstFunction('def f(a, b, c, d):\n    return a and b and c or d\n');
    expect(calculateComplexity(fn)).toBe(4);
  });

  it('counts except handlers but not the try itself', () => {
    const fn = firstFunction(`def f():
    try:
        pass
    except ValueError:
        pass
    except KeyError:
        pass
    finally:
        pass
`);
    expect(calculateComplexity(fn)).toBe(3);
  });

  it('ignores conditional expressions and comprehension filters', () => {
    const fn = firstFunction('def f(xs):\n    return [x for x in xs if x] if xs else []\n');
    expect(calculateComplexity(fn)).toBe(1);
  });
});

describe('countExceptHandlers', () => {
  it('counts handlers of one try statement', () => {
    const [tryNode] = parseRoot('try:\n    pass\nexcept A:\n    pass\nexcept B:\n    pass\n').descendantsOfType(
      'try_statement',
    );
    expect(countExceptHandlers(tryNode)).toBe(2);
  });
});

describe('calculateNestingDepth', () => {
  it('is 0 without control structures', () => {
    expect(calculateNestingDepth(firstFunction('def f():\n    x = 1\n'))).toBe(0);
  });

  it('takes the deepest path, not the sum', () => {
    const fn = firstFunction(`def f(x):
    if x:
        for i in x:
            pass
    while x:
        pass
`);
    expect(calculateNestingDepth(fn)).toBe(2);
  });

  it('counts try blocks as a level', () => {
    const fn = firstFunction(`def f(x):
    try:
        if x:
            pass
    except Exception:
        pass
`);
    expect(calculateNestingDepth(fn)).toBe(2);
  });

  it('nests each elif one level below the previous branch', () => {
    const fn = firstFunction(`def f(x):
    if x == 1:
        pass
    elif x == 2:
        pass
    elif x == 3:
        pass
    elif x == 4:
        pass
    elif x == 5:
        pass
`);
    expect(calculateNestingDepth(fn)).toBe(5);
  });

  it('puts an else at the level of the last elif', () => {
    const fn = firstFunction(`def f(x):
    if x == 1:
        pass
    elif x == 2:
        pass
    else:
        for i in x:
            pass
`);
    expect(calculateNestingDepth(fn)).toBe(3);
  });

  it('keeps an else without elif at the level of its if', () => {
    const fn = firstFunction(`def f(x):
    if x:
        pass
    else:
        for i in x:
            pass
`);
    expect(calculateNestingDepth(fn)).toBe(2);
  });
});

describe('calculateScopeComplexity', () => {
  it('scores branches across the whole file without a baseline', () => {
    const root = parseRoot(`if a or b:
    pass

def f():
    try:
        pass
    except Exception:
        pass
`);
    // if + or + try
    expect(calculateScopeComplexity(root)).toEqual({ score: 3, faults: [] });
  });

  it('is 0 for a file without branches', () => {
    expect(calculateScopeComplexity(parseRoot('x = 1\n')).score).toBe(0);
  });
});
