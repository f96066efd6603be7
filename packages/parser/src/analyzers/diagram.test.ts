import { describe, it, expect } from 'vitest';
import { StructureAnalyzer } from './class-analyzer.js';
import { renderDiagram } from './diagram.js';

const analyzer = new StructureAnalyzer();

describe('renderDiagram', () => {
  it('renders inheritance edges, then each box followed by its associations', () => {
    const result = analyzer.analyze(`class Animal:
    sound = None
    def speak(self): pass

class Dog(Animal):
    name = "rex"
    age = 3
    def fetch_Bone(self): pass
    def bark(self): pass

class Bone:
    pass
`);

    expect(renderDiagram(result)).toBe(
      [
        'classDiagram',
        '    Animal <|-- Dog',
        '    class Animal {',
        '        +sound',
        '        +speak()',
        '    }',
        '    class Dog {',
        '        +age',
        '        +name',
        '        +bark()',
        '        +fetch_Bone()',
        '    }',
        '    Dog --> Bone',
        '    class Bone {',
        '    }',
      ].join('\n'),
    );
  });

  it('contains the edge for a simple subclass', () => {
    const result = analyzer.analyze('class A:\n    pass\n\nclass B(A):\n    def f(self):\n        pass\n');

    expect(renderDiagram(result).split('\n')).toContain('    A <|-- B');
  });

  it('draws edges from external bases but no association to them', () => {
    const result = analyzer.analyze('class View(django.View):\n    pass\n');

    expect(renderDiagram(result)).toBe(
      ['classDiagram', '    django.View <|-- View', '    class View {', '    }'].join('\n'),
    );
  });

  it('renders a placeholder for a failed analysis', () => {
    const result = analyzer.analyze('def broken(:\n');
    if (result.success) throw new Error('expected failure');

    expect(renderDiagram(result)).toBe(
      `classDiagram\n    note "Analysis failed: ${result.message}"`,
    );
  });

  it('is deterministic for the same result', () => {
    const result = analyzer.analyze('class A:\n    x = 1\n\nclass B(A):\n    y = 2\n');

    expect(renderDiagram(result)).toBe(renderDiagram(result));
  });
});
