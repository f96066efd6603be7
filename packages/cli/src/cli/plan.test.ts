import { describe, it, expect, beforeAll, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import chalk from 'chalk';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { planCommand } from './plan.js';

const MAPPING = `version: "1.0"
patterns:
  python:
    - pattern: "src/*.py"
      target: "app/{name}"
      priority: 1
  docs:
    - pattern: "*.md"
      target: "docs/{name}"
      priority: 1
special:
  ignore: []
validation:
  requiredDirs: [app]
`;

describe('planCommand', () => {
  let rootDir: string;
  let mappingDir: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let processExitSpy: MockInstance<Parameters<typeof process.exit>, never>;

  const write = (dir: string, relative: string, content: string) => {
    const file = path.join(dir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyscope-plan-'));
    mappingDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyscope-mapping-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(rootDir, { recursive: true, force: true });
    fs.rmSync(mappingDir, { recursive: true, force: true });
  });

  it('prints the plan for a project as JSON', async () => {
    write(rootDir, 'src/app.py', 'x = 1\n');
    write(rootDir, 'README.md', '# demo\n');
    const mapping = write(mappingDir, 'mapping.yml', MAPPING);

    await planCommand(rootDir, { mapping, format: 'json' });

    const parsed = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(parsed.moves).toEqual([
      { source: 'src/app.py', target: 'app/app.py', pattern: 'src/*.py' },
      { source: 'README.md', target: 'docs/README.md', pattern: '*.md' },
    ]);
    expect(parsed.creates).toEqual(['app', 'docs']);
    expect(parsed.summary.hasErrors).toBe(false);
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('exits 1 when two files would move to the same place', async () => {
    write(rootDir, 'src/app.py', 'x = 1\n');
    write(rootDir, 'lib/app.py', 'y = 2\n');
    const mapping = write(
      mappingDir,
      'mapping.yml',
      MAPPING.replace('"src/*.py"', '"**/*.py"'),
    );

    await planCommand(rootDir, { mapping, format: 'text' });

    const output = String(consoleLogSpy.mock.calls[0][0]);
    expect(output.split('\n')).toContain('  ✗ Duplicate target path app/app.py for files: lib/app.py and src/app.py');
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('exits 1 on an invalid mapping file', async () => {
    const mapping = write(mappingDir, 'mapping.yml', 'version: "1.0"\npatterns: {}\n');

    await planCommand(rootDir, { mapping, format: 'text' });

    expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(/^Error: Invalid mapping .*mapping\.yml:/);
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('rejects an unknown format', async () => {
    await planCommand(rootDir, { mapping: 'mapping.yml', format: 'xml' });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'Error: Invalid --format value "xml". Must be one of: text, json',
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('exits 1 when the directory does not exist', async () => {
    await planCommand(path.join(rootDir, 'missing'), { mapping: 'mapping.yml', format: 'text' });

    expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(/^Error: Path not found: /);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
