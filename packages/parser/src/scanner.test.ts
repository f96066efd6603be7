import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { analyzeFile, createAnalyzers, detectFileType, scanProject, sizeBucket } from './scanner.js';
import { defaultConfig, pyscopeConfigSchema } from './config/schema.js';
import { ParseError, PyscopeErrorCode, isPyscopeError } from './errors/index.js';
import { silentLogger } from './logger.js';

describe('detectFileType', () => {
  it.each([
    ['app/models.py', 'python'],
    ['settings.yaml', 'config'],
    ['setup.cfg', 'config'],
    ['README.md', 'docs'],
    ['notes.rst', 'docs'],
    ['.gitignore', 'git'],
    ['.gitattributes', 'git'],
    ['models.cpython-311.pyc', 'compiled'],
    ['__pycache__/stale', 'compiled'],
    ['Makefile', 'other'],
  ])('%s → %s', (file, expected) => {
    expect(detectFileType(file)).toBe(expected);
  });
});

describe('sizeBucket', () => {
  it('splits at 10 KiB and 100 KiB', () => {
    expect(sizeBucket(10 * 1024 - 1)).toBe('small');
    expect(sizeBucket(10 * 1024)).toBe('medium');
    expect(sizeBucket(100 * 1024 - 1)).toBe('medium');
    expect(sizeBucket(100 * 1024)).toBe('large');
  });
});

describe('scanProject', () => {
  let rootDir: string;

  const write = (relative: string, content: string) => {
    const file = path.join(rootDir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyscope-scan-'));
    write('app/models.py', 'class Base:\n    pass\n\nclass User(Base):\n    def save(self):\n        pass\n');
    write('app/broken.py', 'def broken(:\n');
    write('README.md', '# sample\n');
    write('config.yml', 'debug: true\n');
    write('.gitignore', 'build/\n');
    write('build/generated.py', 'x = 1\n');
    write('node_modules/pkg/index.py', 'y = 2\n');
    write('__pycache__/models.cpython-311.pyc', 'compiled');
    write('data.bin', 'raw');
    write('tools/migrate.py', 'z = 3\n');
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('classifies files and skips ignored paths', async () => {
    const project = await scanProject(rootDir, { utilityDir: 'tools' });

    expect(project.stats.totalFiles).toBe(7);
    expect(project.stats.totalDirs).toBe(1);
    expect(project.stats.byType).toEqual({ python: 2, config: 1, docs: 1, git: 1, compiled: 1, other: 1 });
    expect(project.stats.bySize).toEqual({ small: 7, medium: 0, large: 0 });
    expect(project.files.python.map(file => file.path)).toEqual(['app/broken.py', 'app/models.py']);
  });

  it('keeps one result per Python file', async () => {
    const project = await scanProject(rootDir, { utilityDir: 'tools' });

    expect(project.analyses.map(analysis => [analysis.path, analysis.structure.success])).toEqual([
      ['app/broken.py', false],
      ['app/models.py', true],
    ]);
    expect(project.summary).toEqual({
      pythonFiles: 2,
      analyzedFiles: 1,
      failedFiles: 1,
      classCount: 2,
      riskCount: 0,
      totalComplexity: project.analyses[1].complexity.totalComplexity,
    });
  });

  it('includes gitignored files when gitignore is not respected', async () => {
    const config = pyscopeConfigSchema.parse({ scan: { respectGitignore: false } });
    const project = await scanProject(rootDir, { config, utilityDir: 'tools' });

    expect(project.files.python.map(file => file.path)).toEqual([
      'app/broken.py',
      'app/models.py',
      'build/generated.py',
    ]);
  });

  it('applies configured exclude patterns', async () => {
    const config = pyscopeConfigSchema.parse({ scan: { exclude: ['**/broken.py', 'tools/**'] } });
    const project = await scanProject(rootDir, { config });

    expect(project.files.python.map(file => file.path)).toEqual(['app/models.py']);
  });

  it('rejects a missing root directory', async () => {
    const missing = path.join(rootDir, 'does-not-exist');

    await expect(scanProject(missing)).rejects.toSatisfy(
      error => isPyscopeError(error) && error.code === PyscopeErrorCode.FILE_NOT_READABLE,
    );
  });
});

describe('analyzeFile', () => {
  it('turns an unreadable file into parse failures', async () => {
    const analyzers = createAnalyzers(defaultConfig, silentLogger);
    const missing = path.join(os.tmpdir(), 'pyscope-missing', 'gone.py');

    const analysis = await analyzeFile(missing, analyzers, silentLogger, 'gone.py');

    expect(analysis.structure.success).toBe(false);
    if (analysis.structure.success) return;
    expect(analysis.structure.failureKind).toBe('parse');
    expect(analysis.structure.message).toMatch(/^Failed to read gone\.py: /);
    expect(analysis.structure.error).toBeInstanceOf(ParseError);
    expect(analysis.structure.error.file).toBe('gone.py');
    expect(analysis.complexity.success).toBe(false);
    expect(analysis.config.success).toBe(false);
  });
});
