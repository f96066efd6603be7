import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import { loadConfig, resolveConfigPath } from './loader.js';
import { DEFAULT_THRESHOLDS, resolveThresholds } from './schema.js';
import { ConfigError } from '../errors/index.js';

// Mock fs for loadConfig tests
vi.mock('fs', async () => {
  const actual = await vi.importActual<typeof import('fs')>('fs');
  return {
    ...actual,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

describe('loadConfig', () => {
  beforeEach(() => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  it('returns defaults when no config file exists', () => {
    const config = loadConfig('/fake/root');

    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.scan).toEqual({ exclude: [], respectGitignore: true });
  });

  it('returns defaults when the file is empty', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('');

    expect(loadConfig('/fake/root').thresholds.method.cyclomatic).toBe(10);
  });

  it('merges partial thresholds with defaults', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
thresholds:
  method:
    cyclomatic: 15
  class:
    methods: 8
scan:
  exclude:
    - "legacy/**"
`);

    const config = loadConfig('/fake/root');

    expect(config.thresholds.method).toEqual({
      cyclomatic: 15,
      lines: 50,
      parameters: 5,
      nesting: 3,
    });
    expect(config.thresholds.class).toEqual({ methods: 8, lines: 300, instanceVars: 10 });
    expect(config.thresholds.coupling).toBe(5);
    expect(config.scan.exclude).toEqual(['legacy/**']);
    expect(config.scan.respectGitignore).toBe(true);
  });

  it('throws ConfigError listing invalid fields', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
thresholds:
  method:
    cyclomatic: "high"
`);

    expect(() => loadConfig('/fake/root')).toThrow(ConfigError);
    expect(() => loadConfig('/fake/root')).toThrow(/thresholds\.method\.cyclomatic/);
  });

  it('throws ConfigError when the top level is not a mapping', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('- one\n- two\n');

    expect(() => loadConfig('/fake/root')).toThrow('.pyscope.yml must contain a mapping at the top level');
  });

  it('throws ConfigError on malformed YAML', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('thresholds: [unclosed');

    expect(() => loadConfig('/fake/root')).toThrow(/Failed to read \.pyscope\.yml/);
  });

  it('reads from the root directory', () => {
    expect(resolveConfigPath('/fake/root')).toBe('/fake/root/.pyscope.yml');
  });
});

describe('resolveThresholds', () => {
  it('returns defaults without overrides', () => {
    expect(resolveThresholds()).toEqual(DEFAULT_THRESHOLDS);
  });

  it('overrides nested fields individually', () => {
    const thresholds = resolveThresholds({ method: { nesting: 1 }, coupling: 2.5 });

    expect(thresholds.method).toEqual({ cyclomatic: 10, lines: 50, parameters: 5, nesting: 1 });
    expect(thresholds.class).toEqual(DEFAULT_THRESHOLDS.class);
    expect(thresholds.coupling).toBe(2.5);
    expect(thresholds.inheritance).toBe(3);
  });
});
