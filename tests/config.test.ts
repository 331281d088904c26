import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CONFIG_FILE, ConfigError, DEFAULT_CONFIG, loadConfig, resolveConfig, validateConfig } from '../src/config';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('validateConfig', () => {
  it('normalizes single names into lists', () => {
    expect(validateConfig({ languages: 'ini', maxCandidates: 5 })).toEqual({ languages: ['ini'], maxCandidates: 5 });
  });

  it('reports every invalid field in a fixed order', () => {
    expect(problemsOf(() => validateConfig({ catalogueDir: 1, maxDepth: 0, failFast: 'yes', styles: [1] }))).toEqual([
      'catalogueDir must be a string',
      'styles must be a string or string[]',
      'maxDepth must be a positive integer',
      'failFast must be a boolean',
    ]);
  });

  it('rejects a configuration that is not an object', () => {
    expect(problemsOf(() => validateConfig([]))).toEqual(['configuration must be a JSON object']);
  });
});

describe('resolveConfig', () => {
  it('starts from the defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.maxDepth).toBe(64);
  });

  it('lets later layers override only what they set', () => {
    const config = resolveConfig({ outDir: 'a', maxDepth: 3 }, null, { outDir: 'b', maxDepth: undefined });
    expect(config.outDir).toBe('b');
    expect(config.maxDepth).toBe(3);
    expect(config.catalogueDir).toBe('./catalogue');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lang-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns null when the default file is absent', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('fails when an explicit file is absent', () => {
    expect(problemsOf(() => loadConfig(dir, 'custom.json'))).toEqual(['file does not exist']);
  });

  it('reads and validates the default file', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify({ outDir: 'out', failFast: true }));
    expect(loadConfig(dir)).toEqual({ outDir: 'out', failFast: true });
  });

  it('reports malformed JSON', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), '{ outDir: ');
    const problems = problemsOf(() => loadConfig(dir));
    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith('invalid JSON: ')).toBe(true);
  });
});
