/**
 * Tests for engine defaults and environment configuration
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ENGINE_DEFAULTS, FIELD_DEFAULTS, ENV_VARS, loadEnv, resolveEngineConfig } from './index.js';

describe('Configuration Constants', () => {
  describe('ENGINE_DEFAULTS', () => {
    it('has sensible default values', () => {
      expect(ENGINE_DEFAULTS.MAX_DEPTH).toBe(1000);
      expect(ENGINE_DEFAULTS.INDENT).toBe('\t');
      expect(ENGINE_DEFAULTS.ROOT_MARKERS).toEqual(['kicad_symbol_lib']);
      expect(ENGINE_DEFAULTS.TRAILING_ATOMS).toBe('own-line');
    });

    it('always supports at least 100 levels of nesting', () => {
      expect(ENGINE_DEFAULTS.MIN_DEPTH).toBe(100);
      expect(ENGINE_DEFAULTS.MAX_DEPTH).toBeGreaterThanOrEqual(ENGINE_DEFAULTS.MIN_DEPTH);
    });
  });

  describe('FIELD_DEFAULTS', () => {
    it('has sensible default values', () => {
      expect(FIELD_DEFAULTS.STROKE_WIDTH).toBe(0.254);
      expect(FIELD_DEFAULTS.COORDINATE).toBe(0);
      expect(FIELD_DEFAULTS.VALUE_INDEX).toBe(1);
    });
  });
});

describe('resolveEngineConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(resolveEngineConfig({})).toEqual({
      maxDepth: 1000,
      indent: '\t',
      rootMarkers: ['kicad_symbol_lib'],
      logLevel: 'info',
    });
  });

  it('reads the max depth and clamps it to the minimum', () => {
    expect(resolveEngineConfig({ [ENV_VARS.MAX_DEPTH]: '2000' }).maxDepth).toBe(2000);
    expect(resolveEngineConfig({ [ENV_VARS.MAX_DEPTH]: '50' }).maxDepth).toBe(100);
  });

  it('ignores unreadable max depths', () => {
    expect(resolveEngineConfig({ SEXPR_MAX_DEPTH: 'deep' }).maxDepth).toBe(1000);
    expect(resolveEngineConfig({ SEXPR_MAX_DEPTH: '-5' }).maxDepth).toBe(1000);
  });

  it('reads the indent as tab or a count of spaces', () => {
    expect(resolveEngineConfig({ SEXPR_INDENT: '4' }).indent).toBe('    ');
    expect(resolveEngineConfig({ SEXPR_INDENT: 'TAB' }).indent).toBe('\t');
    expect(resolveEngineConfig({ SEXPR_INDENT: '12' }).indent).toBe('\t');
    expect(resolveEngineConfig({ SEXPR_INDENT: '0' }).indent).toBe('\t');
  });

  it('reads comma-separated root markers', () => {
    expect(resolveEngineConfig({ SEXPR_ROOT_MARKERS: ' kicad_pcb , ,kicad_sch' }).rootMarkers).toEqual([
      'kicad_pcb',
      'kicad_sch',
    ]);
    expect(resolveEngineConfig({ SEXPR_ROOT_MARKERS: '' }).rootMarkers).toEqual([]);
  });

  it('reads the log level', () => {
    expect(resolveEngineConfig({ SEXPR_LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(resolveEngineConfig({ SEXPR_LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });
});

describe('loadEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sexpr-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads .env then .env.local into the target', () => {
    writeFileSync(join(dir, '.env'), 'SEXPR_MAX_DEPTH=500\nSEXPR_INDENT=2\n');
    writeFileSync(join(dir, '.env.local'), 'SEXPR_INDENT=tab\n');
    const target: Record<string, string> = {};

    const result = loadEnv({ baseDir: dir, target });

    expect(result).toEqual({
      loaded: true,
      files: [join(dir, '.env'), join(dir, '.env.local')],
      count: 3,
    });
    expect(target).toEqual({ SEXPR_MAX_DEPTH: '500', SEXPR_INDENT: 'tab' });
    expect(resolveEngineConfig(target)).toMatchObject({ maxDepth: 500, indent: '\t' });
  });

  it('loads an explicit file relative to the base directory', () => {
    writeFileSync(join(dir, 'engine.env'), 'SEXPR_ROOT_MARKERS=kicad_pcb\n');
    const target: Record<string, string> = {};

    const result = loadEnv({ baseDir: dir, envFile: 'engine.env', target });

    expect(result.files).toEqual([join(dir, 'engine.env')]);
    expect(target.SEXPR_ROOT_MARKERS).toBe('kicad_pcb');
  });

  it('reports nothing loaded when no file exists', () => {
    const target: Record<string, string> = {};

    expect(loadEnv({ baseDir: dir, target })).toEqual({ loaded: false, files: [], count: 0 });
    expect(target).toEqual({});
  });
});
