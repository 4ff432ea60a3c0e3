/**
 * Engine configuration from the environment, with dotenv support
 *
 * Recognised variables:
 * - SEXPR_MAX_DEPTH     parser nesting limit (>= 100)
 * - SEXPR_INDENT        "tab" or a number of spaces
 * - SEXPR_ROOT_MARKERS  comma-separated heads that get a trailing newline
 * - SEXPR_LOG_LEVEL     debug | info | warn | error
 *
 * Unreadable values fall back to ENGINE_DEFAULTS.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ENGINE_DEFAULTS, ENV_VARS, type EngineConfig, type LogLevel } from './constants.js';

export type EnvSource = Record<string, string | undefined>;

export interface LoadEnvOptions {
  /** Path to .env file (default: .env then .env.local in baseDir) */
  envFile?: string;
  /** Base directory for resolving relative paths */
  baseDir?: string;
  /** Object receiving the variables (default: process.env) */
  target?: Record<string, string>;
}

export interface LoadEnvResult {
  /** Whether any .env files were loaded */
  loaded: boolean;
  /** Paths of loaded .env files */
  files: string[];
  /** Number of variables loaded */
  count: number;
}

/**
 * Load environment variables from .env files
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
  const baseDir = options.baseDir || process.cwd();
  const files: string[] = [];
  let totalCount = 0;

  const envFilePaths: string[] = options.envFile
    ? [resolve(baseDir, options.envFile)]
    : ['.env', '.env.local'].map((file) => resolve(baseDir, file));

  // Later files override earlier ones
  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenvConfig({
      path: envPath,
      override: true,
      processEnv: options.target,
    });
    if (!result.error && result.parsed) {
      files.push(envPath);
      totalCount += Object.keys(result.parsed).length;
    }
  }

  return {
    loaded: files.length > 0,
    files,
    count: totalCount,
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Build the engine configuration from environment variables
 */
export function resolveEngineConfig(env: EnvSource = process.env): EngineConfig {
  return {
    maxDepth: readMaxDepth(env[ENV_VARS.MAX_DEPTH]),
    indent: readIndent(env[ENV_VARS.INDENT]),
    rootMarkers: readRootMarkers(env[ENV_VARS.ROOT_MARKERS]),
    logLevel: readLogLevel(env[ENV_VARS.LOG_LEVEL]),
  };
}

function readMaxDepth(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return ENGINE_DEFAULTS.MAX_DEPTH;
  }
  return Math.max(ENGINE_DEFAULTS.MIN_DEPTH, parseInt(raw.trim(), 10));
}

function readIndent(raw: string | undefined): string {
  const value = raw?.trim().toLowerCase();
  if (value === 'tab') return '\t';
  if (value !== undefined && /^[1-8]$/.test(value)) {
    return ' '.repeat(parseInt(value, 10));
  }
  return ENGINE_DEFAULTS.INDENT;
}

function readRootMarkers(raw: string | undefined): readonly string[] {
  if (raw === undefined) return ENGINE_DEFAULTS.ROOT_MARKERS;
  return raw
    .split(',')
    .map((marker) => marker.trim())
    .filter((marker) => marker.length > 0);
}

function readLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}
