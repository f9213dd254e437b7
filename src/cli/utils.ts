/**
 * CLI Utilities
 *
 * Output helpers and configuration loading for the wiki2vault CLI.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import { ConfigError, describeError } from '../lib/errors.js';
import { CONFIG_FILENAME } from '../lib/constants.js';
import {
  type ConverterConfig,
  type ConverterConfigInput,
  parseConverterConfig,
} from '../lib/config-schema.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/** Color output helpers */
export const color = {
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  red: (s: string) => `${colors.red}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  yellow: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  gray: (s: string) => `${colors.gray}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${colors.bold}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${colors.bold}${s}${colors.reset}`,
};

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Spinner for indeterminate progress
 */
export function createSpinner(message: string, stream: { write(chunk: string): unknown } = process.stderr): {
  update: (msg: string) => void;
  success: (msg: string) => void;
  fail: (msg: string) => void;
  stop: () => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let currentMessage = message;

  function render(): void {
    const frame = color.cyan(frames[frameIndex] ?? '⠋');
    stream.write(`\r${frame} ${currentMessage}\x1b[K`);
    frameIndex = (frameIndex + 1) % frames.length;
  }

  const interval = setInterval(render, 80);
  render();

  return {
    update(msg: string) {
      currentMessage = msg;
    },
    success(msg: string) {
      clearInterval(interval);
      stream.write(`\r${color.green('✓')} ${msg}\x1b[K\n`);
    },
    fail(msg: string) {
      clearInterval(interval);
      stream.write(`\r${color.red('✗')} ${msg}\x1b[K\n`);
    },
    stop() {
      clearInterval(interval);
      stream.write('\r\x1b[K');
    },
  };
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format rows as an aligned table
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns ?? (firstRow ? Object.keys(firstRow) : []);

  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const stripped = stripAnsi(String(row[col] ?? ''));
      widths[col] = Math.max(widths[col] ?? 0, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  if (header) {
    lines.push(`    ${cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad)}`);
    lines.push(`    ${cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad)}`);
  }

  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const padLength = (widths[col] ?? 0) - stripAnsi(value).length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

/**
 * Parse a boolean environment value
 *
 * @throws {ConfigError} For anything but true/false/1/0/yes/no
 */
export function parseBoolean(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

/**
 * Configuration from WIKI2VAULT_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const outputDir = env['WIKI2VAULT_OUTPUT_DIR'];
  if (outputDir) {
    config['outputDir'] = outputDir;
  }
  const imageBaseUrl = env['WIKI2VAULT_IMAGE_BASE_URL'];
  if (imageBaseUrl) {
    config['imageBaseUrl'] = imageBaseUrl;
  }
  const skipRedirects = env['WIKI2VAULT_SKIP_REDIRECTS'];
  if (skipRedirects) {
    config['skipRedirects'] = parseBoolean('WIKI2VAULT_SKIP_REDIRECTS', skipRedirects);
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read one `.wiki2vaultrc`; a missing file is an empty config
 *
 * @throws {ConfigError} When the file is not a JSON object
 */
export async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigError(`Cannot read ${path}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${describeError(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration
 *
 * Sources, highest precedence first:
 * 1. `overrides` (CLI flags)
 * 2. Environment variables
 * 3. .wiki2vaultrc in the current directory
 * 4. .wiki2vaultrc in the home directory
 *
 * @throws {ConfigError} If a file is unreadable or validation fails
 */
export async function loadConfig(
  overrides: ConverterConfigInput = {},
  options: LoadConfigOptions = {}
): Promise<ConverterConfig> {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();

  const homeConfig = await readConfigFile(join(home, CONFIG_FILENAME));
  const cwdConfig = resolve(cwd) === resolve(home) ? {} : await readConfigFile(join(cwd, CONFIG_FILENAME));

  const flags = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const config = parseConverterConfig({ ...homeConfig, ...cwdConfig, ...configFromEnv(options.env), ...flags });
  getLog().debug('Configuration loaded', { outputDir: config.outputDir, skipRedirects: config.skipRedirects });
  return config;
}

/**
 * Print error message and exit
 */
export function fatal(message: string): never {
  getLog().error(message, undefined, 'fatal');
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(1);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse comma-separated integers
 *
 * @throws {ConfigError} On a non-integer entry
 */
export function parseIntegerList(value: string): number[] {
  return parseList(value).map((s) => {
    if (!/^-?\d+$/.test(s)) {
      throw new ConfigError(`Not an integer: "${s}"`);
    }
    return Number.parseInt(s, 10);
  });
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p.startsWith('~')) {
    return join(homedir(), p.slice(1));
  }
  return resolve(p);
}
