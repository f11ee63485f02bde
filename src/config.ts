import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ClassifiedError, errorCode, errorMessage } from './errors.js';
import { isLogLevel, resolveLogLevel } from './logger.js';
import type { Config, ConverterConfig } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const DEFAULT_CONFIG: Config = {
  watchDirectory: join(homedir(), 'Downloads'),
  targetExtension: '.mp3',
  settleDelaySeconds: 5,
  downloadTimeoutSeconds: 300,
  stabilizationCeilingSeconds: 30,
  fallbackLookbackMinutes: 10,
  pollIntervalMs: 1000,
  converter: {
    command: 'yt-dlp',
    args: ['--extract-audio', '--audio-format', 'mp3', '--output', '%(title)s.%(ext)s', '{url}'],
    timeoutSeconds: 600,
  },
  logLevel: resolveLogLevel(),
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type NumericKey =
  | 'settleDelaySeconds'
  | 'downloadTimeoutSeconds'
  | 'stabilizationCeilingSeconds'
  | 'fallbackLookbackMinutes'
  | 'pollIntervalMs';

const NUMERIC_KEYS: NumericKey[] = [
  'settleDelaySeconds',
  'downloadTimeoutSeconds',
  'stabilizationCeilingSeconds',
  'fallbackLookbackMinutes',
  'pollIntervalMs',
];

function parseConverter(value: unknown, problems: string[]): ConverterConfig {
  const converter = { ...DEFAULT_CONFIG.converter };

  if (value === undefined) {
    return converter;
  }

  if (!isRecord(value)) {
    problems.push('converter must be an object');
    return converter;
  }

  if (value.command !== undefined) {
    if (typeof value.command === 'string' && value.command.trim() !== '') {
      converter.command = value.command;
    } else {
      problems.push('converter.command must be a non-empty string');
    }
  }

  if (value.args !== undefined) {
    const args = value.args;

    if (Array.isArray(args) && args.every((arg): arg is string => typeof arg === 'string')) {
      converter.args = args;
    } else {
      problems.push('converter.args must be an array of strings');
    }
  }

  if (value.timeoutSeconds !== undefined) {
    if (typeof value.timeoutSeconds === 'number' && value.timeoutSeconds > 0) {
      converter.timeoutSeconds = value.timeoutSeconds;
    } else {
      problems.push('converter.timeoutSeconds must be a positive number');
    }
  }

  return converter;
}

export function parseConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new ClassifiedError('input-validation', 'Config must be a JSON object', 'input');
  }

  const problems: string[] = [];
  const config: Config = { ...DEFAULT_CONFIG };

  if (value.watchDirectory !== undefined) {
    if (typeof value.watchDirectory === 'string' && value.watchDirectory.trim() !== '') {
      config.watchDirectory = expandPath(value.watchDirectory);
    } else {
      problems.push('watchDirectory must be a non-empty string');
    }
  }

  if (value.targetExtension !== undefined) {
    if (typeof value.targetExtension === 'string' && value.targetExtension.trim() !== '') {
      config.targetExtension = normalizeExtension(value.targetExtension);
    } else {
      problems.push('targetExtension must be a non-empty string');
    }
  }

  for (const key of NUMERIC_KEYS) {
    const raw = value[key];

    if (raw === undefined) {
      continue;
    }

    if (typeof raw === 'number' && Number.isFinite(raw) && raw > 0) {
      config[key] = raw;
    } else {
      problems.push(`${key} must be a positive number`);
    }
  }

  config.converter = parseConverter(value.converter, problems);

  if (value.logLevel !== undefined) {
    if (isLogLevel(value.logLevel)) {
      config.logLevel = process.env.LOG_LEVEL ? resolveLogLevel() : value.logLevel;
    } else {
      problems.push('logLevel must be one of debug, info, warn, error, silent');
    }
  }

  if (problems.length > 0) {
    throw new ClassifiedError('input-validation', `Invalid config: ${problems.join('; ')}`, 'input');
  }

  return config;
}

export async function loadConfig(configPath: string = CONFIG_FILE): Promise<Config> {
  let data: string;

  try {
    data = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { ...DEFAULT_CONFIG };
    }

    throw new ClassifiedError(
      'input-validation',
      `Could not read config file ${configPath}: ${errorMessage(error)}`,
      'input',
      { cause: error }
    );
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ClassifiedError(
      'input-validation',
      `Config file ${configPath} is not valid JSON: ${errorMessage(error)}`,
      'input',
      { cause: error }
    );
  }

  return parseConfig(parsed);
}
