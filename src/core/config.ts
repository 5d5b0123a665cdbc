/**
 * core/config.ts
 *
 * Resolves the SaveCbConfig. Precedence, highest first:
 *   1. SAVECB_* environment variables (a .env in the config dir is loaded by the CLI)
 *   2. $SAVECB_CONFIG, else <config dir>/config.json
 *   3. DEFAULT_CONFIG
 *
 * Nothing is required. A bad file or variable is skipped with a warning; the
 * warnings are returned rather than logged because this runs before the
 * logger is initialised.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import * as dotenv from 'dotenv';
import { SaveCbConfig } from './types';
import { describeError } from './errors';

export const DEFAULT_CONFIG: SaveCbConfig = {
  logLevel: 'warn',
  clipboardBackend: 'auto',
  dialogBackend: 'auto',
  clipboardTimeoutMs: 5000,
  jpegQuality: 90
};

const ENV_VARS: Record<keyof SaveCbConfig, string> = {
  logLevel: 'SAVECB_LOG_LEVEL',
  clipboardBackend: 'SAVECB_CLIPBOARD_BACKEND',
  dialogBackend: 'SAVECB_DIALOG_BACKEND',
  clipboardTimeoutMs: 'SAVECB_CLIPBOARD_TIMEOUT_MS',
  jpegQuality: 'SAVECB_JPEG_QUALITY'
};

const CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    logLevel:           { type: 'string', enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] },
    clipboardBackend:   { type: 'string', enum: ['auto', 'wayland', 'x11'] },
    dialogBackend:      { type: 'string', enum: ['auto', 'zenity', 'kdialog'] },
    clipboardTimeoutMs: { type: 'integer', minimum: 0 },
    jpegQuality:        { type: 'integer', minimum: 1, maximum: 100 }
  }
};

const fileAjv = new Ajv({ allErrors: true });
const validateFile = fileAjv.compile<Partial<SaveCbConfig>>(CONFIG_SCHEMA);

// Environment values are always strings; let Ajv turn "5000" into 5000
const envAjv = new Ajv({ allErrors: true, coerceTypes: true });
const validateEnv = envAjv.compile<Partial<SaveCbConfig>>(CONFIG_SCHEMA);

export interface LoadedConfig {
  config: SaveCbConfig;
  configPath: string;
  fileLoaded: boolean;
  warnings: string[];
}

export function configDir(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'savecb');
}

export function configFilePath(env: NodeJS.ProcessEnv): string {
  return env.SAVECB_CONFIG || path.join(configDir(env), 'config.json');
}

/**
 * Copies variables from <config dir>/.env into `env` without overriding
 * anything already set. Returns the file path when one was found.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv): string | null {
  const envPath = path.join(configDir(env), '.env');
  if (!fs.existsSync(envPath)) return null;

  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [name, value] of Object.entries(parsed)) {
    if (env[name] === undefined) env[name] = value;
  }
  return envPath;
}

function readConfigFile(configPath: string, warnings: string[]): Partial<SaveCbConfig> | null {
  if (!fs.existsSync(configPath)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    warnings.push(`Ignoring unreadable config file ${configPath}: ${describeError(e).message}`);
    return null;
  }

  if (!validateFile(parsed)) {
    warnings.push(`Ignoring invalid config file ${configPath}: ${fileAjv.errorsText(validateFile.errors)}`);
    return null;
  }
  return parsed;
}

function readEnvironment(env: NodeJS.ProcessEnv, warnings: string[]): Partial<SaveCbConfig> {
  const fromEnv: Partial<SaveCbConfig> = {};

  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    // Validated one variable at a time so a single typo doesn't discard the rest
    const candidate: Record<string, unknown> = { [key]: value };
    if (validateEnv(candidate)) {
      Object.assign(fromEnv, candidate);
    } else {
      warnings.push(`Ignoring ${name}=${value}: ${envAjv.errorsText(validateEnv.errors, { dataVar: name })}`);
    }
  }

  return fromEnv;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const warnings: string[] = [];
  const configPath = configFilePath(env);
  const fromFile = readConfigFile(configPath, warnings);
  const fromEnv = readEnvironment(env, warnings);

  return {
    config: { ...DEFAULT_CONFIG, ...fromFile, ...fromEnv },
    configPath,
    fileLoaded: fromFile !== null,
    warnings
  };
}
