/**
 * jwt-codec CLI - Configuration
 *
 * Key material is resolved from, lowest priority first:
 * 1. a JSON config file (`--config`, or `jwt-codec.config.json` in the working directory)
 * 2. environment variables (`JWT_SECRET`, `JWT_PRIVATE_KEY_PATH`, `JWT_PUBLIC_KEY_PATH`, `JWT_ALGORITHM`)
 * 3. command-line flags
 */

import * as fs from 'fs';
import * as path from 'path';

import { isJWTAlgorithm } from '../crypto/AlgorithmConfig';
import { KeyStore } from '../crypto/key-store';
import { DEFAULT_ALGORITHM } from '../types';
import type { JWTAlgorithm } from '../types';

export const DEFAULT_CONFIG_FILE = 'jwt-codec.config.json';

/**
 * Flags shared by every command that needs keys
 */
export interface KeyOptions {
  config?: string;
  secret?: string;
  privateKey?: string;
  publicKey?: string;
  algorithm?: string;
}

/**
 * Shape of the JSON config file. Key paths are relative to the file.
 */
export interface ConfigFile {
  secret?: string;
  privateKeyPath?: string;
  publicKeyPath?: string;
  algorithm?: string;
}

export interface ResolvedConfig {
  secret?: string;
  privateKeyPath?: string;
  publicKeyPath?: string;
  algorithm: JWTAlgorithm;
  /** Config file that was read, if any */
  source?: string;
}

/**
 * Configuration problem the CLI reports and exits on
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Read and validate a config file
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }

  const config: ConfigFile = {};
  const baseDir = path.dirname(path.resolve(filePath));

  const entries: Array<[string, unknown]> = Object.entries(parsed);
  for (const [key, value] of entries) {
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new ConfigError(`Config file ${filePath}: "${key}" must be a string`);
    }
    switch (key) {
      case 'secret':
        config.secret = value;
        break;
      case 'algorithm':
        config.algorithm = value;
        break;
      case 'privateKeyPath':
        config.privateKeyPath = path.resolve(baseDir, value);
        break;
      case 'publicKeyPath':
        config.publicKeyPath = path.resolve(baseDir, value);
        break;
      default:
        throw new ConfigError(`Config file ${filePath}: unknown key "${key}"`);
    }
  }

  return config;
}

/**
 * Merge config file, environment and flags into one configuration
 */
export function resolveConfig(
  options: KeyOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ResolvedConfig {
  let fileConfig: ConfigFile = {};
  let source: string | undefined;

  if (options.config) {
    source = path.resolve(cwd, options.config);
    fileConfig = loadConfigFile(source);
  } else {
    const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(defaultPath)) {
      source = defaultPath;
      fileConfig = loadConfigFile(defaultPath);
    }
  }

  const algorithm = options.algorithm ?? env.JWT_ALGORITHM ?? fileConfig.algorithm ?? DEFAULT_ALGORITHM;
  if (!isJWTAlgorithm(algorithm)) {
    throw new ConfigError(`Unknown algorithm: ${algorithm}`);
  }

  return {
    secret: options.secret ?? env.JWT_SECRET ?? fileConfig.secret,
    privateKeyPath: resolvePath(options.privateKey, cwd) ?? resolvePath(env.JWT_PRIVATE_KEY_PATH, cwd) ?? fileConfig.privateKeyPath,
    publicKeyPath: resolvePath(options.publicKey, cwd) ?? resolvePath(env.JWT_PUBLIC_KEY_PATH, cwd) ?? fileConfig.publicKeyPath,
    algorithm,
    source,
  };
}

/**
 * Build a key store from the resolved configuration
 */
export function createKeyStore(config: ResolvedConfig): KeyStore {
  try {
    return new KeyStore({
      secret: config.secret,
      privateKey: config.privateKeyPath ? fs.readFileSync(config.privateKeyPath, 'utf8') : undefined,
      publicKey: config.publicKeyPath ? fs.readFileSync(config.publicKeyPath, 'utf8') : undefined,
    });
  } catch (err) {
    throw new ConfigError(`Failed to load keys: ${errorMessage(err)}`, { cause: err });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function resolvePath(value: string | undefined, cwd: string): string | undefined {
  return value ? path.resolve(cwd, value) : undefined;
}
