/**
 * Configuration validation module
 *
 * Runtime validation for environment variables and command-line values,
 * with type checks, format validation, and helpful error messages.
 */

import { isAbsolute } from 'node:path';
import { createLogger } from '../logger/index.ts';
import { ConfigurationError } from '../errors/index.ts';

const log = createLogger({ name: 'preview-sync:config' });

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  value?: string;
  error?: string;
}

/** Configuration value types */
export type ConfigType = 'string' | 'number' | 'url' | 'path';

/** Configuration field definition */
export interface ConfigField {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: ConfigType;
  /** Whether the field is required */
  required: boolean;
  /** Default value if not provided */
  default?: string;
  /** Custom validation function */
  validate?: (value: string) => ValidationResult;
  /** Description for error messages */
  description?: string;
}

/**
 * Validate an http(s) URL
 */
export function validateUrl(value: string): ValidationResult {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return { valid: false, error: `Invalid URL format: ${value}` };
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { valid: false, error: `URL must use http:// or https://: ${value}` };
  }
  return { valid: true, value };
}

/**
 * Validate a number
 */
export function validateNumber(
  value: string,
  options?: { min?: number; max?: number }
): ValidationResult {
  if (!/^-?\d+$/.test(value.trim())) {
    return { valid: false, error: `Invalid number: ${value}` };
  }
  const num = Number.parseInt(value, 10);
  if (options?.min !== undefined && num < options.min) {
    return { valid: false, error: `Value ${num} is less than minimum ${options.min}` };
  }
  if (options?.max !== undefined && num > options.max) {
    return { valid: false, error: `Value ${num} is greater than maximum ${options.max}` };
  }
  return { valid: true, value };
}

/**
 * Validate a file path (basic check)
 */
export function validatePath(value: string): ValidationResult {
  if (value.length === 0) {
    return { valid: false, error: 'Path cannot be empty' };
  }
  if (value.includes('\0')) {
    return { valid: false, error: 'Path cannot contain null bytes' };
  }
  return { valid: true, value };
}

/**
 * Validate a GitHub project slug of the form `owner/repo`
 */
export function validateProject(value: string): ValidationResult {
  if (!/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/.test(value)) {
    return {
      valid: false,
      error: `Project must be "owner/repo" (e.g. "octo-org/widgets"): ${value}`,
    };
  }
  return { valid: true, value };
}

/**
 * Validate a git remote. Relative paths are rejected: reads resolve them
 * against the working directory, but deletions run inside a temporary
 * repository.
 */
export function validateRemote(value: string): ValidationResult {
  if (/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(value) || /^[\w.-]+@[\w.-]+:/.test(value) || isAbsolute(value)) {
    return { valid: true, value };
  }
  return { valid: false, error: `Remote must be a URL or an absolute path: ${value}` };
}

/**
 * Get an environment variable with validation
 */
export function getEnv(field: ConfigField): string {
  const value = process.env[field.name];

  if (value === undefined || value === '') {
    if (field.required && field.default === undefined) {
      throw new Error(
        `Missing required environment variable: ${field.name}` +
          (field.description !== undefined ? ` (${field.description})` : '')
      );
    }
    if (field.default !== undefined) {
      log.debug({ name: field.name, default: field.default }, 'Using default config value');
      return field.default;
    }
    return '';
  }

  let result: ValidationResult = { valid: true, value };

  switch (field.type) {
    case 'url':
      result = validateUrl(value);
      break;
    case 'number':
      result = validateNumber(value);
      break;
    case 'path':
      result = validatePath(value);
      break;
    case 'string':
    default:
      break;
  }

  if (result.valid && field.validate !== undefined) {
    result = field.validate(value);
  }

  if (!result.valid) {
    throw new Error(
      `Invalid value for ${field.name}: ${result.error ?? 'validation failed'}` +
        (field.description !== undefined ? ` (${field.description})` : '')
    );
  }

  return value;
}

/**
 * Read several fields at once, reporting every problem together
 */
export function validateConfig(fields: ConfigField[]): Map<string, string> {
  const config = new Map<string, string>();
  const errors: string[] = [];

  for (const field of fields) {
    try {
      config.set(field.name, getEnv(field));
    } catch (err) {
      errors.push(err instanceof Error ? err.message : String(err));
    }
  }

  if (errors.length > 0) {
    log.error({ errors }, 'Invalid configuration');
    throw new ConfigurationError(errors);
  }

  return config;
}
