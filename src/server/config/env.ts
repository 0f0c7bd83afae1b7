/**
 * Environment Variable Validation
 *
 * Centralized parsing of the environment variables that configure
 * agreement placeholder generation.
 */

// Load dotenv early so variables are available before the first getEnv()
import * as dotenv from 'dotenv';
dotenv.config();

import { resolve } from 'path';
import { LOG_LEVELS } from '../utils/logger.js';

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL?: string;

  // Agreement templates
  AGREEMENT_TEMPLATE_DIR: string;
  AGREEMENT_TERMS_FILE: string;
  AGREEMENT_SAMPLE_MODE: boolean;
}

let validatedEnv: Env | null = null;

/**
 * Validate and parse environment variables
 * Throws on the first call if any variable is invalid
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !LOG_LEVELS.includes(logLevel)) {
    errors.push(`LOG_LEVEL: Invalid value "${logLevel}". Must be one of ${LOG_LEVELS.join(', ')}.`);
  }

  const sampleMode = process.env.AGREEMENT_SAMPLE_MODE;
  if (sampleMode && !['true', 'false'].includes(sampleMode)) {
    errors.push(`AGREEMENT_SAMPLE_MODE: Invalid value "${sampleMode}". Must be true or false.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: logLevel,
    AGREEMENT_TEMPLATE_DIR: resolve(process.cwd(), process.env.AGREEMENT_TEMPLATE_DIR || 'resources/template'),
    AGREEMENT_TERMS_FILE: process.env.AGREEMENT_TERMS_FILE || 'MetadataTerms.json',
    AGREEMENT_SAMPLE_MODE: parseBooleanEnv(sampleMode, false),
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
