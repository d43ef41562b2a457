/**
 * Centraal configuratie systeem voor de VPB service
 *
 * Consolideert alle applicatie configuraties in een enkele,
 * type-safe en environment-aware configuratie module.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { logger } from '../services/logger';
import { TIMEOUTS, RETRY } from './constants';

// Load environment variables from .env file
dotenv.config();

export const envSchema = z.object({
  // Server configuratie
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8000),

  // AI Service configuratie
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4-turbo'),

  // Logging configuratie
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // AI Service limits
  AI_REQUEST_TIMEOUT_MS: z.coerce.number().default(TIMEOUTS.AI_REQUEST),
  AI_MAX_RETRIES: z.coerce.number().int().min(0).default(RETRY.MAX_ATTEMPTS),

  // Extraction: aantal tekens document input dat naar het model gaat
  EXTRACTION_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(16_000),

  // CORS: komma-gescheiden lijst, of "*"
  CORS_ALLOWED_ORIGINS: z.string().default('*'),
});

export type Env = z.infer<typeof envSchema>;

const envResult = envSchema.safeParse(process.env);

if (!envResult.success) {
  console.error('❌ Invalid environment configuration:');
  envResult.error.issues.forEach(issue => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

const env = envResult.data;

export function parseAllowedOrigins(value: string): '*' | string[] {
  const origins = value.split(',').map(origin => origin.trim()).filter(Boolean);
  return origins.length === 0 || origins.includes('*') ? '*' : origins;
}

export interface ExtractionConfig {
  provider: 'openai';
  model: string;
  temperature: number;
  maxOutputTokens: number;
  maxInputChars: number;
  timeoutMs: number;
  maxRetries: number;
}

export const EXTRACTION_CONFIG: ExtractionConfig = {
  provider: 'openai',
  model: env.OPENAI_MODEL,
  temperature: 0,
  maxOutputTokens: 4096,
  maxInputChars: env.EXTRACTION_MAX_INPUT_CHARS,
  timeoutMs: env.AI_REQUEST_TIMEOUT_MS,
  maxRetries: env.AI_MAX_RETRIES,
};

export const LOGGING_CONFIG = {
  level: env.LOG_LEVEL,
} as const;

export const config = {
  NODE_ENV: env.NODE_ENV,
  PORT: env.PORT,
  IS_DEVELOPMENT: env.NODE_ENV === 'development',
  IS_PRODUCTION: env.NODE_ENV === 'production',

  OPENAI_API_KEY: env.OPENAI_API_KEY,

  corsOrigins: parseAllowedOrigins(env.CORS_ALLOWED_ORIGINS),
  extraction: EXTRACTION_CONFIG,
  logging: LOGGING_CONFIG,
} as const;

export type Config = typeof config;

export function validateConfig(): boolean {
  const errors: string[] = [];

  if (!config.OPENAI_API_KEY) {
    // /api/compute werkt zonder key, alleen document extractie niet
    logger.warn('config', 'OPENAI_API_KEY is not set - document extraction is disabled');
  }

  if (config.IS_PRODUCTION && config.corsOrigins === '*') {
    logger.warn('config', 'CORS allows all origins in production');
  }

  if (config.extraction.maxRetries > 10) {
    errors.push(`AI_MAX_RETRIES must be 10 or less, got ${config.extraction.maxRetries}`);
  }

  if (errors.length > 0) {
    logger.error('config', 'Configuration validation failed', { errors });
    return false;
  }

  logger.info('config', 'Configuration validation passed');
  return true;
}
