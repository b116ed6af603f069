import 'dotenv/config';
import { WEIGHT_SCHEMES, type WeightScheme } from './shared/types.js';

/**
 * Validates and returns an environment variable
 *
 * @param name - Environment variable name
 * @param fallback - Optional fallback value
 * @param validator - Optional validation function
 * @returns Validated environment variable value
 * @throws Error if variable is missing or invalid
 */
const required = (
  name: string,
  fallback?: string,
  validator?: (value: string) => boolean,
): string => {
  const value = process.env[name] ?? fallback;
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  if (validator && !validator(value)) {
    throw new Error(`Invalid value for env var ${name}`);
  }
  return value;
};

/**
 * Reads an optional variable, validating it only when set
 */
const optional = (name: string, validator: (value: string) => boolean): string | undefined => {
  const value = process.env[name];
  if (!value) return undefined;
  if (!validator(value)) {
    throw new Error(`Invalid value for env var ${name}`);
  }
  return value;
};

const isWeightScheme = (value: string): value is WeightScheme =>
  WEIGHT_SCHEMES.some((scheme) => scheme === value);

const parseWeightScheme = (value: string): WeightScheme => {
  if (!isWeightScheme(value)) {
    throw new Error('Invalid value for env var WEIGHT_SCHEME');
  }
  return value;
};

const isPositiveNumber = (value: string): boolean => Number.isFinite(Number(value)) && Number(value) > 0;

/**
 * Admin tokens shorter than this are rejected
 */
const validateAdminToken = (token: string): boolean => token.length >= 8;

/**
 * Validates CORS origins
 */
const parseCorsOrigins = (origins?: string): string[] | boolean => {
  if (!origins || origins === '*') return true;
  return origins.split(',').map((o) => o.trim());
};

/**
 * Application configuration
 */
export const config = {
  // Limits document
  limitsPath: process.env.LIMITS_PATH ?? 'limits.json',

  // Index computation
  weightScheme: parseWeightScheme(required('WEIGHT_SCHEME', '1/Si')),
  pollutedThreshold: Number(required('POLLUTED_THRESHOLD', '100', isPositiveNumber)),

  // Server
  port: Number(process.env.PORT ?? 8080),
  host: process.env.HOST ?? '0.0.0.0',
  corsOrigins: parseCorsOrigins(process.env.CORS_ORIGINS),
  bodyLimitBytes: Number(required('BODY_LIMIT_BYTES', String(5 * 1024 * 1024), isPositiveNumber)),

  // Admin edit path; disabled when unset
  adminToken: optional('ADMIN_TOKEN', validateAdminToken),

  // Monitoring
  logLevel: process.env.LOG_LEVEL ?? 'info',

  // Rate Limiting
  rateLimitMax: Number(process.env.RATE_LIMIT_MAX ?? 100),
  rateLimitWindow: process.env.RATE_LIMIT_WINDOW ?? '1 minute',
};
