/**
 * Configuration read from the environment and the command line.
 *
 * Environment variables:
 *   APP_USERNAME - Bitbucket username for the app password
 *   APP_PASSWORD - Bitbucket app password
 *
 * Both default to "". Requests then go out unauthenticated and fail
 * remotely rather than locally.
 *
 * @module core/config
 */

import { ConfigurationError } from "./errors.js";
import { LogLevel, type LogLevelValue } from "./logger.js";

export interface BitbucketCredentials {
  username: string;
  password: string;
}

/**
 * Read Bitbucket credentials from environment variables.
 */
export function getCredentials(
  env: NodeJS.ProcessEnv = process.env
): BitbucketCredentials {
  return {
    username: env.APP_USERNAME ?? "",
    password: env.APP_PASSWORD ?? "",
  };
}

const LOG_LEVEL_NAMES: Record<string, LogLevelValue> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  CRITICAL: LogLevel.ERROR,
};

/**
 * Map a log level name (case-insensitive) to a LogLevel value.
 *
 * @throws ConfigurationError for unknown names
 */
export function parseLogLevel(name: string): LogLevelValue {
  const level = LOG_LEVEL_NAMES[name.trim().toUpperCase()];
  if (level === undefined) {
    throw new ConfigurationError(
      `Unknown log level: ${name}. Use DEBUG, INFO, WARNING, ERROR or CRITICAL`
    );
  }
  return level;
}

/**
 * commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * commander argument parser for finite floats.
 */
export function parseFloatOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`Expected a number, got "${value}"`);
  }
  return parsed;
}
