/**
 * Environment configuration and content-root validation
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_HIT_DELAY_MS, errorMessage } from '@tinyserve/core';

/** Log sink; `console` satisfies it */
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const DEFAULT_PORT = 8001;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_MAX_WORKERS = 16;
export const DEFAULT_READ_TIMEOUT_MS = 10_000;
export const DEFAULT_HEADER_GRACE_MS = 50;

export interface EnvConfig {
  port: number;
  host: string;
  maxWorkers: number;
  hitDelayMs: number;
  workDelayMs: number;
  readTimeoutMs: number;
}

/**
 * Parse a non-negative integer, rejecting anything else (`"8001x"`, `"-1"`).
 */
export function parseInteger(name: string, value: string, min = 0): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new Error(`${name} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    port: parseInteger('PORT', env.PORT ?? String(DEFAULT_PORT)),
    host: env.HOST ?? DEFAULT_HOST,
    maxWorkers: parseInteger('MAX_WORKERS', env.MAX_WORKERS ?? String(DEFAULT_MAX_WORKERS), 1),
    hitDelayMs: parseInteger('HIT_DELAY_MS', env.HIT_DELAY_MS ?? String(DEFAULT_HIT_DELAY_MS)),
    workDelayMs: parseInteger('WORK_DELAY_MS', env.WORK_DELAY_MS ?? '0'),
    readTimeoutMs: parseInteger('READ_TIMEOUT_MS', env.READ_TIMEOUT_MS ?? String(DEFAULT_READ_TIMEOUT_MS), 1),
  };
}

/**
 * Absolute path of the content root.
 *
 * @throws Error when the directory does not exist or is not a directory
 */
export async function resolveContentRoot(directory: string): Promise<string> {
  const absolute = path.resolve(directory);
  const stats = await stat(absolute).catch((err: unknown) => {
    throw new Error(`Directory '${absolute}' does not exist (${errorMessage(err)})`);
  });
  if (!stats.isDirectory()) {
    throw new Error(`'${absolute}' is not a directory`);
  }
  return absolute;
}
