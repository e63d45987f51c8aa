/**
 * Environment variable handling with validation
 */

import type { ProviderType } from '@/providers/types';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  /** Path to the scanner config file, relative to cwd unless absolute. */
  configPath: string | null;
  providerOverride: ProviderType | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const PROVIDER_TYPES: readonly ProviderType[] = ['memory', 'replay', 'simulated'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pick<T extends string>(allowed: readonly T[], raw: string | undefined): T | null {
  if (raw === undefined) return null;
  return allowed.find((candidate) => candidate === raw) ?? null;
}

export function loadEnvConfig(): EnvConfig {
  return {
    logLevel: pick(LOG_LEVELS, getEnvVar('LOG_LEVEL')) ?? 'info',
    nodeEnv: pick(NODE_ENVS, getEnvVar('NODE_ENV')) ?? 'development',
    configPath: getEnvVar('SCANNER_CONFIG') ?? null,
    providerOverride: pick(PROVIDER_TYPES, getEnvVar('SCANNER_PROVIDER')?.toLowerCase()),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
