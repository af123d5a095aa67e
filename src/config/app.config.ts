import { registerAs } from '@nestjs/config';
import type { LogLevel } from '@nestjs/common';

export interface AppConfig {
  port: number;
  globalPrefix: string;
  corsOrigins: string[];
  logLevels: LogLevel[];
}

// Lowest to highest; LOG_LEVEL enables its own level and everything above it
const LOG_LEVELS: LogLevel[] = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
];

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex(
    (candidate) => candidate === level?.trim().toLowerCase(),
  );
  return LOG_LEVELS.slice(index === -1 ? LOG_LEVELS.indexOf('log') : index);
}

export function parseCorsOrigins(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export default registerAs(
  'app',
  (): AppConfig => ({
    port: parseInt(process.env.PORT || '3000', 10),
    globalPrefix: process.env.API_PREFIX ?? 'api',
    corsOrigins: parseCorsOrigins(process.env.CORS_ORIGINS),
    logLevels: resolveLogLevels(process.env.LOG_LEVEL),
  }),
);
