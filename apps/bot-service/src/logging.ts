import { LogLevel } from '@nestjs/common';

const LEVELS_BY_NAME: Record<string, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

/**
 * Maps LOG_LEVEL onto NestJS logger levels. Background mode caps output at
 * warnings so a long-running bot stays quiet.
 */
export function resolveLogLevels(
  level: string | undefined,
  backgroundMode: boolean,
): LogLevel[] {
  const levels = LEVELS_BY_NAME[level ?? 'info'] ?? LEVELS_BY_NAME.info;
  if (backgroundMode) {
    return levels.filter((l) => l === 'error' || l === 'warn');
  }
  return levels;
}
