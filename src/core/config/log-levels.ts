import { LogLevel } from '@nestjs/common';

const SEVERITY_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expands a threshold such as `warn` into every Nest log level at or above it.
 * `info` is accepted as an alias of `log`; unknown values fall back to `log`.
 */
export function resolveLogLevels(threshold?: string): LogLevel[] {
  const normalized = (threshold || 'log').trim().toLowerCase();
  const level = normalized === 'info' ? 'log' : normalized;
  const index = SEVERITY_ORDER.findIndex((candidate) => candidate === level);

  return SEVERITY_ORDER.slice(0, (index === -1 ? SEVERITY_ORDER.indexOf('log') : index) + 1);
}
