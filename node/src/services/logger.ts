// src/services/logger.ts: structured logging for the retrieval backend
import { Logger } from 'tslog';

export type LogType = 'json' | 'pretty' | 'hidden';

function resolveLogType(raw: string | undefined): LogType {
  if (raw === 'json' || raw === 'hidden' || raw === 'pretty') return raw;
  return 'pretty';
}

function resolveMinLevel(raw: string | undefined): number {
  const level = Number.parseInt(raw ?? '', 10);
  return Number.isInteger(level) && level >= 0 && level <= 6 ? level : 3; // info
}

export const logger = new Logger({
  name: 'voucher-retrieval',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: resolveLogType(process.env.LOG_TYPE),
});

/** Applies validated settings once configuration is loaded. */
export function configureLogger(options: { type: LogType; minLevel: number }): void {
  logger.settings.type = options.type;
  logger.settings.minLevel = options.minLevel;
}
