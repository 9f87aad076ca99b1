import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVELS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseThreshold(value: string | undefined): LogThreshold {
  const found = LEVELS.find(l => l === value);
  return found ?? 'info';
}

let runtimeLevel: LogThreshold = parseThreshold(process.env.LOG_LEVEL);
const logger = pino({ level: runtimeLevel });

type Entry = { level: LogLevel; msg: string; time: number };
const ring: Entry[] = [];
const RING_MAX = 2000;

export function setLogLevel(level: LogThreshold) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel(): LogThreshold { return runtimeLevel; }

export function isLogThreshold(value: unknown): value is LogThreshold {
  return typeof value === 'string' && LEVELS.some(l => l === value);
}

export function log(level: LogLevel, msg: string) {
  // The ring keeps every message so the UI can read them back even when
  // pino is configured to a higher threshold.
  ring.push({ level, msg, time: Date.now() });
  if (ring.length > RING_MAX) ring.splice(0, ring.length - RING_MAX);
  logger[level](msg);
}

export function getLogs(since?: number) {
  return ring.filter(e => !since || e.time > since);
}
