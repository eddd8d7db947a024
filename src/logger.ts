import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'watcher-gateway';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(level => level.toLowerCase())
);

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel);
      return method.apply(this, inputArgs);
    }
  }
});

export type Logger = typeof logger;
export type ComponentLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function childLogger(component: string): ComponentLogger {
  return logger.child({ component });
}

export default logger;
