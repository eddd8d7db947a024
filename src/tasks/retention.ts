import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { errorMessage } from '../errors.js';

type RetentionLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error' | 'debug'>;

const SNAPSHOT_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png']);
const DAY_MS = 24 * 60 * 60 * 1000;

export type SnapshotRetentionOptions = {
  dir: string;
  maxFiles: number;
  maxAgeDays: number;
  now?: number;
};

export type RetentionWarning = {
  path: string;
  reason: string;
};

export type SnapshotRetentionOutcome = {
  removedByAge: number;
  removedByCount: number;
  remaining: number;
  warnings: RetentionWarning[];
};

type SnapshotEntry = {
  path: string;
  name: string;
  mtimeMs: number;
};

export function snapshotFileName(date: Date, extension: string): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}_${pad(date.getUTCMilliseconds(), 3)}.${extension}`;
}

export async function saveSnapshot(
  dir: string,
  bytes: Buffer,
  extension: string,
  now = Date.now()
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, snapshotFileName(new Date(now), extension));
  await fs.writeFile(filePath, bytes);
  return filePath;
}

/**
 * Deletes snapshots older than `maxAgeDays`, then trims the survivors to
 * `maxFiles`, oldest modification time first. Files that vanish or cannot be
 * removed are reported as warnings.
 */
export async function applySnapshotRetention(
  options: SnapshotRetentionOptions
): Promise<SnapshotRetentionOutcome> {
  const now = options.now ?? Date.now();
  const warnings: RetentionWarning[] = [];
  const entries = await listSnapshots(options.dir, warnings);

  const maxAgeMs = Math.max(0, options.maxAgeDays) * DAY_MS;
  const survivors: SnapshotEntry[] = [];
  let removedByAge = 0;

  for (const entry of entries) {
    if (now - entry.mtimeMs > maxAgeMs) {
      if (await removeFile(entry.path, warnings)) {
        removedByAge += 1;
        continue;
      }
    }
    survivors.push(entry);
  }

  survivors.sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name));

  const maxFiles = Math.max(0, Math.floor(options.maxFiles));
  let removedByCount = 0;
  const excess = survivors.length - maxFiles;
  for (let index = 0; index < excess; index += 1) {
    if (await removeFile(survivors[index].path, warnings)) {
      removedByCount += 1;
    }
  }

  return {
    removedByAge,
    removedByCount,
    remaining: survivors.length - removedByCount,
    warnings
  };
}

async function listSnapshots(dir: string, warnings: RetentionWarning[]): Promise<SnapshotEntry[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }

  const entries: SnapshotEntry[] = [];
  for (const name of names) {
    if (!SNAPSHOT_EXTENSIONS.has(path.extname(name).toLowerCase())) {
      continue;
    }
    const filePath = path.join(dir, name);
    try {
      const stats = await fs.stat(filePath);
      if (stats.isFile()) {
        entries.push({ path: filePath, name, mtimeMs: stats.mtimeMs });
      }
    } catch (error) {
      if (!isMissing(error)) {
        warnings.push({ path: filePath, reason: errorMessage(error) });
      }
    }
  }
  return entries;
}

async function removeFile(filePath: string, warnings: RetentionWarning[]) {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return true;
    }
    warnings.push({ path: filePath, reason: errorMessage(error) });
    return false;
  }
}

function isMissing(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface RetentionTaskOptions extends Omit<SnapshotRetentionOptions, 'now'> {
  intervalMs: number;
  logger?: RetentionLogger;
  metrics?: MetricsRegistry;
}

/** Periodic snapshot retention, so the age rule applies even when no analysis runs. */
export class RetentionTask {
  private readonly options: RetentionTaskOptions;
  private readonly logger: RetentionLogger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(options: RetentionTaskOptions) {
    this.options = { ...options, intervalMs: Math.max(1000, Math.floor(options.intervalMs)) };
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  async runOnce(): Promise<SnapshotRetentionOutcome | null> {
    if (this.running) {
      return null;
    }

    this.running = true;
    try {
      return await runSnapshotRetention(this.options, this.logger, this.metrics);
    } catch (error) {
      this.logger.error({ err: error }, 'Snapshot retention failed');
      return null;
    } finally {
      this.running = false;
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => {
        this.scheduleNext(this.options.intervalMs);
      });
    }, delayMs);
    this.timer.unref();
  }
}

export async function runSnapshotRetention(
  options: SnapshotRetentionOptions,
  logger: RetentionLogger = loggerModule,
  metrics: MetricsRegistry = metricsModule
): Promise<SnapshotRetentionOutcome> {
  const outcome = await applySnapshotRetention(options);

  for (const warning of outcome.warnings) {
    logger.warn({ path: warning.path, reason: warning.reason }, 'Snapshot retention warning');
  }

  metrics.increment('retention', 'runs');
  metrics.increment('retention', 'removedByAge', outcome.removedByAge);
  metrics.increment('retention', 'removedByCount', outcome.removedByCount);
  metrics.setGauge('snapshots.count', outcome.remaining);

  if (outcome.removedByAge > 0 || outcome.removedByCount > 0) {
    logger.info(
      {
        dir: options.dir,
        removedByAge: outcome.removedByAge,
        removedByCount: outcome.removedByCount,
        remaining: outcome.remaining
      },
      'Snapshot retention completed'
    );
  } else {
    logger.debug({ dir: options.dir, remaining: outcome.remaining }, 'Snapshot retention found nothing to remove');
  }

  return outcome;
}
