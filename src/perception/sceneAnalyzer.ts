import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { clampConfidence, type VisionProvider, type VisionResult } from '../collaborators/index.js';
import { runSnapshotRetention, saveSnapshot, type SnapshotRetentionOptions } from '../tasks/retention.js';
import { imageExtension } from './frames.js';

export const DEFAULT_ANALYSIS_INTERVAL_MS = 30_000;

export type SnapshotPolicy = Omit<SnapshotRetentionOptions, 'now'>;

export interface SceneAnalyzerOptions {
  vision: VisionProvider;
  defaultPrompt: string;
  /** Operator prompt; an empty string falls back to `defaultPrompt`. */
  customPrompt: () => string;
  minIntervalMs?: number;
  snapshots?: SnapshotPolicy;
  clock?: () => number;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export class SceneAnalyzer {
  private lastAnalysisAt: number | null = null;
  private readonly minIntervalMs: number;
  private readonly clock: () => number;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: SceneAnalyzerOptions) {
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_ANALYSIS_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
    this.log = options.log ?? childLogger('scene-analyzer');
    this.metrics = options.metrics ?? metricsModule;
  }

  get lastAnalysisTimestamp() {
    return this.lastAnalysisAt;
  }

  isThrottled(now = this.clock()) {
    return this.lastAnalysisAt !== null && now - this.lastAnalysisAt < this.minIntervalMs;
  }

  resolvePrompt() {
    const custom = this.options.customPrompt().trim();
    return custom || this.options.defaultPrompt;
  }

  /**
   * Runs the vision collaborator unless throttled. A throttled or failed call
   * returns null and leaves the rate-limit clock untouched.
   */
  async analyze(image: Buffer, options: { force?: boolean } = {}): Promise<VisionResult | null> {
    const now = this.clock();
    if (!options.force && this.isThrottled(now)) {
      this.metrics.increment('perception', 'analysisThrottled');
      this.log.debug('Scene analysis rate limited');
      return null;
    }

    let result: VisionResult;
    try {
      const raw = await this.options.vision.analyze(image, this.resolvePrompt());
      result = {
        description: typeof raw.description === 'string' ? raw.description : '',
        confidence: clampConfidence(raw.confidence)
      };
    } catch (error) {
      this.metrics.increment('perception', 'analysisFailed');
      this.log.error({ err: error }, 'Scene analysis failed');
      return null;
    }

    this.lastAnalysisAt = now;
    this.metrics.increment('perception', 'analysisCompleted');
    this.log.info({ confidence: result.confidence }, 'Scene analysis completed');

    await this.storeSnapshot(image, now);
    return result;
  }

  private async storeSnapshot(image: Buffer, now: number) {
    const policy = this.options.snapshots;
    if (!policy) {
      return;
    }

    try {
      const filePath = await saveSnapshot(policy.dir, image, imageExtension(image), now);
      this.log.debug({ path: filePath }, 'Saved snapshot');
      await runSnapshotRetention(policy, this.log, this.metrics);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to store snapshot');
    }
  }
}
