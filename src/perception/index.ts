import { childLogger, type ComponentLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { PerceptionConfig } from '../config/index.js';
import type { VisionProvider, VisionResult } from '../collaborators/index.js';
import { MotionDetector, type MotionOutcome } from './motion.js';
import { NoiseDetector } from './noise.js';
import { SceneAnalyzer } from './sceneAnalyzer.js';

export interface PerceptionPipelineOptions {
  config: PerceptionConfig;
  vision: VisionProvider;
  customPrompt: () => string;
  clock?: () => number;
  log?: ComponentLogger;
  metrics?: MetricsRegistry;
}

/** Motion, noise and scene analysis state for the single connected device. */
export class PerceptionPipeline {
  readonly motion: MotionDetector;
  readonly noise: NoiseDetector;
  readonly scene: SceneAnalyzer;
  private forceNextAnalysis = false;
  private readonly vision: VisionProvider;
  private readonly log: ComponentLogger;
  private readonly metrics: MetricsRegistry;

  constructor(options: PerceptionPipelineOptions) {
    const { config } = options;
    this.vision = options.vision;
    this.log = options.log ?? childLogger('perception');
    this.metrics = options.metrics ?? metricsModule;
    this.motion = new MotionDetector({
      threshold: config.motionThreshold,
      pixelDelta: config.pixelDelta,
      log: this.log
    });
    this.noise = new NoiseDetector(config.noiseThreshold);
    this.scene = new SceneAnalyzer({
      vision: options.vision,
      defaultPrompt: config.defaultPrompt,
      customPrompt: options.customPrompt,
      minIntervalMs: config.analysisIntervalMs,
      snapshots: config.snapshots,
      clock: options.clock,
      log: this.log,
      metrics: this.metrics
    });
  }

  detectMotion(image: Buffer): MotionOutcome {
    const outcome = this.motion.detect(image);
    this.metrics.increment('perception', 'framesProcessed');
    if (outcome.motion) {
      this.metrics.increment('perception', 'motionDetected');
    }
    return outcome;
  }

  detectNoise(audio: Buffer): boolean {
    const noisy = this.noise.detect(audio);
    if (noisy) {
      this.metrics.increment('perception', 'noiseDetected');
    }
    return noisy;
  }

  /** The next frame is analyzed regardless of motion or the rate limit. */
  requestAnalysis() {
    this.forceNextAnalysis = true;
  }

  get analysisPending() {
    return this.forceNextAnalysis;
  }

  async analyzeIfNeeded(image: Buffer, motion: boolean): Promise<VisionResult | null> {
    if (!motion && !this.forceNextAnalysis) {
      return null;
    }
    const force = this.forceNextAnalysis;
    this.forceNextAnalysis = false;
    return this.scene.analyze(image, { force });
  }

  setMotionThreshold(value: number) {
    const applied = this.motion.setThreshold(value);
    this.log.info({ threshold: applied }, 'Motion threshold updated');
    return applied;
  }

  setNoiseThreshold(value: number) {
    const applied = this.noise.setThreshold(value);
    this.log.info({ threshold: applied }, 'Noise threshold updated');
    return applied;
  }

  /** One-off description for an ingested photo; not rate limited. Null on failure. */
  async describe(image: Buffer, question: string): Promise<string | null> {
    try {
      const result = await this.vision.analyze(image, question);
      return typeof result.description === 'string' && result.description ? result.description : null;
    } catch (error) {
      this.log.warn({ err: error }, 'Photo description failed');
      return null;
    }
  }
}

export { MotionDetector } from './motion.js';
export { NoiseDetector, pcm16Rms } from './noise.js';
export { SceneAnalyzer } from './sceneAnalyzer.js';
