import { childLogger, type ComponentLogger } from '../logger.js';
import { changedPixelRatio, readFrameAsGrayscale, type GrayscaleFrame } from './frames.js';

export const DEFAULT_MOTION_THRESHOLD = 0.05;
export const DEFAULT_PIXEL_DELTA = 25;

export interface MotionDetectorOptions {
  threshold?: number;
  pixelDelta?: number;
  log?: Pick<ComponentLogger, 'debug' | 'warn'>;
}

export type MotionOutcome =
  | { motion: false; reason: 'first-frame' }
  | { motion: false; reason: 'undecodable' }
  | { motion: boolean; reason: 'compared'; ratio: number };

/**
 * Frame-difference motion check against the previous frame. The reference is
 * replaced on every call and cleared when a frame cannot be decoded.
 */
export class MotionDetector {
  private previousFrame: GrayscaleFrame | null = null;
  private motionThreshold: number;
  private readonly pixelDelta: number;
  private readonly log: Pick<ComponentLogger, 'debug' | 'warn'>;

  constructor(options: MotionDetectorOptions = {}) {
    this.motionThreshold = clampRatio(options.threshold ?? DEFAULT_MOTION_THRESHOLD);
    this.pixelDelta = options.pixelDelta ?? DEFAULT_PIXEL_DELTA;
    this.log = options.log ?? childLogger('motion');
  }

  get threshold() {
    return this.motionThreshold;
  }

  setThreshold(value: number) {
    this.motionThreshold = clampRatio(value);
    return this.motionThreshold;
  }

  detect(image: Buffer): MotionOutcome {
    let current: GrayscaleFrame;
    try {
      current = readFrameAsGrayscale(image);
    } catch (error) {
      this.log.warn({ err: error, bytes: image.length }, 'Motion frame could not be decoded');
      this.previousFrame = null;
      return { motion: false, reason: 'undecodable' };
    }

    const previous = this.previousFrame;
    this.previousFrame = current;
    if (!previous) {
      return { motion: false, reason: 'first-frame' };
    }

    const ratio = changedPixelRatio(previous, current, this.pixelDelta);
    const motion = ratio > this.motionThreshold;
    if (motion) {
      this.log.debug({ ratio, threshold: this.motionThreshold }, 'Motion detected');
    }
    return { motion, reason: 'compared', ratio };
  }
}

function clampRatio(value: number) {
  if (Number.isNaN(value)) {
    return DEFAULT_MOTION_THRESHOLD;
  }
  return Math.min(1, Math.max(0, value));
}
