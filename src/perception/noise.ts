export const DEFAULT_NOISE_THRESHOLD = 500;

/**
 * Root mean square of 16-bit signed little-endian PCM. A trailing odd byte is
 * ignored; fewer than two bytes yields null.
 */
export function pcm16Rms(audio: Buffer): number | null {
  const sampleCount = Math.floor(audio.length / 2);
  if (sampleCount === 0) {
    return null;
  }

  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i += 1) {
    const sample = audio.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

export class NoiseDetector {
  private noiseThreshold: number;

  constructor(threshold = DEFAULT_NOISE_THRESHOLD) {
    this.noiseThreshold = Math.max(0, threshold);
  }

  get threshold() {
    return this.noiseThreshold;
  }

  setThreshold(value: number) {
    this.noiseThreshold = Number.isNaN(value) ? DEFAULT_NOISE_THRESHOLD : Math.max(0, value);
    return this.noiseThreshold;
  }

  detect(audio: Buffer): boolean {
    const rms = pcm16Rms(audio);
    return rms !== null && rms > this.noiseThreshold;
  }
}
