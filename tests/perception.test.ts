import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import jpeg from 'jpeg-js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';
import { DEFAULT_CONFIG } from '../src/config/index.js';
import { MotionDetector } from '../src/perception/motion.js';
import { NoiseDetector, pcm16Rms } from '../src/perception/noise.js';
import { SceneAnalyzer } from '../src/perception/sceneAnalyzer.js';
import { PerceptionPipeline } from '../src/perception/index.js';
import { detectImageFormat, readFrameAsGrayscale } from '../src/perception/frames.js';
import { FakeVision, createLogger, grayPng, pcm16 } from './helpers/fakes.js';

describe('MotionDetector', () => {
  it('MotionIdenticalFrames reports no motion for the first and for identical frames', () => {
    const detector = new MotionDetector({ log: createLogger() });
    const frame = grayPng(10, 10, (x, y) => (x + y) * 10);

    expect(detector.detect(frame)).toEqual({ motion: false, reason: 'first-frame' });
    expect(detector.detect(frame)).toEqual({ motion: false, reason: 'compared', ratio: 0 });
  });

  it('MotionDifferentFrames reports motion when more than five percent of pixels change', () => {
    const detector = new MotionDetector({ log: createLogger() });
    detector.detect(grayPng(10, 10, () => 0));

    // 6 of 100 pixels brighter by more than the pixel delta
    const outcome = detector.detect(grayPng(10, 10, (x, y) => (y === 0 && x < 6 ? 200 : 0)));
    expect(outcome).toEqual({ motion: true, reason: 'compared', ratio: 0.06 });
  });

  it('ignores changes at or below the pixel delta and at the threshold ratio', () => {
    const detector = new MotionDetector({ log: createLogger() });
    detector.detect(grayPng(10, 10, () => 100));

    expect(detector.detect(grayPng(10, 10, () => 125))).toEqual({
      motion: false,
      reason: 'compared',
      ratio: 0
    });

    detector.detect(grayPng(10, 10, () => 0));
    expect(detector.detect(grayPng(10, 10, (x, y) => (y === 0 && x < 5 ? 255 : 0)))).toEqual({
      motion: false,
      reason: 'compared',
      ratio: 0.05
    });
  });

  it('compares frames of different sizes by resizing the previous frame', () => {
    const detector = new MotionDetector({ log: createLogger() });
    detector.detect(grayPng(4, 4, () => 0));

    const outcome = detector.detect(grayPng(8, 8, () => 255));
    expect(outcome).toEqual({ motion: true, reason: 'compared', ratio: 1 });
  });

  it('clears the reference frame when an image cannot be decoded', () => {
    const detector = new MotionDetector({ log: createLogger() });
    detector.detect(grayPng(4, 4, () => 0));

    expect(detector.detect(Buffer.from('not an image'))).toEqual({ motion: false, reason: 'undecodable' });
    expect(detector.detect(grayPng(4, 4, () => 255))).toEqual({ motion: false, reason: 'first-frame' });
  });

  it('clamps the threshold into the unit interval', () => {
    const detector = new MotionDetector({ log: createLogger() });
    expect(detector.setThreshold(2)).toBe(1);
    expect(detector.setThreshold(-1)).toBe(0);
    expect(detector.setThreshold(Number.NaN)).toBe(0.05);
  });

  it('decodes JPEG frames to luma', () => {
    const width = 2;
    const height = 2;
    const data = Buffer.alloc(width * height * 4, 255);
    const encoded = jpeg.encode({ data, width, height }, 90).data;

    expect(detectImageFormat(encoded)).toBe('jpeg');
    const frame = readFrameAsGrayscale(encoded);
    expect(frame.width).toBe(2);
    expect(frame.height).toBe(2);
    expect(frame.data.every(value => value > 240)).toBe(true);
  });
});

describe('NoiseDetector', () => {
  it('NoiseZeroAndFullScale treats silence as quiet and a full scale signal as noise', () => {
    const detector = new NoiseDetector(500);

    expect(detector.detect(pcm16(240, 0))).toBe(false);
    expect(detector.detect(pcm16(240, 32767))).toBe(true);
  });

  it('computes the RMS of signed 16-bit samples', () => {
    const audio = Buffer.alloc(4);
    audio.writeInt16LE(300, 0);
    audio.writeInt16LE(-400, 2);

    expect(pcm16Rms(audio)).toBeCloseTo(Math.sqrt((300 * 300 + 400 * 400) / 2), 6);
    expect(pcm16Rms(Buffer.from([1]))).toBeNull();
    expect(new NoiseDetector().detect(Buffer.from([0xff]))).toBe(false);
  });

  it('uses a strict comparison against the threshold', () => {
    const detector = new NoiseDetector(500);
    expect(detector.detect(pcm16(10, 500))).toBe(false);
    expect(detector.detect(pcm16(10, 501))).toBe(true);
    expect(detector.setThreshold(-5)).toBe(0);
  });
});

describe('SceneAnalyzer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-scene-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('SceneRateLimit skips calls inside the interval and allows forced ones', async () => {
    let now = 1_000_000;
    const vision = new FakeVision();
    const metrics = new MetricsRegistry();
    const analyzer = new SceneAnalyzer({
      vision,
      defaultPrompt: 'Describe the scene',
      customPrompt: () => '',
      clock: () => now,
      log: createLogger(),
      metrics
    });
    const image = grayPng(2, 2, () => 0);

    expect(await analyzer.analyze(image)).toEqual({ description: 'A person at the door', confidence: 0.9 });
    now += 10_000;
    expect(await analyzer.analyze(image)).toBeNull();
    expect(await analyzer.analyze(image, { force: true })).not.toBeNull();
    expect(analyzer.lastAnalysisTimestamp).toBe(1_010_000);

    now += 29_999;
    expect(await analyzer.analyze(image)).toBeNull();
    now += 1;
    expect(await analyzer.analyze(image)).not.toBeNull();

    expect(vision.calls).toHaveLength(3);
    expect(metrics.getCounter('perception', 'analysisThrottled')).toBe(2);
  });

  it('does not advance the rate limit when the vision call fails', async () => {
    let now = 5_000;
    const vision = new FakeVision();
    vision.failure = new Error('backend offline');
    const analyzer = new SceneAnalyzer({
      vision,
      defaultPrompt: 'Describe the scene',
      customPrompt: () => '',
      clock: () => now,
      log: createLogger(),
      metrics: new MetricsRegistry()
    });
    const image = grayPng(2, 2, () => 0);

    expect(await analyzer.analyze(image)).toBeNull();
    expect(analyzer.lastAnalysisTimestamp).toBeNull();

    vision.failure = null;
    now += 1;
    expect(await analyzer.analyze(image)).not.toBeNull();
  });

  it('prefers the custom prompt and clamps confidence', async () => {
    const vision = new FakeVision();
    vision.result = { description: 'Cat on the sofa', confidence: 1.7 };
    let custom = '  Is the cat inside?  ';
    const analyzer = new SceneAnalyzer({
      vision,
      defaultPrompt: 'Describe the scene',
      customPrompt: () => custom,
      log: createLogger(),
      metrics: new MetricsRegistry()
    });

    expect(await analyzer.analyze(grayPng(2, 2, () => 0))).toEqual({
      description: 'Cat on the sofa',
      confidence: 1
    });
    expect(vision.calls[0].prompt).toBe('Is the cat inside?');

    custom = '   ';
    expect(analyzer.resolvePrompt()).toBe('Describe the scene');
  });

  it('saves a snapshot named from the analysis time', async () => {
    const analyzer = new SceneAnalyzer({
      vision: new FakeVision(),
      defaultPrompt: 'Describe the scene',
      customPrompt: () => '',
      snapshots: { dir: tempDir, maxFiles: 100, maxAgeDays: 7 },
      clock: () => Date.UTC(2024, 0, 2, 3, 4, 5, 6),
      log: createLogger(),
      metrics: new MetricsRegistry()
    });

    await analyzer.analyze(grayPng(2, 2, () => 0));
    expect(fs.readdirSync(tempDir)).toEqual(['20240102_030405_006.png']);
  });
});

describe('PerceptionPipeline', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('forces one analysis after a request even without motion', async () => {
    const vision = new FakeVision();
    const pipeline = new PerceptionPipeline({
      config: { ...DEFAULT_CONFIG.perception, snapshots: { dir: tempDir, maxFiles: 100, maxAgeDays: 7 } },
      vision,
      customPrompt: () => '',
      clock: () => 0,
      log: createLogger(),
      metrics: new MetricsRegistry()
    });
    const image = Buffer.from('placeholder');

    expect(await pipeline.analyzeIfNeeded(image, false)).toBeNull();
    pipeline.requestAnalysis();
    expect(pipeline.analysisPending).toBe(true);
    expect(await pipeline.analyzeIfNeeded(image, false)).not.toBeNull();
    expect(pipeline.analysisPending).toBe(false);
    expect(vision.calls).toHaveLength(1);
  });

  it('describes ingested photos and returns null when the backend fails', async () => {
    const vision = new FakeVision();
    const pipeline = new PerceptionPipeline({
      config: { ...DEFAULT_CONFIG.perception, snapshots: { dir: tempDir, maxFiles: 100, maxAgeDays: 7 } },
      vision,
      customPrompt: () => '',
      log: createLogger(),
      metrics: new MetricsRegistry()
    });

    expect(await pipeline.describe(Buffer.from('photo'), 'Who is there?')).toBe('A person at the door');
    expect(vision.calls[0].prompt).toBe('Who is there?');

    vision.failure = new Error('timeout');
    expect(await pipeline.describe(Buffer.from('photo'), 'Who is there?')).toBeNull();
  });
});
