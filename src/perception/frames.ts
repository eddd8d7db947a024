import { PNG } from 'pngjs';
import jpeg from 'jpeg-js';
import { ProtocolError } from '../errors.js';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type ImageFormat = 'png' | 'jpeg';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];
const JPEG_SIGNATURE = [0xff, 0xd8];

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, PNG_SIGNATURE)) {
    return 'png';
  }
  if (startsWith(bytes, JPEG_SIGNATURE)) {
    return 'jpeg';
  }
  return null;
}

export function imageExtension(bytes: Uint8Array): string {
  return detectImageFormat(bytes) === 'png' ? 'png' : 'jpg';
}

/** Decodes a PNG or JPEG buffer to 8-bit luma. Throws ProtocolError on anything else. */
export function readFrameAsGrayscale(buffer: Buffer): GrayscaleFrame {
  const format = detectImageFormat(buffer);
  if (!format) {
    throw new ProtocolError('Unsupported image format');
  }

  let rgba: { width: number; height: number; data: Uint8Array };
  try {
    rgba = format === 'png' ? PNG.sync.read(buffer) : jpeg.decode(buffer, { useTArray: true });
  } catch (error) {
    throw new ProtocolError(`Failed to decode ${format} frame`, { cause: error });
  }

  const { width, height, data } = rgba;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // ITU-R 601 luma
    grayscale[i] = Math.floor((r * 299 + g * 587 + b * 114) / 1000);
  }

  return { width, height, data: grayscale };
}

export function resizeNearest(frame: GrayscaleFrame, width: number, height: number): GrayscaleFrame {
  if (frame.width === width && frame.height === height) {
    return frame;
  }

  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    const sourceY = Math.min(frame.height - 1, Math.floor((y * frame.height) / height));
    for (let x = 0; x < width; x += 1) {
      const sourceX = Math.min(frame.width - 1, Math.floor((x * frame.width) / width));
      output[y * width + x] = frame.data[sourceY * frame.width + sourceX];
    }
  }

  return { width, height, data: output };
}

export type DiffStats = {
  deltas: Uint8Array;
  totalPixels: number;
};

export function frameDiffStats(previous: GrayscaleFrame, current: GrayscaleFrame): DiffStats {
  if (previous.width !== current.width || previous.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const totalPixels = current.data.length;
  const deltas = new Uint8Array(totalPixels);

  for (let i = 0; i < totalPixels; i += 1) {
    deltas[i] = Math.abs(current.data[i] - previous.data[i]);
  }

  return { deltas, totalPixels };
}

/**
 * Share of pixels whose absolute luma difference is strictly greater than
 * `pixelDelta`. The previous frame is resized to the current one first.
 */
export function changedPixelRatio(
  previous: GrayscaleFrame,
  current: GrayscaleFrame,
  pixelDelta: number
): number {
  const stats = frameDiffStats(resizeNearest(previous, current.width, current.height), current);
  if (stats.totalPixels === 0) {
    return 0;
  }

  let changedPixels = 0;
  for (let i = 0; i < stats.totalPixels; i += 1) {
    if (stats.deltas[i] > pixelDelta) {
      changedPixels += 1;
    }
  }

  return changedPixels / stats.totalPixels;
}

function startsWith(bytes: Uint8Array, signature: number[]) {
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.every((value, index) => bytes[index] === value);
}
