/**
 * Sample Formats
 *
 * Format tags and the per-sample codecs for the bit depths the recorder
 * can write. Integer samples are normalized to [-1, 1); float samples pass
 * through unchanged.
 *
 * @module wav/format
 */

import { MalformedContainerError } from '@core/errors';
import type { SampleEncoding } from '@core/types';

// ===== Format Tags =====

export const WAVE_FORMAT_PCM = 0x0001;
export const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
export const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

/** Bit depths accepted per encoding */
export const SUPPORTED_BITS: Record<SampleEncoding, readonly number[]> = {
  pcm: [8, 16, 24, 32],
  float: [32, 64],
};

/**
 * Map a format tag (and, for extensible headers, the sub-format tag)
 * to a sample encoding.
 */
export function resolveEncoding(
  audioFormat: number,
  bitsPerSample: number,
  subFormat?: number
): SampleEncoding {
  const tag = audioFormat === WAVE_FORMAT_EXTENSIBLE ? subFormat : audioFormat;

  let encoding: SampleEncoding;
  if (tag === WAVE_FORMAT_PCM) {
    encoding = 'pcm';
  } else if (tag === WAVE_FORMAT_IEEE_FLOAT) {
    encoding = 'float';
  } else {
    throw new MalformedContainerError(
      `Unsupported format tag 0x${(tag ?? audioFormat).toString(16)}`
    );
  }

  if (!SUPPORTED_BITS[encoding].includes(bitsPerSample)) {
    throw new MalformedContainerError(
      `Unsupported bit depth ${bitsPerSample} for ${encoding} samples`
    );
  }
  return encoding;
}

/** Full-scale value for integer samples of the given depth */
export function fullScale(bitsPerSample: number): number {
  return 2 ** (bitsPerSample - 1);
}

// ===== Sample Codecs =====

/**
 * Read one little-endian sample and normalize it.
 */
export function readSample(
  view: DataView,
  offset: number,
  encoding: SampleEncoding,
  bitsPerSample: number
): number {
  if (encoding === 'float') {
    return bitsPerSample === 64
      ? view.getFloat64(offset, true)
      : view.getFloat32(offset, true);
  }

  switch (bitsPerSample) {
    case 8:
      // 8-bit PCM is unsigned
      return (view.getUint8(offset) - 128) / 128;
    case 16:
      return view.getInt16(offset, true) / 32768;
    case 24: {
      const raw =
        view.getUint8(offset) |
        (view.getUint8(offset + 1) << 8) |
        (view.getUint8(offset + 2) << 16);
      // Sign-extend from 24 bits
      return ((raw << 8) >> 8) / 8388608;
    }
    default:
      return view.getInt32(offset, true) / 2147483648;
  }
}

/**
 * Quantize and write one little-endian sample. Integer samples are
 * clamped to the representable range.
 */
export function writeSample(
  view: DataView,
  offset: number,
  value: number,
  encoding: SampleEncoding,
  bitsPerSample: number
): void {
  if (encoding === 'float') {
    if (bitsPerSample === 64) {
      view.setFloat64(offset, value, true);
    } else {
      view.setFloat32(offset, value, true);
    }
    return;
  }

  const scale = fullScale(bitsPerSample);
  const quantized = Math.max(-scale, Math.min(scale - 1, Math.round(value * scale)));

  switch (bitsPerSample) {
    case 8:
      view.setUint8(offset, quantized + 128);
      break;
    case 16:
      view.setInt16(offset, quantized, true);
      break;
    case 24:
      view.setUint8(offset, quantized & 0xff);
      view.setUint8(offset + 1, (quantized >> 8) & 0xff);
      view.setUint8(offset + 2, (quantized >> 16) & 0xff);
      break;
    default:
      view.setInt32(offset, quantized, true);
  }
}
