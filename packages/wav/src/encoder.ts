/**
 * Recording Container Encoder
 *
 * Writes containers in the recorder's layout:
 *   RIFF/WAVE, 'fmt ', optional 'JUNK' padding, 'data', descriptive block
 *
 * @module wav/encoder
 */

import { InvalidParameterError } from '@core/errors';
import type { RecorderMetadata, SampleEncoding } from '@core/types';
import { CHUNK_HEADER_SIZE, RIFF_HEADER_SIZE, viewOf, writeFourCC } from './chunks';
import { SUPPORTED_BITS, WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM, writeSample } from './format';
import { serializeRecorderMetadata } from './metadata';

/** Chunk id used for the descriptive block */
export const METADATA_CHUNK_ID = 'desc';

const FMT_SIZE = 16;

export interface EncodeOptions {
  sampleRate: number;
  /** One array per channel, all of equal length */
  samples: ArrayLike<number>[];
  /** Sample encoding (default: 'pcm') */
  encoding?: SampleEncoding;
  /** Bits per sample (default: 24 for pcm, 32 for float) */
  bitsPerSample?: number;
  /** Descriptive block; samples are divided by its scales before quantizing */
  metadata?: RecorderMetadata | null;
  /** Size of a 'JUNK' chunk placed between 'fmt ' and 'data' (default: 0, none) */
  reserveBytes?: number;
}

function chunkLength(size: number): number {
  return CHUNK_HEADER_SIZE + size + (size & 1);
}

function validate(options: EncodeOptions, encoding: SampleEncoding, bitsPerSample: number): void {
  const { samples, sampleRate, metadata } = options;
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError('Sample rate must be a positive integer', 'sampleRate', sampleRate);
  }
  if (!SUPPORTED_BITS[encoding].includes(bitsPerSample)) {
    throw new InvalidParameterError(
      `${encoding} samples support ${SUPPORTED_BITS[encoding].join(', ')} bits`,
      'bitsPerSample',
      bitsPerSample
    );
  }
  if (samples.length === 0) {
    throw new InvalidParameterError('At least one channel is required', 'samples');
  }
  if (samples.some((channel) => channel.length !== samples[0].length)) {
    throw new InvalidParameterError('All channels must have the same length', 'samples');
  }
  if (metadata) {
    if (metadata.channelNames.length !== samples.length) {
      throw new InvalidParameterError(
        `Metadata describes ${metadata.channelNames.length} channel(s), samples have ${samples.length}`,
        'metadata'
      );
    }
    if (metadata.sensitivities.some((value) => !Number.isFinite(value))) {
      throw new InvalidParameterError('Sensitivities must be finite', 'metadata.sensitivities');
    }
    if (metadata.scales.some((scale) => scale === 0 || !Number.isFinite(scale))) {
      throw new InvalidParameterError('Scale factors must be finite and non-zero', 'metadata.scales');
    }
  }
}

/**
 * Encode channel samples (and an optional descriptive block) into a container.
 */
export function encodeWav(options: EncodeOptions): Uint8Array {
  const encoding = options.encoding ?? 'pcm';
  const bitsPerSample = options.bitsPerSample ?? (encoding === 'pcm' ? 24 : 32);
  validate(options, encoding, bitsPerSample);

  const { samples, sampleRate, metadata } = options;
  const reserveBytes = options.reserveBytes ?? 0;
  const numChannels = samples.length;
  const numFrames = samples[0].length;
  const bytesPerSample = bitsPerSample / 8;
  const blockAlign = numChannels * bytesPerSample;
  const dataSize = numFrames * blockAlign;
  const trailer = metadata ? serializeRecorderMetadata(metadata) : null;

  const total =
    RIFF_HEADER_SIZE +
    chunkLength(FMT_SIZE) +
    (reserveBytes > 0 ? chunkLength(reserveBytes) : 0) +
    chunkLength(dataSize) +
    (trailer ? chunkLength(trailer.length) : 0);

  const bytes = new Uint8Array(total);
  const view = viewOf(bytes);

  writeFourCC(bytes, 0, 'RIFF');
  view.setUint32(4, total - 8, true);
  writeFourCC(bytes, 8, 'WAVE');
  let offset = RIFF_HEADER_SIZE;

  writeFourCC(bytes, offset, 'fmt ');
  view.setUint32(offset + 4, FMT_SIZE, true);
  view.setUint16(offset + 8, encoding === 'pcm' ? WAVE_FORMAT_PCM : WAVE_FORMAT_IEEE_FLOAT, true);
  view.setUint16(offset + 10, numChannels, true);
  view.setUint32(offset + 12, sampleRate, true);
  view.setUint32(offset + 16, sampleRate * blockAlign, true);
  view.setUint16(offset + 20, blockAlign, true);
  view.setUint16(offset + 22, bitsPerSample, true);
  offset += chunkLength(FMT_SIZE);

  if (reserveBytes > 0) {
    writeFourCC(bytes, offset, 'JUNK');
    view.setUint32(offset + 4, reserveBytes, true);
    offset += chunkLength(reserveBytes);
  }

  writeFourCC(bytes, offset, 'data');
  view.setUint32(offset + 4, dataSize, true);
  const dataOffset = offset + CHUNK_HEADER_SIZE;
  for (let ch = 0; ch < numChannels; ch++) {
    const channel = samples[ch];
    const scale = metadata ? metadata.scales[ch] : 1;
    for (let frame = 0; frame < numFrames; frame++) {
      writeSample(
        view,
        dataOffset + frame * blockAlign + ch * bytesPerSample,
        channel[frame] / scale,
        encoding,
        bitsPerSample
      );
    }
  }
  offset += chunkLength(dataSize);

  if (trailer) {
    writeFourCC(bytes, offset, METADATA_CHUNK_ID);
    view.setUint32(offset + 4, trailer.length, true);
    bytes.set(trailer, offset + CHUNK_HEADER_SIZE);
  }

  return bytes;
}
