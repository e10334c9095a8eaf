/**
 * Recording Container Decoder
 *
 * Decodes the recorder's WAV container into per-channel sample arrays,
 * the standard header fields and the recorder's descriptive block.
 *
 * Usage:
 *   const { samples, header, metadata } = await openWav('data/Run_1_20240101120000.wav');
 *   console.log(header.sampleRate, metadata?.label, samples[0].length);
 *
 * @module wav/decoder
 */

import { readFile } from 'fs/promises';
import { MalformedContainerError } from '@core/errors';
import { createLogger } from '@core/logger';
import { recordingEntrySchema } from '@core/schemas';
import type {
  ChunkInfo,
  DecodedRecording,
  RecorderMetadata,
  RecordingEntry,
  WavHeader,
} from '@core/types';
import { readChunks, viewOf } from './chunks';
import { WAVE_FORMAT_EXTENSIBLE, readSample, resolveEncoding } from './format';
import { parseRecorderMetadata } from './metadata';

const logger = createLogger('wav');

const FMT_MIN_SIZE = 16;
const FMT_EXTENSIBLE_SIZE = 40;
const SUBFORMAT_OFFSET = 24;

/** Standard chunks that may follow the sample data; never the descriptive block */
const STANDARD_CHUNK_IDS: ReadonlySet<string> = new Set([
  'LIST',
  'id3 ',
  'ID3 ',
  'JUNK',
  'PAD ',
  'fact',
  'bext',
  'cue ',
  'smpl',
  'inst',
  'iXML',
  'cart',
]);

export interface DecodeOptions {
  /** Log the parsed header fields and metadata */
  verbose?: boolean;
  /** First frame to decode; negative counts from the end (default: 0) */
  start?: number;
  /** Frame to stop before; negative counts from the end (default: all) */
  stop?: number;
}

export interface ContainerSummary {
  header: WavHeader;
  metadata: RecorderMetadata | null;
}

// ===== Header =====

function findChunk(chunks: ChunkInfo[], id: string): ChunkInfo {
  const chunk = chunks.find((c) => c.id === id);
  if (!chunk) {
    throw new MalformedContainerError(`Container has no '${id}' chunk`);
  }
  return chunk;
}

function parseContainer(bytes: Uint8Array): { header: WavHeader; data: ChunkInfo; metadata: RecorderMetadata | null } {
  const layout = readChunks(bytes);
  const view = viewOf(bytes);

  const fmt = findChunk(layout.chunks, 'fmt ');
  if (fmt.size < FMT_MIN_SIZE) {
    throw new MalformedContainerError(`'fmt ' chunk is ${fmt.size} bytes, need ${FMT_MIN_SIZE}`, fmt.offset);
  }

  const audioFormat = view.getUint16(fmt.offset, true);
  const numChannels = view.getUint16(fmt.offset + 2, true);
  const sampleRate = view.getUint32(fmt.offset + 4, true);
  const byteRate = view.getUint32(fmt.offset + 8, true);
  const blockAlign = view.getUint16(fmt.offset + 12, true);
  const bitsPerSample = view.getUint16(fmt.offset + 14, true);

  let subFormat: number | undefined;
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE) {
    if (fmt.size < FMT_EXTENSIBLE_SIZE) {
      throw new MalformedContainerError('Extensible format header is too short', fmt.offset);
    }
    subFormat = view.getUint16(fmt.offset + SUBFORMAT_OFFSET, true);
  }
  const encoding = resolveEncoding(audioFormat, bitsPerSample, subFormat);

  if (numChannels === 0) {
    throw new MalformedContainerError('Container declares zero channels', fmt.offset);
  }
  if (blockAlign !== numChannels * (bitsPerSample / 8)) {
    throw new MalformedContainerError(
      `Block align ${blockAlign} does not match ${numChannels} channel(s) of ${bitsPerSample}-bit samples`,
      fmt.offset
    );
  }

  const data = findChunk(layout.chunks, 'data');
  if (data.size % blockAlign !== 0) {
    throw new MalformedContainerError(
      `Data size ${data.size} is not a whole number of ${blockAlign}-byte frames`,
      data.offset
    );
  }

  // The descriptive block is the first non-standard chunk after the sample data
  const trailer = layout.chunks.find((c) => c.offset > data.offset && !STANDARD_CHUNK_IDS.has(c.id));
  const metadata = trailer
    ? parseRecorderMetadata(bytes.subarray(trailer.offset, trailer.offset + trailer.size), numChannels)
    : null;

  const header: WavHeader = {
    chunkId: layout.chunkId,
    chunkSize: layout.chunkSize,
    format: layout.format,
    audioFormat,
    encoding,
    numChannels,
    sampleRate,
    byteRate,
    blockAlign,
    bitsPerSample,
    dataSize: data.size,
    numFrames: data.size / blockAlign,
    chunks: layout.chunks,
  };

  return { header, data, metadata };
}

function logSummary(source: string, header: WavHeader, metadata: RecorderMetadata | null): void {
  logger.info(`Header info for ${source}`);
  for (const [key, value] of Object.entries(header)) {
    if (key === 'chunks') continue;
    logger.info(`${key} : ${String(value)}`);
  }
  logger.info(`chunks : ${header.chunks.map((c) => `${c.id.trim()}(${c.size})`).join(', ')}`);
  if (!metadata) {
    logger.info('File does not contain a descriptive block.');
    return;
  }
  for (const [key, value] of Object.entries(metadata)) {
    logger.info(`${key} : ${Array.isArray(value) ? value.join(', ') : String(value)}`);
  }
}

// ===== Frame Range =====

/**
 * Resolve a start/stop pair against `length` the way array slicing does.
 */
export function resolveFrameRange(length: number, start = 0, stop?: number): [number, number] {
  const clamp = (index: number) =>
    index < 0 ? Math.max(0, length + index) : Math.min(index, length);
  const from = clamp(start);
  const to = stop === undefined ? length : clamp(stop);
  return [from, Math.max(from, to)];
}

// ===== Public API =====

async function loadBytes(source: string | Uint8Array): Promise<Uint8Array> {
  return typeof source === 'string' ? readFile(source) : source;
}

function describeSource(source: string | Uint8Array): string {
  return typeof source === 'string' ? source : `<${source.length} bytes>`;
}

/**
 * Decode container bytes.
 */
export function decodeWav(bytes: Uint8Array, options: DecodeOptions = {}): Omit<DecodedRecording, 'settings'> {
  const { header, data, metadata } = parseContainer(bytes);
  const view = viewOf(bytes);
  const { numChannels, blockAlign, bitsPerSample, encoding } = header;
  const bytesPerSample = bitsPerSample / 8;
  const [from, to] = resolveFrameRange(header.numFrames, options.start, options.stop);
  const frames = to - from;

  const samples: Float64Array[] = [];
  for (let ch = 0; ch < numChannels; ch++) {
    samples.push(new Float64Array(frames));
  }

  for (let frame = 0; frame < frames; frame++) {
    const frameOffset = data.offset + (from + frame) * blockAlign;
    for (let ch = 0; ch < numChannels; ch++) {
      samples[ch][frame] = readSample(view, frameOffset + ch * bytesPerSample, encoding, bitsPerSample);
    }
  }

  // The scale factor already incorporates the sensitivity
  if (metadata) {
    for (let ch = 0; ch < numChannels; ch++) {
      const scale = metadata.scales[ch];
      const channel = samples[ch];
      for (let i = 0; i < channel.length; i++) {
        channel[i] *= scale;
      }
    }
  }

  return { samples, header, metadata };
}

/**
 * Read the catalog entry saved beside a downloaded container, if any.
 */
export async function readSettingsSidecar(wavPath: string): Promise<RecordingEntry | null> {
  const jsonPath = wavPath.replace(/\.wav$/i, '') + '.json';
  let text: string;
  try {
    text = await readFile(jsonPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedContainerError(
      `Settings file ${jsonPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const parsed = recordingEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedContainerError(`Settings file ${jsonPath} does not describe a recording`);
  }
  return parsed.data;
}

/**
 * Open a recorder container from a file path or bytes.
 *
 * Samples are scaled by the per-channel factor in the descriptive block.
 * For file paths, the `.json` settings saved on download are returned too.
 */
export async function openWav(
  source: string | Uint8Array,
  options: DecodeOptions = {}
): Promise<DecodedRecording> {
  const bytes = await loadBytes(source);
  const decoded = decodeWav(bytes, options);
  const settings = typeof source === 'string' ? await readSettingsSidecar(source) : null;

  if (options.verbose) {
    const label = describeSource(source);
    logSummary(label, decoded.header, decoded.metadata);
    logger.info(
      `${label} contains ${decoded.samples.length} channels, ` +
        `extracting ${decoded.samples[0].length} samples per channel.`
    );
    logger.info(settings ? `settings : ${JSON.stringify(settings.setup)}` : 'settings : none');
  }

  return { ...decoded, settings };
}

/**
 * Read the header and descriptive block without decoding samples.
 */
export async function readWavHeader(
  source: string | Uint8Array,
  options: Pick<DecodeOptions, 'verbose'> = {}
): Promise<ContainerSummary> {
  const bytes = await loadBytes(source);
  const { header, metadata } = parseContainer(bytes);
  if (options.verbose) {
    logSummary(describeSource(source), header, metadata);
  }
  return { header, metadata };
}
