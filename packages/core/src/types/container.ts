/**
 * Container Types
 *
 * Types for the decoded recording container: the RIFF header fields,
 * the recorder's descriptive block and per-channel sample data.
 *
 * @module core/types/container
 */

import type { RecordingEntry } from './recording';

// ===== Chunks =====

/**
 * A chunk found while walking the RIFF container.
 */
export interface ChunkInfo {
  /** Four-character chunk id */
  id: string;
  /** Offset of the chunk payload (after the 8-byte chunk header) */
  offset: number;
  /** Declared payload size (bytes) */
  size: number;
}

// ===== Header =====

/** Sample encodings the decoder understands */
export type SampleEncoding = 'pcm' | 'float';

/**
 * Standard header fields of the container.
 */
export interface WavHeader {
  /** "RIFF" */
  chunkId: string;
  chunkSize: number;
  /** "WAVE" */
  format: string;
  /** Format tag from the `fmt ` chunk (1 = PCM, 3 = IEEE float, 0xFFFE = extensible) */
  audioFormat: number;
  /** Encoding after resolving extensible sub-formats */
  encoding: SampleEncoding;
  numChannels: number;
  sampleRate: number;
  byteRate: number;
  blockAlign: number;
  bitsPerSample: number;
  /** Size of the `data` chunk (bytes) */
  dataSize: number;
  /** Frames (samples per channel) in the `data` chunk */
  numFrames: number;
  chunks: ChunkInfo[];
}

// ===== Recorder Metadata =====

/**
 * Descriptive block the recorder appends after the sample data.
 */
export interface RecorderMetadata {
  /** Block version, e.g. "2.10" */
  version: string;
  /** Recording date as written by the device */
  date: string;
  /** Transducer description per channel */
  transducers: string[];
  /** Transducer sensitivity per channel */
  sensitivities: number[];
  /** Scale factor per channel (already includes the sensitivity) */
  scales: number[];
  unitName: string;
  /** Recording name set before the recording started */
  label: string;
  channelNames: string[];
  channelUnits: string[];
}

// ===== Decoded Recording =====

export interface DecodedRecording {
  /** One array per channel, all of equal length */
  samples: Float64Array[];
  header: WavHeader;
  /** `null` when the container carries no descriptive block */
  metadata: RecorderMetadata | null;
  /** Catalog entry saved beside the file on download, if any */
  settings: RecordingEntry | null;
}
