/**
 * DAQLINK Container Package
 *
 * Decoder and encoder for the recorder's WAV container.
 *
 * Usage:
 *   import { openWav } from '@daqlink/wav';
 *
 *   const { samples, header, metadata, settings } = await openWav(path, { verbose: true });
 */

export {
  openWav,
  readWavHeader,
  decodeWav,
  readSettingsSidecar,
  resolveFrameRange,
  type DecodeOptions,
  type ContainerSummary,
} from './decoder';
export { encodeWav, METADATA_CHUNK_ID, type EncodeOptions } from './encoder';
export { parseRecorderMetadata, serializeRecorderMetadata, UTC_NOTE } from './metadata';
export { readChunks } from './chunks';
export {
  WAVE_FORMAT_PCM,
  WAVE_FORMAT_IEEE_FLOAT,
  WAVE_FORMAT_EXTENSIBLE,
} from './format';
