/**
 * RIFF Chunk Walker
 *
 * Layout:
 *   [ "RIFF" ][ size:4 ][ "WAVE" ]
 *   [ id:4 ][ size:4 ][ payload:size ][ pad:size & 1 ] ...
 *
 * All sizes are little-endian u32. A chunk whose declared size runs past
 * the end of the buffer makes the whole container malformed.
 *
 * @module wav/chunks
 */

import { MalformedContainerError } from '@core/errors';
import type { ChunkInfo } from '@core/types';

export const RIFF_HEADER_SIZE = 12;
export const CHUNK_HEADER_SIZE = 8;

export interface RiffLayout {
  chunkId: string;
  chunkSize: number;
  format: string;
  chunks: ChunkInfo[];
}

/** Read a four-character code */
export function readFourCC(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(
    bytes[offset],
    bytes[offset + 1],
    bytes[offset + 2],
    bytes[offset + 3]
  );
}

/** Write a four-character code */
export function writeFourCC(bytes: Uint8Array, offset: number, code: string): void {
  for (let i = 0; i < 4; i++) {
    bytes[offset + i] = code.charCodeAt(i) & 0xff;
  }
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Validate the container signature and list its chunks in file order.
 */
export function readChunks(bytes: Uint8Array): RiffLayout {
  if (bytes.length < RIFF_HEADER_SIZE) {
    throw new MalformedContainerError(
      `Container too short: ${bytes.length} bytes, need at least ${RIFF_HEADER_SIZE}`
    );
  }

  const view = viewOf(bytes);
  const chunkId = readFourCC(bytes, 0);
  const format = readFourCC(bytes, 8);
  if (chunkId !== 'RIFF' || format !== 'WAVE') {
    throw new MalformedContainerError(
      `Not a RIFF/WAVE container (signature '${chunkId}', format '${format}')`,
      0
    );
  }

  const chunks: ChunkInfo[] = [];
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= bytes.length) {
    const id = readFourCC(bytes, offset);
    const size = view.getUint32(offset + 4, true);
    const payload = offset + CHUNK_HEADER_SIZE;
    const available = bytes.length - payload;

    if (size > available) {
      throw new MalformedContainerError(
        `Chunk '${id}' declares ${size} bytes but only ${available} remain`,
        offset
      );
    }

    chunks.push({ id, offset: payload, size });
    offset = payload + size + (size & 1);
  }

  return {
    chunkId,
    chunkSize: view.getUint32(4, true),
    format,
    chunks,
  };
}
