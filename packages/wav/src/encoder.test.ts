import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '@core/errors';
import type { RecorderMetadata } from '@core/types';
import { readChunks } from './chunks';
import { decodeWav } from './decoder';
import { METADATA_CHUNK_ID, encodeWav } from './encoder';
import { WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from './format';

const metadata: RecorderMetadata = {
  version: '2.10',
  date: '2024-01-15T12:00:00.000Z',
  transducers: ['None', 'None'],
  sensitivities: [1, 0.5],
  scales: [2, 4],
  unitName: 'V',
  label: 'Encoder test',
  channelNames: ['Left', 'Right'],
  channelUnits: ['V', 'Pa'],
};

describe('encodeWav', () => {
  it('lays out fmt, data and the descriptive block', () => {
    const bytes = encodeWav({
      sampleRate: 8192,
      samples: [[0, 1], [0, -2]],
      metadata,
    });
    const layout = readChunks(bytes);

    expect(layout.chunks.map((c) => c.id)).toEqual(['fmt ', 'data', METADATA_CHUNK_ID]);
    expect(layout.chunkSize).toBe(bytes.length - 8);
    expect(layout.chunks[1].size).toBe(12);
  });

  it('round-trips scaled 16-bit samples', () => {
    const bytes = encodeWav({
      sampleRate: 4096,
      samples: [[0, 0.5, -1, 1.5], [0, -2, 2, 0.25]],
      bitsPerSample: 16,
      metadata,
    });
    const { samples, header, metadata: decoded } = decodeWav(bytes);

    expect(header).toMatchObject({ audioFormat: WAVE_FORMAT_PCM, bitsPerSample: 16, numChannels: 2, numFrames: 4 });
    expect(Array.from(samples[0])).toEqual([0, 0.5, -1, 1.5]);
    expect(Array.from(samples[1])).toEqual([0, -2, 2, 0.25]);
    expect(decoded).toEqual(metadata);
  });

  it('writes float samples without quantizing', () => {
    const bytes = encodeWav({ sampleRate: 100, samples: [[0.1, -3.5]], encoding: 'float', bitsPerSample: 64 });
    const { samples, header, metadata: decoded } = decodeWav(bytes);

    expect(header.audioFormat).toBe(WAVE_FORMAT_IEEE_FLOAT);
    expect(Array.from(samples[0])).toEqual([0.1, -3.5]);
    expect(decoded).toBeNull();
  });

  it('clamps integer samples to full scale', () => {
    const bytes = encodeWav({ sampleRate: 100, samples: [[2, -2]], bitsPerSample: 8 });
    expect(Array.from(decodeWav(bytes).samples[0])).toEqual([127 / 128, -1]);
  });

  it('pads odd-sized chunks and places reserved space before the data', () => {
    const bytes = encodeWav({
      sampleRate: 100,
      samples: [[0.5, 0, -0.5]],
      bitsPerSample: 8,
      reserveBytes: 5,
      metadata: { ...metadata, transducers: ['None'], sensitivities: [1], scales: [1], channelNames: ['Only'], channelUnits: ['V'] },
    });
    const { samples, header, metadata: decoded } = decodeWav(bytes);

    expect(header.chunks.map((c) => [c.id, c.size])).toEqual([
      ['fmt ', 16],
      ['JUNK', 5],
      ['data', 3],
      [METADATA_CHUNK_ID, expect.any(Number)],
    ]);
    expect(Array.from(samples[0])).toEqual([0.5, 0, -0.5]);
    expect(decoded?.channelNames).toEqual(['Only']);
  });

  it('rejects inconsistent input', () => {
    expect(() => encodeWav({ sampleRate: 0, samples: [[0]] })).toThrow(InvalidParameterError);
    expect(() => encodeWav({ sampleRate: 100, samples: [] })).toThrow(InvalidParameterError);
    expect(() => encodeWav({ sampleRate: 100, samples: [[0], [0, 1]] })).toThrow(InvalidParameterError);
    expect(() => encodeWav({ sampleRate: 100, samples: [[0]], bitsPerSample: 12 })).toThrow(InvalidParameterError);
    expect(() =>
      encodeWav({ sampleRate: 100, samples: [[0], [0]], metadata: { ...metadata, sensitivities: [1, Number.NaN] } })
    ).toThrow('Sensitivities must be finite');
    expect(() => encodeWav({ sampleRate: 100, samples: [[0]], metadata })).toThrow(
      'Metadata describes 2 channel(s), samples have 1'
    );
  });
});
