/**
 * Recorder Descriptive Block
 *
 * The recorder appends a chunk after the sample data holding
 * NUL-separated text fields (empty fields are padding and ignored):
 *
 *   version
 *   date
 *   per channel: transducer, sensitivity, 5 reserved, scale, 3 reserved
 *   unit name
 *   "<key>: <label>. Recording date/time is in UTC."
 *   reserved
 *   setup text, one "[Channel n]" section per channel with Name= and Unit=
 *
 * @module wav/metadata
 */

import { InvalidParameterError, MalformedContainerError } from '@core/errors';
import type { RecorderMetadata } from '@core/types';

export const UTC_NOTE = '. Recording date/time is in UTC.';
export const LABEL_KEY = 'Label';

const RESERVED_AFTER_SENSITIVITY = 5;
const RESERVED_AFTER_SCALE = 3;
const FIELDS_PER_CHANNEL = 2 + RESERVED_AFTER_SENSITIVITY + 1 + RESERVED_AFTER_SCALE;
/** Placeholder written into reserved fields; never read back */
const RESERVED_FIELD = '0';

const textDecoder = new TextDecoder('utf-8');
const textEncoder = new TextEncoder();

/** Number of non-empty fields a block for `numChannels` channels holds */
export function expectedFieldCount(numChannels: number): number {
  return 2 + FIELDS_PER_CHANNEL * numChannels + 4;
}

function parseNumber(field: string, what: string): number {
  const value = Number(field.trim());
  if (field.trim() === '' || Number.isNaN(value)) {
    throw new MalformedContainerError(`Descriptive block: ${what} '${field}' is not a number`);
  }
  return value;
}

function parseLabel(field: string): string {
  const colon = field.indexOf(':');
  if (colon === -1) {
    throw new MalformedContainerError(`Descriptive block: label field '${field}' has no key`);
  }
  let label = field.slice(colon + 1);
  if (label.startsWith(' ')) {
    label = label.slice(1);
  }
  if (label.endsWith(UTC_NOTE)) {
    label = label.slice(0, -UTC_NOTE.length);
  }
  return label;
}

/**
 * Split INI-like setup text into sections of key/value pairs.
 */
export function parseSetupSections(text: string): Map<string, Map<string, string>> {
  const sections = new Map<string, Map<string, string>>();
  let current: Map<string, string> | null = null;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      current = new Map();
      sections.set(trimmed.slice(1, -1), current);
      continue;
    }
    const eq = line.indexOf('=');
    if (current && eq > 0) {
      current.set(line.slice(0, eq), line.slice(eq + 1));
    }
  }
  return sections;
}

/**
 * Decode the descriptive block payload.
 */
export function parseRecorderMetadata(payload: Uint8Array, numChannels: number): RecorderMetadata {
  const fields = textDecoder
    .decode(payload)
    .split('\0')
    .filter((field) => field.length > 0);

  const needed = expectedFieldCount(numChannels);
  if (fields.length < needed) {
    throw new MalformedContainerError(
      `Descriptive block holds ${fields.length} fields, expected ${needed} for ${numChannels} channel(s)`
    );
  }

  let index = 0;
  const version = fields[index++];
  const date = fields[index++];

  const transducers: string[] = [];
  const sensitivities: number[] = [];
  const scales: number[] = [];
  for (let ch = 0; ch < numChannels; ch++) {
    transducers.push(fields[index]);
    sensitivities.push(parseNumber(fields[index + 1], `channel ${ch + 1} sensitivity`));
    scales.push(parseNumber(fields[index + 2 + RESERVED_AFTER_SENSITIVITY], `channel ${ch + 1} scale`));
    index += FIELDS_PER_CHANNEL;
  }

  const unitName = fields[index++];
  const label = parseLabel(fields[index++]);
  index++; // reserved
  const sections = parseSetupSections(fields[index]);

  const channelNames: string[] = [];
  const channelUnits: string[] = [];
  for (let ch = 1; ch <= numChannels; ch++) {
    const section = sections.get(`Channel ${ch}`);
    const name = section?.get('Name');
    const unit = section?.get('Unit');
    if (name === undefined || unit === undefined) {
      throw new MalformedContainerError(
        `Descriptive block: setup has no Name/Unit for channel ${ch}`
      );
    }
    channelNames.push(name);
    channelUnits.push(unit);
  }

  return {
    version,
    date,
    transducers,
    sensitivities,
    scales,
    unitName,
    label,
    channelNames,
    channelUnits,
  };
}

// ===== Serialization =====

function requireField(value: string, parameter: string): string {
  if (value.length === 0 || value.includes('\0')) {
    throw new InvalidParameterError(
      `${parameter} must be non-empty and free of NUL characters`,
      parameter,
      value
    );
  }
  return value;
}

function requireLine(value: string, parameter: string): string {
  if (/[\0\r\n[\]]/.test(value)) {
    throw new InvalidParameterError(
      `${parameter} must not contain line breaks, brackets or NUL characters`,
      parameter,
      value
    );
  }
  return value;
}

/**
 * Encode a descriptive block payload that `parseRecorderMetadata` reads back.
 */
export function serializeRecorderMetadata(meta: RecorderMetadata): Uint8Array {
  const numChannels = meta.channelNames.length;
  const perChannel = [meta.transducers, meta.sensitivities, meta.scales, meta.channelUnits];
  if (perChannel.some((values) => values.length !== numChannels)) {
    throw new InvalidParameterError(
      'Metadata per-channel arrays must all have one entry per channel',
      'metadata'
    );
  }

  const fields: string[] = [requireField(meta.version, 'version'), requireField(meta.date, 'date')];

  for (let ch = 0; ch < numChannels; ch++) {
    fields.push(requireField(meta.transducers[ch], `transducers[${ch}]`));
    fields.push(String(meta.sensitivities[ch]));
    for (let i = 0; i < RESERVED_AFTER_SENSITIVITY; i++) fields.push(RESERVED_FIELD);
    fields.push(String(meta.scales[ch]));
    for (let i = 0; i < RESERVED_AFTER_SCALE; i++) fields.push(RESERVED_FIELD);
  }

  fields.push(requireField(meta.unitName, 'unitName'));
  if (meta.label.includes('\0')) {
    throw new InvalidParameterError('label must be free of NUL characters', 'label', meta.label);
  }
  fields.push(`${LABEL_KEY}: ${meta.label}${UTC_NOTE}`);
  fields.push(RESERVED_FIELD);

  const setup = meta.channelNames
    .map(
      (name, ch) =>
        `[Channel ${ch + 1}]\nUnit=${requireLine(meta.channelUnits[ch], `channelUnits[${ch}]`)}\n` +
        `Name=${requireLine(name, `channelNames[${ch}]`)}\n`
    )
    .join('');
  fields.push(setup);

  return textEncoder.encode(fields.join('\0') + '\0');
}
