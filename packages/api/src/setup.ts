/**
 * Recorder Setup Snapshots
 *
 * Pure functions that derive a new, frozen RecorderSetup from the previous
 * one. The instrument swaps its snapshot on every configuration call;
 * nothing is edited in place.
 */

import { InvalidParameterError } from '@core/errors';
import type { ChannelOptions, ChannelSetup, RecorderSetup } from '@core/types';

// ===== Sample Rates =====

/** Sample rate (Hz) to the bandwidth string the firmware expects */
export const SAMPLE_RATE_BANDWIDTHS: ReadonlyMap<number, string> = new Map([
  [131072, '51.2 kHz'],
  [65536, '25.6 kHz'],
  [32768, '12.8 kHz'],
  [16384, '6.4 kHz'],
  [8192, '3.2 kHz'],
  [4096, '1.6 kHz'],
]);

export const SUPPORTED_SAMPLE_RATES: readonly number[] = [...SAMPLE_RATE_BANDWIDTHS.keys()].sort(
  (a, b) => a - b
);

/** Filters and ranges accepted when the device does not list its own */
export const DEFAULT_FILTERS: readonly string[] = [
  'DC',
  '0.1 Hz 10%',
  '0.7 Hz',
  '1.0 Hz 10%',
  '7.0 Hz',
  '22.4 Hz',
  'Intensity',
];
export const DEFAULT_RANGES: readonly string[] = ['10 Vpeak', '31.6 Vpeak'];

/** Characters the recorder accepts in labels */
const LABEL_PATTERN = /^[a-zA-Z0-9\-_ .]*$/;

export function sampleRateToBandwidth(rate: number): string {
  const bandwidth = SAMPLE_RATE_BANDWIDTHS.get(rate);
  if (bandwidth === undefined) {
    throw new InvalidParameterError(
      `Sample rate must be one of ${SUPPORTED_SAMPLE_RATES.join(', ')}`,
      'sampleRate',
      rate
    );
  }
  return bandwidth;
}

export function bandwidthToSampleRate(bandwidth: string): number | undefined {
  for (const [rate, bw] of SAMPLE_RATE_BANDWIDTHS) {
    if (bw === bandwidth) return rate;
  }
  return undefined;
}

// ===== Validation =====

/**
 * Reject labels with characters the recorder may corrupt.
 */
export function checkLabel(parameter: string, value: string): string {
  if (!LABEL_PATTERN.test(value)) {
    throw new InvalidParameterError(
      `${parameter} can only contain a-z, A-Z, 0-9, '-', '_', ' ' and '.'`,
      parameter,
      value
    );
  }
  return value;
}

export function checkChannel(channel: number, channelCount: number): number {
  if (!Number.isInteger(channel) || channel < 1 || channel > channelCount) {
    throw new InvalidParameterError(
      `Channel must be an integer in the range 1..${channelCount}`,
      'channel',
      channel
    );
  }
  return channel - 1;
}

function checkOneOf(parameter: string, value: string, allowed: readonly string[]): string {
  if (!allowed.includes(value)) {
    throw new InvalidParameterError(
      `${parameter} must be one of ${allowed.map((v) => `'${v}'`).join(', ')}`,
      parameter,
      value
    );
  }
  return value;
}

// ===== Snapshots =====

/**
 * Deep-freeze a setup so the snapshot cannot be edited after the fact.
 */
export function freezeSetup<T extends RecorderSetup>(setup: T): Readonly<T> {
  for (const channel of setup.channels) {
    Object.freeze(channel.transducer.type);
    Object.freeze(channel.transducer);
    Object.freeze(channel);
  }
  Object.freeze(setup.channels);
  return Object.freeze(setup);
}

function replaceChannel(setup: RecorderSetup, index: number, channel: ChannelSetup): RecorderSetup {
  return freezeSetup({
    ...setup,
    channels: setup.channels.map((current, i) => (i === index ? channel : current)),
  });
}

export function withName(setup: RecorderSetup, name: string, maxLength: number): RecorderSetup {
  return freezeSetup({ ...setup, name: name.slice(0, maxLength) });
}

export function withSampleRate(setup: RecorderSetup, rate: number): RecorderSetup {
  const bandwidth = sampleRateToBandwidth(rate);
  return freezeSetup({
    ...setup,
    channels: setup.channels.map((channel) => ({ ...channel, bandwidth })),
  });
}

export function withAllDisabled(setup: RecorderSetup): RecorderSetup {
  return freezeSetup({
    ...setup,
    channels: setup.channels.map((channel) => ({ ...channel, enabled: false })),
  });
}

export function withChannelEnabled(setup: RecorderSetup, channel: number, enabled: boolean): RecorderSetup {
  const index = checkChannel(channel, setup.channels.length);
  return replaceChannel(setup, index, { ...setup.channels[index], enabled });
}

export interface ChannelLimits {
  filters: readonly string[];
  ranges: readonly string[];
}

/**
 * Rebuild one channel from the device default plus `options`.
 * Nothing from the channel's previous configuration survives except the
 * device-wide bandwidth.
 */
export function withChannel(
  setup: RecorderSetup,
  defaults: RecorderSetup,
  channel: number,
  options: ChannelOptions,
  limits: ChannelLimits
): RecorderSetup {
  const index = checkChannel(channel, setup.channels.length);
  const base = defaults.channels[index];

  const name = checkLabel('name', options.name ?? `Channel ${channel}`);
  const filter = checkOneOf('filter', options.filter ?? base.filter, limits.filters);
  const range = checkOneOf('range', options.range ?? base.range, limits.ranges);
  const sensitivity = options.sensitivity ?? base.transducer.sensitivity;
  if (!Number.isFinite(sensitivity) || sensitivity <= 0) {
    throw new InvalidParameterError('Sensitivity must be a positive number', 'sensitivity', sensitivity);
  }
  const unit = checkLabel('unit', options.unit ?? base.transducer.unit);
  const serialNumber = checkLabel('serialNumber', options.serialNumber ?? base.transducer.serialNumber);
  const transducerType = checkLabel('transducerType', options.transducerType ?? base.transducer.type.number);

  return replaceChannel(setup, index, {
    ...base,
    enabled: true,
    name,
    bandwidth: setup.channels[index].bandwidth,
    filter,
    range,
    ccld: options.powered ?? base.ccld,
    transducer: {
      ...base.transducer,
      sensitivity,
      unit,
      serialNumber,
      type: { ...base.transducer.type, number: transducerType },
    },
  });
}

/**
 * Sample rate the setup will record at, read from the first enabled
 * channel (or the first channel when none is enabled).
 */
export function configuredSampleRate(setup: RecorderSetup): number | undefined {
  const channel = setup.channels.find((c) => c.enabled) ?? setup.channels[0];
  return channel ? bandwidthToSampleRate(channel.bandwidth) : undefined;
}

// ===== Display =====

/**
 * Human-readable summary of the enabled channels.
 */
export function formatSetup(setup: RecorderSetup): string {
  let out = `\t${setup.name}\n`;
  setup.channels.forEach((channel, idx) => {
    if (!channel.enabled) return;
    const rate = bandwidthToSampleRate(channel.bandwidth) ?? channel.bandwidth;
    const powered = channel.ccld ? ', Powered.' : '.';
    out +=
      `\tChannel ${idx + 1} : ${channel.name}\n` +
      `\t\t${rate} SPS, ${channel.filter} filter, ${channel.range}, ` +
      `${channel.transducer.sensitivity}V/${channel.transducer.unit}${powered}\n`;
  });
  return out;
}
