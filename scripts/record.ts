#!/usr/bin/env npx tsx
/**
 * Acquisition Script
 *
 * Connects to the recorder named by DAQ_ADDRESS, records one channel for a
 * fixed time, downloads the recording and prints a summary of it.
 *
 * Usage:
 *   npx tsx scripts/record.ts [seconds] [--rate 8192] [--channel 1] [--name "Input test"] [--list] [--verbose]
 *
 * Settings are read from .env.local / .env (see DAQ_* variables).
 */

import { Instrument } from '@api/instrument';
import { instrumentOptionsFrom, loadConfig } from '@api/config';
import { formatRecordingLine } from '@api/catalog';
import { createLogger, setDebug } from '@core/logger';
import { openWav } from '@wav/decoder';

const logger = createLogger('record');

interface RecordOptions {
  seconds: number;
  rate: number;
  channel: number;
  name: string;
  list: boolean;
  verbose: boolean;
}

function option(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

function parseArgs(args: string[]): RecordOptions {
  const flagged = new Set(['--rate', '--channel', '--name']);
  const positional = args.filter((a, i) => !a.startsWith('-') && !flagged.has(args[i - 1]));
  return {
    seconds: Number(positional[0] ?? 10),
    rate: Number(option(args, '--rate') ?? 8192),
    channel: Number(option(args, '--channel') ?? 1),
    name: option(args, '--name') ?? 'Input test',
    list: args.includes('--list'),
    verbose: args.includes('--verbose') || args.includes('-v'),
  };
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setDebug(config.debug);

  const instrument = await Instrument.connect(config.address, instrumentOptionsFrom(config));

  if (options.list) {
    const recordings = await instrument.listRecordings();
    recordings.forEach((entry, i) => console.log(formatRecordingLine(entry, i + 1)));
    return;
  }

  instrument.disableAll();
  instrument.setSampleRate(options.rate);
  instrument.setName(options.name);
  instrument.setChannel(options.channel, { name: 'Input signal', filter: '7.0 Hz', range: '10 Vpeak' });
  console.log(instrument.describe());

  await instrument.powerUp();
  const id = await instrument.record(options.seconds);
  await instrument.powerDown();

  const path = await instrument.getWav(config.downloadDir, id);
  const { samples, header, metadata } = await openWav(path, { verbose: options.verbose });

  logger.info(`${path}: ${samples.length} channel(s), ${header.numFrames} frames at ${header.sampleRate} Hz`);
  if (metadata) {
    logger.info(`label '${metadata.label}', channels ${metadata.channelNames.join(', ')}`);
  }
}

main().catch((e: unknown) => {
  logger.error('Acquisition failed', e);
  process.exit(1);
});
