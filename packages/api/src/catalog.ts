/**
 * Recording Catalog
 *
 * Helpers over the ordered list of recordings stored on the device.
 */

import type { RecordingEntry } from '@core/types';

/**
 * Recording id: the last path segment of the recording URI.
 */
export function recordingIdFromUri(uri: string): string {
  const segments = uri.trim().split('/').filter((segment) => segment.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

/**
 * Sort by creation time, oldest first, without touching the input.
 */
export function sortByCreation(recordings: readonly RecordingEntry[]): RecordingEntry[] {
  return [...recordings].sort((a, b) => a.setup.datetime - b.setup.datetime);
}

export function findRecording(
  recordings: readonly RecordingEntry[],
  recordingId: string
): RecordingEntry | undefined {
  return recordings.find((entry) => recordingIdFromUri(entry.uri) === recordingId);
}

/**
 * Slice an ordered sequence.
 *
 * `start` counts from the front, or from the back when negative (so
 * `start = -3` selects the three most recent); it is clamped to the list.
 * `count`, when given, caps the number of entries returned.
 */
export function sliceRecordings<T>(list: readonly T[], start = 0, count?: number): T[] {
  const length = list.length;
  let from = start < 0 ? length + start : start;
  from = Math.min(Math.max(from, 0), length);

  let to = length;
  if (count !== undefined) {
    to = Math.min(from + Math.max(count, 0), length);
  }

  const result: T[] = [];
  for (let i = from; i < to; i++) {
    result.push(list[i]);
  }
  return result;
}

/**
 * File name stem for a downloaded recording: the recording name with
 * spaces turned into underscores and path separators removed, followed by
 * its UTC start time as YYYYMMDDHHmmss.
 */
export function recordingFileStem(entry: RecordingEntry): string {
  const name = entry.setup.name.replace(/ /g, '_').replace(/[/\\]/g, '');
  const started = new Date(entry.setup.datetime);
  const pad = (value: number) => String(value).padStart(2, '0');
  const timestamp =
    `${started.getUTCFullYear()}${pad(started.getUTCMonth() + 1)}${pad(started.getUTCDate())}` +
    `${pad(started.getUTCHours())}${pad(started.getUTCMinutes())}${pad(started.getUTCSeconds())}`;
  return `${name}_${timestamp}`;
}

/**
 * One catalog line for a recording, listed as entry `number`.
 */
export function formatRecordingLine(entry: RecordingEntry, number: number): string {
  const started = new Date(entry.setup.datetime).toISOString().replace('T', ' ').slice(0, 19);
  return `${number} : ${started}, ${Math.floor(entry.size / 1024)} kB, ${entry.duration / 1000} seconds`;
}
