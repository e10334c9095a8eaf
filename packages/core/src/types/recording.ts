/**
 * Recording Types
 *
 * Catalog entries for recordings stored on the device.
 *
 * @module core/types/recording
 */

import type { RecorderSetup } from './instrument';

/** Setup stored with a recording, stamped with its start time */
export interface RecordingSetup extends RecorderSetup {
  /** Recording start (epoch milliseconds) */
  datetime: number;
}

/**
 * One recording as listed by `rest/rec/measurements`.
 */
export interface RecordingEntry {
  /** Device path of the recording, e.g. "/rest/rec/measurements/1000000001" */
  uri: string;
  /** Container size (bytes) */
  size: number;
  /** Recording duration (milliseconds) */
  duration: number;
  setup: RecordingSetup;
}
