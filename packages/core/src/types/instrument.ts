/**
 * Instrument Types
 *
 * Types for the recorder module, its channel configuration and its
 * reported state, as exchanged with the HTTP control interface.
 *
 * @module core/types/instrument
 */

// ===== Module State =====

/** Module states reported by `rest/rec/onchange` */
export type KnownModuleState =
  | 'Idle'
  | 'RecorderOpened'
  | 'RecorderConfiguring'
  | 'RecorderStreaming'
  | 'RecorderRecording';

/** Firmware may report states beyond the known ones */
export type ModuleState = KnownModuleState | (string & {});

/**
 * Result of a status query.
 */
export interface ModuleStatus {
  /** Current module state */
  moduleState: ModuleState;
  /** Count of changes seen by the device */
  lastUpdateTag: number;
  /** Device clock as reported in the `Date` response header */
  deviceClock: string | null;
}

// ===== Module Info =====

/**
 * Capabilities reported by `rest/rec/module/info`.
 */
export interface ModuleInfo {
  numberOfInputChannels: number;
  sdCardInserted?: boolean;
  supportedFilters?: string[];
  supportedSampleRates?: Array<number | string>;
  supportedRanges?: string[];
}

// ===== Channel Setup =====

export interface TransducerType {
  number: string;
}

export interface TransducerSetup {
  sensitivity: number;
  unit: string;
  serialNumber: string;
  type: TransducerType;
}

/**
 * Configuration of one input channel.
 *
 * `bandwidth` carries the sample rate (e.g. "3.2 kHz" for 8192 Hz) and
 * `ccld` is the transducer power flag.
 */
export interface ChannelSetup {
  enabled: boolean;
  name: string;
  bandwidth: string;
  filter: string;
  range: string;
  ccld: boolean;
  transducer: TransducerSetup;
}

/**
 * Settings for the next recording, as sent to `rest/rec/channels/input`.
 */
export interface RecorderSetup {
  /** Label for the next recording */
  name: string;
  channels: ChannelSetup[];
}

/**
 * Caller-facing channel options for `Instrument.setChannel()`.
 * Omitted fields take the device default.
 */
export interface ChannelOptions {
  name?: string;
  filter?: string;
  range?: string;
  sensitivity?: number;
  unit?: string;
  powered?: boolean;
  serialNumber?: string;
  transducerType?: string;
}
