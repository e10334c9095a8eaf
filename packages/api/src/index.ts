/**
 * DAQLINK API Package
 *
 * Session controller for the networked recorder.
 *
 * Usage:
 *   import { Instrument, loadConfig, instrumentOptionsFrom } from '@daqlink/api';
 *
 *   const config = loadConfig();
 *   const instrument = await Instrument.connect(config.address, instrumentOptionsFrom(config));
 *
 *   // Three most recent recordings
 *   const latest = await instrument.listRecordings(-3);
 */

export { Instrument, DELETE_ALL_CONFIRMATION, type InstrumentOptions } from './instrument';
export { DeviceHttp, type DeviceHttpConfig, type TextResponse } from './http';
export {
  SAMPLE_RATE_BANDWIDTHS,
  SUPPORTED_SAMPLE_RATES,
  DEFAULT_FILTERS,
  DEFAULT_RANGES,
  sampleRateToBandwidth,
  bandwidthToSampleRate,
  formatSetup,
} from './setup';
export {
  recordingIdFromUri,
  sliceRecordings,
  recordingFileStem,
  formatRecordingLine,
} from './catalog';
export {
  loadConfig,
  loadEnvFiles,
  parseConfig,
  instrumentOptionsFrom,
  type DaqConfig,
} from './config';
