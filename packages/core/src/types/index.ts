/**
 * Core Types for DAQLINK
 *
 * Re-exports all types from submodules for convenient importing:
 *
 *   import { RecorderSetup, RecordingEntry, WavHeader } from '@core/types';
 *
 * Type Modules:
 * - instrument: ModuleInfo, ModuleStatus, ChannelSetup, RecorderSetup
 * - recording: RecordingEntry, RecordingSetup
 * - container: WavHeader, RecorderMetadata, DecodedRecording
 *
 * @module core/types
 */

// Recorder module and channel configuration
export * from './instrument';

// Recording catalog
export * from './recording';

// Decoded container
export * from './container';
