/**
 * Instrument Session Controller
 *
 * Drives a networked recorder through its HTTP control interface:
 * channel setup, power, recording, and retrieval of stored recordings.
 *
 * Usage:
 *   const instrument = await Instrument.connect('192.168.1.10');
 *
 *   instrument.disableAll();
 *   instrument.setSampleRate(8192);
 *   instrument.setName('Input test');
 *   instrument.setChannel(1, { name: 'Input signal', filter: '7.0 Hz', range: '10 Vpeak' });
 *
 *   await instrument.powerUp();
 *   const id = await instrument.record(10);
 *   await instrument.powerDown();
 *
 *   const path = await instrument.getWav('data', id);
 *
 * A session assumes exclusive access to the device. Calls are not
 * retried and must not overlap.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  DaqError,
  DeviceProtocolError,
  DeviceStateError,
  InvalidParameterError,
  NotFoundError,
} from '@core/errors';
import { createLogger } from '@core/logger';
import {
  moduleInfoSchema,
  moduleStatusSchema,
  recorderSetupSchema,
  recordingListSchema,
  transducerListSchema,
} from '@core/schemas';
import { sleep } from '@core/timing';
import type {
  ChannelOptions,
  KnownModuleState,
  ModuleInfo,
  ModuleState,
  ModuleStatus,
  RecorderSetup,
  RecordingEntry,
} from '@core/types';
import {
  findRecording,
  recordingFileStem,
  recordingIdFromUri,
  sliceRecordings,
  sortByCreation,
} from './catalog';
import { DeviceHttp } from './http';
import {
  DEFAULT_FILTERS,
  DEFAULT_RANGES,
  configuredSampleRate,
  formatSetup,
  freezeSetup,
  withAllDisabled,
  withChannel,
  withChannelEnabled,
  withName,
  withSampleRate,
} from './setup';

const logger = createLogger('instrument');

/** Confirmation string `deleteAll()` requires */
export const DELETE_ALL_CONFIRMATION = "I'm sure";

// ===== Configuration =====

export interface InstrumentOptions {
  /** Per-request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Timeout for recording downloads in ms (default: 120000) */
  downloadTimeoutMs?: number;
  /** Status poll interval while a recording finalizes, in ms (default: 250) */
  pollIntervalMs?: number;
  /** Longest wait for a stopped recording to finalize, in ms (default: 30000) */
  finalizeTimeoutMs?: number;
  /** Wait after finishing the measurement setup, in ms (default: 4000) */
  finishDelayMs?: number;
  /** Wait between sending channel settings and reading them back, in ms (default: 100) */
  applyDelayMs?: number;
  /** Recording names are cut to this length (default: 100) */
  maxNameLength?: number;
  /** Set the device clock from the host on connect (default: true) */
  syncClock?: boolean;
  /** Timer used for every wait (default: setTimeout-based) */
  sleep?: (ms: number) => Promise<void>;
}

const defaultOptions: Required<InstrumentOptions> = {
  requestTimeoutMs: 10_000,
  downloadTimeoutMs: 120_000,
  pollIntervalMs: 250,
  finalizeTimeoutMs: 30_000,
  finishDelayMs: 4_000,
  applyDelayMs: 100,
  maxNameLength: 100,
  syncClock: true,
  sleep,
};

interface Session {
  info: ModuleInfo;
  defaults: RecorderSetup;
  setup: RecorderSetup;
}

function checkTiming(options: Required<InstrumentOptions>): void {
  const { pollIntervalMs, finalizeTimeoutMs } = options;
  // The finalize timeout is counted in poll intervals
  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
    throw new InvalidParameterError(
      'Poll interval must be a positive number of ms',
      'pollIntervalMs',
      pollIntervalMs
    );
  }
  if (!Number.isFinite(finalizeTimeoutMs) || finalizeTimeoutMs < 0) {
    throw new InvalidParameterError(
      'Finalize timeout must be a non-negative number of ms',
      'finalizeTimeoutMs',
      finalizeTimeoutMs
    );
  }
}

function asNotFound(err: unknown, recordingId: string): unknown {
  return err instanceof DeviceProtocolError && err.status === 404 ? new NotFoundError(recordingId) : err;
}

// ===== Instrument =====

export class Instrument {
  readonly address: string;
  private options: Required<InstrumentOptions>;
  private http: DeviceHttp;
  private session: Session | null = null;
  private lastStatus: ModuleStatus | null = null;
  private catalog: readonly RecordingEntry[] = [];
  private activeRecordingUri: string | null = null;

  constructor(address: string, options: InstrumentOptions = {}) {
    if (address.trim().length === 0) {
      throw new InvalidParameterError('Device address must not be empty', 'address', address);
    }
    this.address = address;
    this.options = { ...defaultOptions, ...options };
    checkTiming(this.options);
    this.http = new DeviceHttp({
      baseUrl: `http://${address}/`,
      requestTimeoutMs: this.options.requestTimeoutMs,
      downloadTimeoutMs: this.options.downloadTimeoutMs,
    });
  }

  /**
   * Create an instrument and run the connection handshake.
   */
  static async connect(address: string, options: InstrumentOptions = {}): Promise<Instrument> {
    return new Instrument(address, options).connect();
  }

  // ===== Accessors =====

  get baseUrl(): string {
    return this.http.baseUrl;
  }

  get connected(): boolean {
    return this.session !== null;
  }

  /** Last reported module state ('Unknown' before the first status query) */
  get state(): ModuleState {
    return this.lastStatus?.moduleState ?? 'Unknown';
  }

  get lastUpdateTag(): number {
    return this.lastStatus?.lastUpdateTag ?? 0;
  }

  get info(): ModuleInfo {
    return this.requireSession().info;
  }

  /** Settings for the next recording */
  get setup(): RecorderSetup {
    return this.requireSession().setup;
  }

  /** Device default settings captured on connect */
  get defaults(): RecorderSetup {
    return this.requireSession().defaults;
  }

  get channelCount(): number {
    return this.requireSession().info.numberOfInputChannels;
  }

  /** Sample rate the next recording will use */
  get sampleRate(): number | undefined {
    return configuredSampleRate(this.setup);
  }

  /** Recordings seen at the last catalog refresh, oldest first */
  get recordings(): readonly RecordingEntry[] {
    return this.catalog;
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new DaqError(`Instrument at ${this.address} is not connected; call connect() first`);
    }
    return this.session;
  }

  private requireState(operation: string, expected: KnownModuleState): void {
    if (this.state !== expected) {
      throw new DeviceStateError(operation, expected, this.state);
    }
  }

  private updateSetup(next: RecorderSetup): void {
    this.session = { ...this.requireSession(), setup: next };
  }

  private async put(path: string): Promise<string> {
    const { text } = await this.http.text('PUT', path, { contentType: 'text/plain' });
    return text;
  }

  // ===== Session =====

  /**
   * Handshake: read status, set the device clock, open the recorder
   * application when idle, then read capabilities, default settings and
   * the recording catalog.
   */
  async connect(): Promise<this> {
    logger.info(`Connecting to ${this.baseUrl}`);
    await this.status();

    if (this.options.syncClock) {
      const now = String(Math.floor(Date.now() / 1000) * 1000);
      await this.http.text('PUT', 'rest/rec/module/time', {
        body: now,
        contentType: 'text/plain; charset=UTF-8',
      });
    }

    if (this.state === 'Idle') {
      await this.open();
    }

    const info = await this.http.json('GET', 'rest/rec/module/info', moduleInfoSchema);
    const defaults = freezeSetup(
      await this.http.json('GET', 'rest/rec/channels/input/default', recorderSetupSchema)
    );
    if (defaults.channels.length !== info.numberOfInputChannels) {
      throw new DeviceProtocolError(
        `Device reports ${info.numberOfInputChannels} input channels but default settings hold ${defaults.channels.length}`,
        this.http.url('rest/rec/channels/input/default')
      );
    }

    this.session = { info, defaults, setup: defaults };

    if (this.state === 'RecorderOpened') {
      await this.refreshCatalog();
    }
    logger.info(`Connected: ${info.numberOfInputChannels} channels, state ${this.state}`);
    return this;
  }

  /**
   * Query the module state.
   */
  async status(): Promise<ModuleStatus> {
    const { data, headers } = await this.http.jsonWithHeaders(
      'GET',
      'rest/rec/onchange?last=0',
      moduleStatusSchema
    );
    this.lastStatus = {
      moduleState: data.moduleState,
      lastUpdateTag: data.lastUpdateTag,
      deviceClock: headers.get('date'),
    };
    logger.debug(`state ${data.moduleState}, update tag ${data.lastUpdateTag}`);
    return this.lastStatus;
  }

  /**
   * Open the recorder application.
   */
  async open(): Promise<void> {
    await this.status();
    this.requireState('open the recorder', 'Idle');
    await this.put('rest/rec/open');
    await this.status();
  }

  /**
   * Close the recorder application.
   */
  async close(): Promise<void> {
    await this.status();
    this.requireState('close the recorder', 'RecorderOpened');
    await this.put('rest/rec/close');
    await this.status();
  }

  async reboot(): Promise<void> {
    logger.warn(`Rebooting ${this.baseUrl}`);
    await this.http.text('POST', '/', {
      body: 'reboot=1',
      contentType: 'application/x-www-form-urlencoded',
      headers: { Pragma: 'no-cache' },
    });
    this.session = null;
    this.lastStatus = null;
    this.activeRecordingUri = null;
  }

  /**
   * Transducers currently detected on the inputs.
   */
  async transducers(): Promise<unknown[]> {
    return this.http.json('GET', 'rest/rec/channels/input/all/transducers', transducerListSchema);
  }

  // ===== Channel Setup =====
  // These only rebuild the local snapshot; powerUp() sends it.

  disableAll(): void {
    this.updateSetup(withAllDisabled(this.setup));
  }

  disableChannel(channel: number): void {
    this.updateSetup(withChannelEnabled(this.setup, channel, false));
  }

  enableChannel(channel: number): void {
    this.updateSetup(withChannelEnabled(this.setup, channel, true));
  }

  /**
   * Set the sample rate for all channels.
   * @param rate - One of 4096, 8192, 16384, 32768, 65536, 131072
   */
  setSampleRate(rate: number): void {
    this.updateSetup(withSampleRate(this.setup, rate));
  }

  /**
   * Set the label of the next recording.
   */
  setName(name: string): void {
    if (name.length > this.options.maxNameLength) {
      logger.warn(`Recording name cut to ${this.options.maxNameLength} characters`);
    }
    this.updateSetup(withName(this.setup, name, this.options.maxNameLength));
  }

  /**
   * Configure and enable one channel (1-based). Fields left out take the
   * device default; nothing carries over from an earlier call.
   */
  setChannel(channel: number, options: ChannelOptions = {}): void {
    const { info, defaults, setup } = this.requireSession();
    const filters = info.supportedFilters?.length ? info.supportedFilters : DEFAULT_FILTERS;
    const ranges = info.supportedRanges?.length ? info.supportedRanges : DEFAULT_RANGES;
    this.updateSetup(withChannel(setup, defaults, channel, options, { filters, ranges }));
  }

  /**
   * Make the setup stored with a recording the current setup.
   */
  async useSettingsOf(recordingId: string): Promise<void> {
    const entry = await this.lookup('read recording settings', recordingId);
    const count = this.channelCount;
    if (entry.setup.channels.length !== count) {
      throw new DeviceProtocolError(
        `Recording ${recordingId} holds ${entry.setup.channels.length} channels, the device has ${count}`,
        this.http.url(entry.uri)
      );
    }
    // Copy so the cached catalog entry is not frozen along with the setup
    const channels = entry.setup.channels.map((channel) => ({
      ...channel,
      transducer: { ...channel.transducer, type: { ...channel.transducer.type } },
    }));
    this.updateSetup(freezeSetup({ name: entry.setup.name, channels }));
  }

  // ===== Power =====

  /**
   * Create the measurement setup and send the channel settings, which
   * also switches on transducer power where configured. Any settling
   * time before recording is up to the caller.
   *
   * @returns Settings as applied by the device
   */
  async powerUp(): Promise<RecorderSetup> {
    const setup = this.setup;
    await this.status();
    this.requireState('be configured', 'RecorderOpened');

    await this.put('rest/rec/create');
    await this.status();

    await this.http.text('PUT', 'rest/rec/channels/input', {
      body: JSON.stringify(setup),
      contentType: 'text/plain; charset=UTF-8',
    });
    await this.options.sleep(this.options.applyDelayMs);

    const applied = await this.http.json('GET', 'rest/rec/channels/input', recorderSetupSchema);
    await this.status();
    logger.info(`Powered up; state ${this.state}`);
    return applied;
  }

  /**
   * Finish the measurement setup (switching off transducer power) and
   * refresh the catalog. Does nothing when already powered down.
   */
  async powerDown(): Promise<void> {
    await this.status();
    if (this.state === 'RecorderOpened' || this.state === 'Idle') {
      logger.info(`Already powered down (state ${this.state})`);
      if (this.state === 'RecorderOpened') {
        await this.refreshCatalog();
      }
      return;
    }

    logger.info('Closing measurement setup (this can take a while if there are lots of recordings)');
    await this.put('rest/rec/finish');
    this.activeRecordingUri = null;
    await this.status();

    logger.info(`Waiting ${this.options.finishDelayMs} ms for powerdown completion`);
    await this.options.sleep(this.options.finishDelayMs);
    await this.status();

    if (this.state === 'RecorderOpened') {
      await this.refreshCatalog();
    }
  }

  // ===== Recording =====

  /**
   * Start a recording.
   * @returns Recording id
   */
  async startRecording(): Promise<string> {
    await this.status();
    this.requireState('record', 'RecorderStreaming');

    const { text } = await this.http.text('POST', 'rest/rec/measurements', {
      body: '',
      headers: { Pragma: 'no-cache' },
    });
    const uri = text.trim();
    const id = recordingIdFromUri(uri);
    if (id.length === 0) {
      throw new DeviceProtocolError(
        'Device did not return a recording URI',
        this.http.url('rest/rec/measurements'),
        undefined,
        text
      );
    }

    this.activeRecordingUri = uri;
    logger.info(`The recording uri is : ${this.http.url(uri)}`);
    await this.status();
    return id;
  }

  /**
   * Stop the recording started by this session and wait until the device
   * has finalized it.
   */
  async stopRecording(): Promise<void> {
    await this.status();
    this.requireState('stop recording', 'RecorderRecording');
    const uri = this.activeRecordingUri;
    if (!uri) {
      throw new DaqError('No recording was started by this session');
    }

    await this.put(`${uri}/stop`);
    await this.waitForFinalize(uri);
    this.activeRecordingUri = null;
  }

  private async waitForFinalize(uri: string): Promise<void> {
    const { pollIntervalMs, finalizeTimeoutMs } = this.options;
    let waited = 0;
    for (;;) {
      const { moduleState } = await this.status();
      if (moduleState !== 'RecorderRecording') {
        return;
      }
      if (waited >= finalizeTimeoutMs) {
        throw new DeviceProtocolError(
          `Recording did not finalize within ${finalizeTimeoutMs} ms`,
          this.http.url(uri)
        );
      }
      await this.options.sleep(pollIntervalMs);
      waited += pollIntervalMs;
    }
  }

  /**
   * Record for a fixed time and wait until the recording is complete.
   * @param durationSeconds - Recording length in seconds
   * @returns Recording id
   */
  async record(durationSeconds: number): Promise<string> {
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new InvalidParameterError(
        'Recording duration must be a positive number of seconds',
        'duration',
        durationSeconds
      );
    }

    const id = await this.startRecording();
    await this.options.sleep(durationSeconds * 1000);
    await this.stopRecording();
    logger.info(`Recording ${id} complete`);
    return id;
  }

  // ===== Catalog =====

  private async refreshCatalog(): Promise<readonly RecordingEntry[]> {
    const list = await this.http.json('GET', 'rest/rec/measurements', recordingListSchema);
    this.catalog = Object.freeze(sortByCreation(list));
    logger.debug(`${this.catalog.length} recording(s) on device`);
    return this.catalog;
  }

  private async ensureOpened(operation: string): Promise<void> {
    await this.status();
    if (this.state === 'Idle') {
      await this.open();
    }
    this.requireState(operation, 'RecorderOpened');
  }

  private async lookup(operation: string, recordingId: string): Promise<RecordingEntry> {
    await this.ensureOpened(operation);
    const entry = findRecording(await this.refreshCatalog(), recordingId);
    if (!entry) {
      throw new NotFoundError(recordingId);
    }
    return entry;
  }

  /**
   * List the recordings stored on the device, oldest first.
   *
   * @param start - First entry; negative counts from the end, so -3 gives
   *                the three most recent (default: 0)
   * @param count - Maximum number of entries (default: all)
   */
  async listRecordings(start = 0, count?: number): Promise<RecordingEntry[]> {
    await this.status();
    this.requireState('list recordings', 'RecorderOpened');
    return sliceRecordings(await this.refreshCatalog(), start, count);
  }

  /**
   * Download a recording into `directory`, together with its catalog
   * entry as JSON.
   * @returns Path of the written .wav file
   */
  async getWav(directory: string, recordingId: string): Promise<string> {
    const entry = await this.lookup('download recordings', recordingId);
    const stem = join(directory, recordingFileStem(entry));

    let bytes: Uint8Array;
    try {
      bytes = await this.http.bytes(entry.uri);
    } catch (err) {
      throw asNotFound(err, recordingId);
    }

    await mkdir(directory || '.', { recursive: true });
    await writeFile(`${stem}.wav`, bytes);
    await writeFile(`${stem}.json`, JSON.stringify(entry, null, 2));

    logger.info(`Saved recording ${recordingId} to ${stem}.wav (${bytes.length} bytes)`);
    return `${stem}.wav`;
  }

  /**
   * Delete a recording from the device.
   */
  async deleteRecording(recordingId: string): Promise<void> {
    const entry = await this.lookup('delete recordings', recordingId);
    try {
      await this.http.text('DELETE', entry.uri, { contentType: 'text/plain' });
    } catch (err) {
      throw asNotFound(err, recordingId);
    }
    this.catalog = Object.freeze(this.catalog.filter((e) => e !== entry));
    logger.info(`Deleted recording ${recordingId}`);
  }

  /**
   * Delete every recording on the device.
   * @param confirmation - Must be exactly "I'm sure"
   * @returns Number of recordings deleted
   */
  async deleteAll(confirmation: string): Promise<number> {
    if (confirmation !== DELETE_ALL_CONFIRMATION) {
      throw new InvalidParameterError(
        `deleteAll() needs the confirmation "${DELETE_ALL_CONFIRMATION}"`,
        'confirmation',
        confirmation
      );
    }

    await this.ensureOpened('delete recordings');
    const entries = await this.refreshCatalog();
    for (const entry of entries) {
      await this.deleteRecording(recordingIdFromUri(entry.uri));
    }
    return entries.length;
  }

  // ===== Display =====

  describeStatus(): string {
    return (
      `\n\tRecorder state : ${this.state}\n` +
      `\tcommands sent : ${this.lastUpdateTag}\n` +
      `\tRecorder clock : ${this.lastStatus?.deviceClock ?? 'unknown'}`
    );
  }

  /**
   * Summary of capabilities, the next recording's settings and status.
   */
  describe(): string {
    const info = this.info;
    const list = (values: Array<string | number> | undefined) => (values ? values.join(', ') : 'n/a');
    return (
      `\nRecorder Properties:\n` +
      `    ${info.numberOfInputChannels} channels\n` +
      `    SD card is${info.sdCardInserted ? '' : ' not'} inserted\n` +
      `    Filters      : ${list(info.supportedFilters)}\n` +
      `    SampleRates  : ${list(info.supportedSampleRates)}\n` +
      `    Ranges       : ${list(info.supportedRanges)}\n\n` +
      formatSetup(this.setup) +
      this.describeStatus()
    );
  }
}
