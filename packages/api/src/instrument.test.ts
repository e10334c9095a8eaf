import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import {
  DaqError,
  DeviceCommunicationError,
  DeviceProtocolError,
  DeviceStateError,
  InvalidParameterError,
  NotFoundError,
} from '@core/errors';
import { openWav } from '@wav/decoder';
import { Instrument, type InstrumentOptions } from './instrument';
import { FakeRecorder } from './testing/fake-recorder';

let recorder: FakeRecorder;

function useRecorder(next: FakeRecorder): void {
  recorder = next;
  vi.stubGlobal('fetch', recorder.fetch);
}

function connect(options: InstrumentOptions = {}): Promise<Instrument> {
  return Instrument.connect('10.0.0.5', { sleep: recorder.sleep, ...options });
}

async function connectPowered(options: InstrumentOptions = {}): Promise<Instrument> {
  const instrument = await connect(options);
  instrument.disableAll();
  instrument.setSampleRate(4096);
  instrument.setChannel(1);
  await instrument.powerUp();
  return instrument;
}

beforeEach(() => {
  useRecorder(new FakeRecorder());
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ===== Connection =====

describe('connect', () => {
  it('opens the recorder, sets the clock and reads the defaults', async () => {
    const instrument = await connect();

    expect(instrument.state).toBe('RecorderOpened');
    expect(instrument.channelCount).toBe(4);
    expect(instrument.setup).toEqual(recorder.defaults);
    expect(instrument.recordings).toEqual([]);
    expect(recorder.clockSetTo).toMatch(/^\d+000$/);
    expect(recorder.requestsTo('PUT', '/rest/rec/open')).toHaveLength(1);
  });

  it('leaves an already opened recorder alone', async () => {
    useRecorder(new FakeRecorder({ state: 'RecorderOpened' }));
    await connect({ syncClock: false });

    expect(recorder.requestsTo('PUT', '/rest/rec/open')).toHaveLength(0);
    expect(recorder.requestsTo('PUT', '/rest/rec/module/time')).toHaveLength(0);
  });

  it('reports the device clock from the Date header', async () => {
    const instrument = await connect();
    const status = await instrument.status();
    expect(status).toEqual({
      moduleState: 'RecorderOpened',
      lastUpdateTag: 1,
      deviceClock: 'Mon, 15 Jan 2024 12:00:00 GMT',
    });
  });

  it('requires an address', () => {
    expect(() => new Instrument(' ')).toThrow(InvalidParameterError);
  });

  it('rejects poll intervals that would never time out', () => {
    expect(() => new Instrument('10.0.0.5', { pollIntervalMs: 0 })).toThrow(
      'Poll interval must be a positive number of ms'
    );
    expect(() => new Instrument('10.0.0.5', { pollIntervalMs: Number.NaN })).toThrow(InvalidParameterError);
    expect(() => new Instrument('10.0.0.5', { finalizeTimeoutMs: -1 })).toThrow(InvalidParameterError);
  });

  it('refuses configuration before connecting', () => {
    const instrument = new Instrument('10.0.0.5');
    expect(() => instrument.setSampleRate(8192)).toThrow(DaqError);
    expect(instrument.state).toBe('Unknown');
  });
});

// ===== Channel Setup =====

describe('channel setup', () => {
  it('reads back the configured sample rate', async () => {
    const instrument = await connect();
    instrument.setSampleRate(8192);
    expect(instrument.sampleRate).toBe(8192);

    const applied = await instrument.powerUp();
    expect(applied.channels.every((c) => c.bandwidth === '3.2 kHz')).toBe(true);
  });

  it('keeps only the last setChannel call', async () => {
    const instrument = await connect();
    instrument.setChannel(1, { filter: '7.0 Hz', powered: true });
    instrument.setChannel(1, { name: 'Second' });

    expect(instrument.setup.channels[0]).toMatchObject({
      name: 'Second',
      filter: 'DC',
      ccld: false,
      enabled: true,
    });
  });

  it('rejects filters the device does not list without sending anything', async () => {
    const instrument = await connect();
    const sent = recorder.requests.length;

    expect(() => instrument.setChannel(1, { filter: '0.1 Hz 10%' })).toThrow(InvalidParameterError);
    expect(() => instrument.setChannel(9)).toThrow(InvalidParameterError);
    expect(recorder.requests.length).toBe(sent);
  });

  it('falls back to the standard filters when the device lists none', async () => {
    useRecorder(new FakeRecorder({ info: { supportedFilters: [] } }));
    const instrument = await connect();

    instrument.setChannel(2, { filter: '0.1 Hz 10%' });
    expect(instrument.setup.channels[1].filter).toBe('0.1 Hz 10%');
  });

  it('cuts long names', async () => {
    const instrument = await connect({ maxNameLength: 5 });
    instrument.setName('Calibration run');
    expect(instrument.setup.name).toBe('Calib');
  });

  it('enables and disables single channels', async () => {
    const instrument = await connect();
    instrument.disableAll();
    instrument.enableChannel(3);
    expect(instrument.setup.channels.map((c) => c.enabled)).toEqual([false, false, true, false]);
    instrument.disableChannel(3);
    expect(instrument.setup.channels.some((c) => c.enabled)).toBe(false);
  });
});

// ===== Recording =====

describe('recording', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'daqlink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('records 10 seconds at 8192 Hz on one channel', async () => {
    const instrument = await connect();
    instrument.disableAll();
    instrument.setSampleRate(8192);
    instrument.setName('Input test');
    instrument.setChannel(1, {
      name: 'Input signal',
      filter: '7.0 Hz',
      range: '10 Vpeak',
      sensitivity: 1,
      unit: 'V',
      powered: false,
    });

    await instrument.powerUp();
    const id = await instrument.record(10);
    await instrument.powerDown();

    expect(id).toBe('1000000001');
    const [latest] = await instrument.listRecordings(-1);
    expect(latest.uri).toBe('/rest/rec/measurements/1000000001');
    expect(latest.duration).toBe(10000);

    const path = await instrument.getWav(dir, id);
    expect(basename(path)).toBe('Input_test_20240115120000.wav');

    const { samples, header, metadata, settings } = await openWav(path);
    expect(samples).toHaveLength(1);
    expect(samples[0]).toHaveLength(81920);
    expect(header.sampleRate).toBe(8192);
    expect(metadata?.label).toBe('Input test');
    expect(metadata?.channelNames).toEqual(['Input signal']);
    expect(settings?.uri).toBe(latest.uri);
    expect(samples[0][41]).toBeCloseTo(Math.sin((2 * Math.PI * 50 * 41) / 8192), 5);
  });

  it('writes the catalog entry beside the download', async () => {
    const instrument = await connectPowered();
    const id = await instrument.record(1);
    await instrument.powerDown();

    const path = await instrument.getWav(dir, id);
    const sidecar: unknown = JSON.parse(await readFile(path.replace(/\.wav$/, '.json'), 'utf-8'));
    expect(sidecar).toMatchObject({ uri: `/rest/rec/measurements/${id}`, duration: 1000 });
  });

  it('lists a recording until it is deleted', async () => {
    const instrument = await connectPowered();
    const id = await instrument.record(2);
    await instrument.powerDown();

    expect((await instrument.listRecordings()).map((e) => e.uri)).toEqual([`/rest/rec/measurements/${id}`]);

    await instrument.deleteRecording(id);
    expect(await instrument.listRecordings()).toEqual([]);
    expect(recorder.recordingIds()).toEqual([]);
  });

  it('lists oldest first and slices from the end', async () => {
    const instrument = await connectPowered();
    await instrument.record(1);
    await instrument.record(2);
    await instrument.record(3);
    await instrument.powerDown();

    expect(instrument.recordings.map((e) => e.duration)).toEqual([1000, 2000, 3000]);
    expect((await instrument.listRecordings(-2)).map((e) => e.duration)).toEqual([2000, 3000]);
    expect((await instrument.listRecordings(0, 1)).map((e) => e.duration)).toEqual([1000]);
  });

  it('waits for the recording to finalize', async () => {
    useRecorder(new FakeRecorder({ finalizePolls: 3 }));
    const instrument = await connectPowered();

    await instrument.record(1);
    expect(instrument.state).toBe('RecorderStreaming');
  });

  it('gives up when the recording never finalizes', async () => {
    useRecorder(new FakeRecorder({ finalizePolls: 100 }));
    const instrument = await connectPowered({ finalizeTimeoutMs: 1000, pollIntervalMs: 250 });

    const err = await instrument.record(1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeviceProtocolError);
    expect(err).toMatchObject({ message: 'Recording did not finalize within 1000 ms' });
  });

  it('rejects non-positive durations before sending anything', async () => {
    const instrument = await connectPowered();
    const sent = recorder.requests.length;

    await expect(instrument.record(0)).rejects.toThrow(InvalidParameterError);
    await expect(instrument.record(Number.NaN)).rejects.toThrow(InvalidParameterError);
    expect(recorder.requests.length).toBe(sent);
  });

  it('refuses to record before power up', async () => {
    const instrument = await connect();
    const err = await instrument.startRecording().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DeviceStateError);
    expect(err).toMatchObject({ expected: 'RecorderStreaming', actual: 'RecorderOpened' });
  });

  it('refuses to stop when nothing is recording', async () => {
    const instrument = await connectPowered();
    await expect(instrument.stopRecording()).rejects.toThrow(DeviceStateError);
  });
});

// ===== Power =====

describe('power', () => {
  it('does nothing when already powered down', async () => {
    const instrument = await connect();
    await instrument.powerDown();
    expect(recorder.requestsTo('PUT', '/rest/rec/finish')).toHaveLength(0);
  });

  it('finishes the setup and waits before refreshing the catalog', async () => {
    const instrument = await connectPowered();
    const before = recorder.clock;
    const listed = recorder.requestsTo('GET', '/rest/rec/measurements').length;

    await instrument.powerDown();

    expect(instrument.state).toBe('RecorderOpened');
    expect(recorder.clock - before).toBe(4000);
    expect(recorder.requestsTo('GET', '/rest/rec/measurements')).toHaveLength(listed + 1);
  });

  it('sends the configured setup to the device', async () => {
    const instrument = await connect();
    instrument.disableAll();
    instrument.setChannel(2, { name: 'Hammer', powered: true, sensitivity: 0.0023, unit: 'N' });
    await instrument.powerUp();

    expect(recorder.setup.channels[1]).toMatchObject({ name: 'Hammer', ccld: true, enabled: true });
    expect(recorder.setup.channels[1].transducer.sensitivity).toBe(0.0023);
    expect(recorder.setup.channels[0].enabled).toBe(false);
  });

  it('requires an opened recorder to power up', async () => {
    const instrument = await connectPowered();
    await expect(instrument.powerUp()).rejects.toThrow(
      "Recorder must be in state 'RecorderOpened' to be configured; it is currently in state 'RecorderStreaming'"
    );
  });
});

// ===== Catalog =====

describe('catalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'daqlink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('raises NotFoundError for unknown recordings', async () => {
    const instrument = await connect();

    await expect(instrument.getWav(dir, '42')).rejects.toThrow(NotFoundError);
    await expect(instrument.deleteRecording('42')).rejects.toThrow('Recording 42 does not exist on the device');
  });

  it('maps a 404 on download to NotFoundError', async () => {
    const instrument = await connectPowered();
    const id = await instrument.record(1);
    await instrument.powerDown();

    vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
      const request = new Request(input, init);
      if (request.method === 'GET' && new URL(request.url).pathname === `/rest/rec/measurements/${id}`) {
        return new Response('gone', { status: 404 });
      }
      return recorder.fetch(input, init);
    });

    await expect(instrument.getWav(dir, id)).rejects.toThrow(NotFoundError);
  });

  it('deletes everything only with confirmation', async () => {
    const instrument = await connectPowered();
    await instrument.record(1);
    await instrument.record(1);
    await instrument.powerDown();

    await expect(instrument.deleteAll('yes')).rejects.toThrow(InvalidParameterError);
    expect(recorder.recordingIds()).toHaveLength(2);

    await expect(instrument.deleteAll("I'm sure")).resolves.toBe(2);
    expect(recorder.recordingIds()).toEqual([]);
    expect(instrument.recordings).toEqual([]);
  });

  it('reuses the settings of a stored recording', async () => {
    const instrument = await connect();
    instrument.disableAll();
    instrument.setSampleRate(16384);
    instrument.setName('Reference');
    instrument.setChannel(4, { name: 'Ref' });
    await instrument.powerUp();
    await instrument.record(1);
    await instrument.powerDown();

    instrument.setName('Other');
    instrument.setSampleRate(4096);
    await instrument.useSettingsOf('1000000001');

    expect(instrument.setup.name).toBe('Reference');
    expect(instrument.sampleRate).toBe(16384);
    expect(instrument.setup.channels[3].name).toBe('Ref');
    expect(Object.isFrozen(instrument.recordings[0].setup.channels[3])).toBe(false);
  });

  it('refuses settings recorded with a different channel count', async () => {
    const instrument = await connect();
    const entry = {
      uri: '/rest/rec/measurements/1000000099',
      size: 100,
      duration: 1000,
      setup: { name: 'Other device', channels: recorder.defaults.channels.slice(0, 2), datetime: 1 },
    };
    vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
      const request = new Request(input, init);
      if (request.method === 'GET' && new URL(request.url).pathname === '/rest/rec/measurements') {
        return new Response(JSON.stringify([entry]));
      }
      return recorder.fetch(input, init);
    });

    await expect(instrument.useSettingsOf('1000000099')).rejects.toThrow(
      'Recording 1000000099 holds 2 channels, the device has 4'
    );
    expect(instrument.setup).toEqual(recorder.defaults);
  });
});

// ===== Device Control =====

describe('device control', () => {
  it('closes and reopens the recorder', async () => {
    const instrument = await connect();
    await instrument.close();
    expect(instrument.state).toBe('Idle');

    await expect(instrument.close()).rejects.toThrow(DeviceStateError);
    await instrument.open();
    expect(instrument.state).toBe('RecorderOpened');
  });

  it('reboots the device and drops the session', async () => {
    const instrument = await connect();
    await instrument.reboot();

    expect(recorder.requestsTo('POST', '/')).toEqual([{ method: 'POST', path: '/', body: 'reboot=1' }]);
    expect(instrument.connected).toBe(false);
  });

  it('lists detected transducers', async () => {
    const instrument = await connect();
    await expect(instrument.transducers()).resolves.toEqual([null, null, null, null]);
  });

  it('surfaces transport and protocol failures', async () => {
    const instrument = await connect();

    recorder.failNext(500, 'Internal error');
    await expect(instrument.status()).rejects.toThrow(DeviceProtocolError);

    recorder.unreachable = true;
    await expect(instrument.status()).rejects.toThrow(DeviceCommunicationError);
  });

  it('describes capabilities, setup and status', async () => {
    const instrument = await connect();
    instrument.disableAll();
    instrument.setSampleRate(8192);
    instrument.setName('Run');
    instrument.setChannel(1, { name: 'Input' });

    const text = instrument.describe();
    expect(text).toContain('    4 channels\n    SD card is inserted\n');
    expect(text).toContain('    Ranges       : 10 Vpeak, 31.6 Vpeak\n');
    expect(text).toContain('\tChannel 1 : Input\n\t\t8192 SPS, DC filter, 10 Vpeak, 1V/V.\n');
    expect(text).toContain('\tRecorder state : RecorderOpened\n');
  });
});
