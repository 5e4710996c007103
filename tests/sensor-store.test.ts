import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as vm from 'vm';
import { StoreUnavailable, errorMessage } from '../src/lib/errors';
import {
  SensorStore,
  isMissingFile,
  isStorableVolumeName,
  parseStore,
  serializeStore,
  storeFileName,
} from '../src/services/sensor-store';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sensor-store-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ============================================
// File format
// ============================================

describe('parseStore', () => {
  it('reads configured and pending records, skipping comments and blank lines', () => {
    const records = parseStore('# header\n\nvol-a=101\nvol-b = 102;pending\r\n');

    expect([...records.entries()]).toEqual([
      ['vol-a', { instanceId: '101', configured: true }],
      ['vol-b', { instanceId: '102', configured: false }],
    ]);
  });

  it('keeps the last line for a repeated volume', () => {
    const records = parseStore('vol-a=101\nvol-a=105\n');
    expect(records.get('vol-a')).toEqual({ instanceId: '105', configured: true });
    expect(records.size).toBe(1);
  });

  it.each([
    ['no separator', 'vol-a 101'],
    ['empty volume name', '=101'],
    ['empty instance id', 'vol-a='],
    ['unknown flag', 'vol-a=101;paused'],
    ['empty flag', 'vol-a=101;'],
    ['extra fields', 'vol-a=101;pending;x'],
  ])('rejects a line with %s', (_label, line) => {
    expect(() => parseStore(`vol-z=1\n${line}\n`, 'fa.sensors')).toThrow(
      new StoreUnavailable(`fa.sensors: malformed line 2: '${line}'`)
    );
  });
});

describe('serializeStore', () => {
  it('writes a header and sorted lines, marking pending records', () => {
    const content = serializeStore(
      new Map([
        ['vol-b', { instanceId: '102', configured: false }],
        ['vol-a', { instanceId: '101', configured: true }],
      ])
    );
    expect(content).toBe('# volume=sensor-id[;pending]\nvol-a=101\nvol-b=102;pending\n');
  });
});

describe('storeFileName', () => {
  it('replaces characters unsafe for a file name', () => {
    expect(storeFileName('fa/01 prod')).toBe('fa_01_prod.sensors');
  });

  it('falls back to a fixed name for an empty id', () => {
    expect(storeFileName('  ')).toBe('array.sensors');
  });
});

describe('isStorableVolumeName', () => {
  it.each(['vol-a', 'vol.01', 'pod::vol-b'])('accepts %s', (name) => {
    expect(isStorableVolumeName(name)).toBe(true);
  });

  it.each(['', 'a=b', 'a;b', '#vol', ' vol', 'vol\nb'])('rejects %j', (name) => {
    expect(isStorableVolumeName(name)).toBe(false);
  });
});

describe('isMissingFile', () => {
  it('recognizes ENOENT from an error created in another realm', () => {
    const foreign: unknown = vm.runInNewContext("Object.assign(new Error('gone'), { code: 'ENOENT' })");

    expect(foreign instanceof Error).toBe(false);
    expect(isMissingFile(foreign)).toBe(true);
    expect(errorMessage(foreign)).toBe('gone');
  });

  it('ignores other failures', () => {
    expect(isMissingFile(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isMissingFile('ENOENT')).toBe(false);
    expect(isMissingFile(null)).toBe(false);
  });
});

// ============================================
// Persistence
// ============================================

describe('SensorStore', () => {
  it('creates an empty file on first load', async () => {
    const store = new SensorStore(path.join(tmpDir, 'nested'), 'fa-01');

    const records = await store.load();

    expect(records.size).toBe(0);
    expect(fs.readFileSync(store.filePath, 'utf8')).toBe('# volume=sensor-id[;pending]\n');
  });

  it('persists put before resolving', async () => {
    const store = new SensorStore(tmpDir, 'fa-01');
    await store.load();

    await store.put('vol-a', '101');
    await store.put('vol-b', '102', false);

    const reopened = new SensorStore(tmpDir, 'fa-01');
    const records = await reopened.load();
    expect(records.get('vol-a')).toEqual({ instanceId: '101', configured: true });
    expect(records.get('vol-b')).toEqual({ instanceId: '102', configured: false });
  });

  it('upserts an existing volume', async () => {
    const store = new SensorStore(tmpDir, 'fa-01');
    await store.put('vol-a', '101', false);
    await store.put('vol-a', '101', true);

    expect(fs.readFileSync(store.filePath, 'utf8')).toBe('# volume=sensor-id[;pending]\nvol-a=101\n');
  });

  it('persists remove before resolving', async () => {
    const store = new SensorStore(tmpDir, 'fa-01');
    await store.put('vol-a', '101');
    await store.put('vol-b', '102');

    await store.remove('vol-a');

    const records = await new SensorStore(tmpDir, 'fa-01').load();
    expect([...records.keys()]).toEqual(['vol-b']);
  });

  it('leaves no temp file behind', async () => {
    const store = new SensorStore(tmpDir, 'fa-01');
    await store.put('vol-a', '101');

    expect(fs.readdirSync(tmpDir)).toEqual(['fa-01.sensors']);
  });

  it('keeps separate files per array', async () => {
    await new SensorStore(tmpDir, 'fa-01').put('vol-a', '101');
    await new SensorStore(tmpDir, 'fa-02').put('vol-a', '201');

    const first = await new SensorStore(tmpDir, 'fa-01').load();
    const second = await new SensorStore(tmpDir, 'fa-02').load();
    expect(first.get('vol-a')?.instanceId).toBe('101');
    expect(second.get('vol-a')?.instanceId).toBe('201');
  });

  it('returns copies that do not alias the store', async () => {
    const store = new SensorStore(tmpDir, 'fa-01');
    await store.put('vol-a', '101');

    const snapshot = store.records();
    snapshot.delete('vol-a');

    expect(store.records().has('vol-a')).toBe(true);
  });

  it('fails with StoreUnavailable on a corrupt file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'fa-01.sensors'), 'vol-a=101\ngarbage\n');
    const store = new SensorStore(tmpDir, 'fa-01');

    await expect(store.load()).rejects.toBeInstanceOf(StoreUnavailable);
  });

  it('fails with StoreUnavailable when the file cannot be read', async () => {
    fs.mkdirSync(path.join(tmpDir, 'fa-01.sensors'));
    const store = new SensorStore(tmpDir, 'fa-01');

    await expect(store.load()).rejects.toBeInstanceOf(StoreUnavailable);
  });
});
