import { promises as fs } from 'fs';
import path from 'path';
import { StoreUnavailable, errorMessage } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('sensor-store');

const PENDING_FLAG = 'pending';
// Volume names are written as-is, so a name must not contain `=`, `;` or a
// line break, start with `#`, or carry surrounding whitespace.
const HEADER = '# volume=sensor-id[;pending]';

export type SensorRecord = {
  instanceId: string;
  // false until the clone has been configured and resumed
  configured: boolean;
};

// fs errors can come from another realm
export const isMissingFile = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';

export const isStorableVolumeName = (name: string): boolean =>
  name.length > 0 && name === name.trim() && !name.startsWith('#') && !/[=;\r\n]/.test(name);

export function storeFileName(arrayId: string): string {
  const safe = arrayId.trim().replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safe || 'array'}.sensors`;
}

/**
 * Parse the store file. Throws StoreUnavailable on the first malformed line.
 */
export function parseStore(content: string, source = 'sensor store'): Map<string, SensorRecord> {
  const records = new Map<string, SensorRecord>();
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, idx) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const eq = line.indexOf('=');
    const volumeName = eq > 0 ? line.slice(0, eq).trim() : '';
    const [instanceId = '', flag, ...rest] = (eq > 0 ? line.slice(eq + 1) : '').split(';').map((p) => p.trim());

    if (!volumeName || !instanceId || rest.length > 0 || (flag !== undefined && flag !== PENDING_FLAG)) {
      throw new StoreUnavailable(`${source}: malformed line ${idx + 1}: '${raw}'`);
    }
    if (records.has(volumeName)) {
      log.warn('duplicate volume in store, keeping the last entry', { volumeName, line: idx + 1 });
    }
    records.set(volumeName, { instanceId, configured: flag === undefined });
  });

  return records;
}

export function serializeStore(records: ReadonlyMap<string, SensorRecord>): string {
  const lines = [...records.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([volumeName, record]) =>
      record.configured
        ? `${volumeName}=${record.instanceId}`
        : `${volumeName}=${record.instanceId};${PENDING_FLAG}`
    );
  return [HEADER, ...lines].join('\n') + '\n';
}

/**
 * Durable `volume -> sensor` map for one array, backed by a single file.
 * Every mutation rewrites the file (temp file, fsync, rename) before it resolves.
 * Not safe for concurrent runs against the same array.
 */
export class SensorStore {
  readonly filePath: string;
  private current = new Map<string, SensorRecord>();
  private loaded = false;

  constructor(stateDir: string, arrayId: string) {
    this.filePath = path.join(stateDir, storeFileName(arrayId));
  }

  async load(): Promise<Map<string, SensorRecord>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) {
        throw new StoreUnavailable(`Cannot read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
      }
      log.info('no sensor store yet, creating one', { file: this.filePath });
      this.current = new Map();
      this.loaded = true;
      await this.persist();
      return this.records();
    }

    this.current = parseStore(content, this.filePath);
    this.loaded = true;
    log.debug('sensor store loaded', { file: this.filePath, records: this.current.size });
    return this.records();
  }

  records(): Map<string, SensorRecord> {
    return new Map([...this.current.entries()].map(([name, record]) => [name, { ...record }]));
  }

  async put(volumeName: string, instanceId: string, configured = true): Promise<void> {
    await this.ensureLoaded();
    this.current.set(volumeName, { instanceId, configured });
    await this.persist();
  }

  async remove(volumeName: string): Promise<void> {
    await this.ensureLoaded();
    this.current.delete(volumeName);
    await this.persist();
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) await this.load();
  }

  private async persist(): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(serializeStore(this.current), 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new StoreUnavailable(`Cannot write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
