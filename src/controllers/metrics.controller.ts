import type { FlashArrayApi } from '../services/flasharray-api';
import type {
  ArrayInfo,
  ArraySpace,
  Drive,
  HardwareComponent,
  Performance,
  VolumeSpace,
} from '../types/flasharray';
import { ArrayQueryFailure } from '../lib/errors';
import { type JsonRecord, recordList, singleRecord, toNumber, toText } from '../lib/parse';
import { parseDriveStatus, parseHardwareStatus } from '../types/status';

/**
 * Normalizes FlashArray responses into the records the formatter consumes.
 * A body of the wrong shape is an ArrayQueryFailure; missing numbers read as 0.
 */
export class MetricsController {
  constructor(private readonly api: FlashArrayApi) {}

  async arrayInfo(): Promise<ArrayInfo> {
    const raw = this.expectRecord(await this.api.getArray(), 'array');
    const name = toText(raw.array_name);
    if (!name) {
      throw new ArrayQueryFailure('Array response has no array_name');
    }
    return { name, id: toText(raw.id), version: toText(raw.version) };
  }

  async capacity(): Promise<ArraySpace> {
    const raw = this.expectRecord(await this.api.getArraySpace(), 'array space');
    return {
      capacityBytes: toNumber(raw.capacity),
      usedBytes: toNumber(raw.total),
      volumesBytes: toNumber(raw.volumes),
      snapshotsBytes: toNumber(raw.snapshots),
      sharedBytes: toNumber(raw.shared_space),
      systemBytes: toNumber(raw.system),
      dataReduction: toNumber(raw.data_reduction),
      totalReduction: toNumber(raw.total_reduction),
      thinProvisioning: toNumber(raw.thin_provisioning),
    };
  }

  async performance(): Promise<Performance> {
    const raw = this.expectRecord(await this.api.getArrayPerformance(), 'array performance');
    return this.extractPerformance(raw);
  }

  async hardware(): Promise<HardwareComponent[]> {
    return this.expectList(await this.api.getHardware(), 'hardware')
      .map((item) => ({ name: toText(item.name), status: parseHardwareStatus(item.status) }))
      .filter((component) => Boolean(component.name));
  }

  async drives(): Promise<Drive[]> {
    return this.expectList(await this.api.getDrives(), 'drive')
      .map((item) => ({
        name: toText(item.name),
        status: parseDriveStatus(item.status),
        capacityBytes: toNumber(item.capacity),
        type: toText(item.type),
      }))
      .filter((drive) => Boolean(drive.name));
  }

  async volume(name: string): Promise<{ space: VolumeSpace; performance: Performance }> {
    const space = this.expectRecord(await this.api.getVolumeSpace(name), `volume ${name}`);
    const perf = this.expectRecord(await this.api.getVolumePerformance(name), `volume ${name} performance`);
    return {
      space: {
        name: toText(space.name) || name,
        sizeBytes: toNumber(space.size),
        usedBytes: toNumber(space.total),
        snapshotsBytes: toNumber(space.snapshots),
        dataReduction: toNumber(space.data_reduction),
        totalReduction: toNumber(space.total_reduction),
        thinProvisioning: toNumber(space.thin_provisioning),
      },
      performance: this.extractPerformance(perf),
    };
  }

  /**
   * Names of all volumes, in array order.
   */
  async listVolumeNames(): Promise<string[]> {
    const items = this.expectList(await this.api.getVolumes(), 'volume');
    return items.map((item) => {
      const name = toText(item.name);
      if (!name) {
        throw new ArrayQueryFailure('Volume list contains an entry without a name');
      }
      return name;
    });
  }

  private extractPerformance(raw: JsonRecord): Performance {
    return {
      readsPerSec: toNumber(raw.reads_per_sec),
      writesPerSec: toNumber(raw.writes_per_sec),
      inputBytesPerSec: toNumber(raw.input_per_sec),
      outputBytesPerSec: toNumber(raw.output_per_sec),
      usecPerReadOp: toNumber(raw.usec_per_read_op),
      usecPerWriteOp: toNumber(raw.usec_per_write_op),
      queueDepth: toNumber(raw.queue_depth),
    };
  }

  private expectRecord(raw: unknown, what: string): JsonRecord {
    const record = singleRecord(raw);
    if (!record) {
      throw new ArrayQueryFailure(`Malformed ${what} response: expected an object`);
    }
    return record;
  }

  private expectList(raw: unknown, what: string): JsonRecord[] {
    const list = recordList(raw);
    if (!list) {
      throw new ArrayQueryFailure(`Malformed ${what} response: expected a list`);
    }
    return list;
  }
}
