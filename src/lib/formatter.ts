import type {
  ArraySpace,
  Drive,
  HardwareComponent,
  Performance,
  VolumeSpace,
} from '../types/flasharray';
import type { Channel, ErrorEnvelope, ResultEnvelope } from '../types/prtg';
import {
  DRIVE_STATUS_LOOKUP,
  HARDWARE_STATUS_LOOKUP,
  driveStatusCode,
  hardwareStatusCode,
  isDriveFailed,
} from '../types/status';

export type UsageLimits = {
  warnPercent: number;
  errorPercent: number;
};

const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const percentOf = (part: number, whole: number): number =>
  whole > 0 ? round((part / whole) * 100) : 0;

const bytes = (channel: string, value: number): Channel => ({
  channel,
  value,
  unit: 'BytesDisk',
  volumesize: 'GigaByte',
});

const ratio = (channel: string, value: number): Channel => ({
  channel,
  value: round(value),
  unit: 'Custom',
  customunit: ':1',
  float: 1,
});

const usedPercent = (value: number, limits: UsageLimits): Channel => ({
  channel: 'Used %',
  value,
  unit: 'Percent',
  float: 1,
  limitmode: 1,
  limitmaxwarning: limits.warnPercent,
  limitmaxerror: limits.errorPercent,
});

const thinProvisioning = (fraction: number): Channel => ({
  channel: 'Thin Provisioning',
  value: round(fraction * 100),
  unit: 'Percent',
  float: 1,
});

const latency = (channel: string, usec: number): Channel => ({
  channel,
  value: round(usec / 1000, 3),
  unit: 'TimeResponse',
  float: 1,
});

const iops = (channel: string, value: number): Channel => ({
  channel,
  value,
  unit: 'Custom',
  customunit: 'IOPS',
});

export function formatCapacity(space: ArraySpace, limits: UsageLimits): Channel[] {
  return [
    bytes('Capacity', space.capacityBytes),
    bytes('Used', space.usedBytes),
    bytes('Free', Math.max(space.capacityBytes - space.usedBytes, 0)),
    usedPercent(percentOf(space.usedBytes, space.capacityBytes), limits),
    bytes('Volumes', space.volumesBytes),
    bytes('Snapshots', space.snapshotsBytes),
    bytes('Shared Space', space.sharedBytes),
    bytes('System', space.systemBytes),
    ratio('Data Reduction', space.dataReduction),
    ratio('Total Reduction', space.totalReduction),
    thinProvisioning(space.thinProvisioning),
  ];
}

export function formatPerformance(perf: Performance): Channel[] {
  return [
    iops('Reads/s', perf.readsPerSec),
    iops('Writes/s', perf.writesPerSec),
    { channel: 'Read Bandwidth', value: perf.outputBytesPerSec, unit: 'SpeedDisk', speedsize: 'MegaByte' },
    { channel: 'Write Bandwidth', value: perf.inputBytesPerSec, unit: 'SpeedDisk', speedsize: 'MegaByte' },
    latency('Read Latency', perf.usecPerReadOp),
    latency('Write Latency', perf.usecPerWriteOp),
    { channel: 'Queue Depth', value: perf.queueDepth, unit: 'Count' },
  ];
}

export function formatHardware(components: HardwareComponent[]): Channel[] {
  return components.map((component) => ({
    channel: component.name,
    value: hardwareStatusCode(component.status),
    unit: 'Custom',
    valuelookup: HARDWARE_STATUS_LOOKUP,
  }));
}

export function formatDrives(drives: Drive[]): Channel[] {
  const failed = drives.filter((drive) => isDriveFailed(drive.status)).length;
  return [
    {
      channel: 'Failed Drives',
      value: failed,
      unit: 'Count',
      limitmode: 1,
      limitmaxerror: 0,
      limiterrormsg: 'One or more drives failed',
    },
    ...drives.map(
      (drive): Channel => ({
        channel: drive.name,
        value: driveStatusCode(drive.status),
        unit: 'Custom',
        valuelookup: DRIVE_STATUS_LOOKUP,
      })
    ),
  ];
}

export function formatVolume(space: VolumeSpace, perf: Performance, limits: UsageLimits): Channel[] {
  return [
    bytes('Size', space.sizeBytes),
    bytes('Used', space.usedBytes),
    usedPercent(percentOf(space.usedBytes, space.sizeBytes), limits),
    bytes('Snapshots', space.snapshotsBytes),
    ratio('Data Reduction', space.dataReduction),
    ratio('Total Reduction', space.totalReduction),
    thinProvisioning(space.thinProvisioning),
    iops('Reads/s', perf.readsPerSec),
    iops('Writes/s', perf.writesPerSec),
    latency('Read Latency', perf.usecPerReadOp),
    latency('Write Latency', perf.usecPerWriteOp),
  ];
}

export const scanStatus = (): Channel => ({
  channel: 'Scan Status',
  value: 1,
  unit: 'Count',
});

export function resultEnvelope(channels: Channel[], text?: string): ResultEnvelope {
  return { prtg: { result: channels, ...(text ? { text } : {}) } };
}

export function errorEnvelope(message: string): ErrorEnvelope {
  return { prtg: { error: 1, text: message } };
}
