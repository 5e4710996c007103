import type { DriveStatus, HardwareStatus } from './status';

// Normalized records: raw API fields already coerced, missing numbers are 0.

export interface ArrayInfo {
  name: string;
  id: string;
  version: string;
}

export interface ArraySpace {
  capacityBytes: number;
  usedBytes: number;
  volumesBytes: number;
  snapshotsBytes: number;
  sharedBytes: number;
  systemBytes: number;
  dataReduction: number;
  totalReduction: number;
  thinProvisioning: number;
}

export interface Performance {
  readsPerSec: number;
  writesPerSec: number;
  inputBytesPerSec: number;
  outputBytesPerSec: number;
  usecPerReadOp: number;
  usecPerWriteOp: number;
  queueDepth: number;
}

export interface HardwareComponent {
  name: string;
  status: HardwareStatus;
}

export interface Drive {
  name: string;
  status: DriveStatus;
  capacityBytes: number;
  type: string;
}

export interface VolumeSpace {
  name: string;
  sizeBytes: number;
  usedBytes: number;
  snapshotsBytes: number;
  dataReduction: number;
  totalReduction: number;
  thinProvisioning: number;
}
