/**
 * Hardware and drive states reported by the array, as closed sets.
 * Numeric codes are what the PRTG channel carries; the lookup key names the
 * value lookup that turns the code back into a label and a sensor state.
 */

export const HARDWARE_STATUS_LOOKUP = 'flasharray.hardware.status';
export const DRIVE_STATUS_LOOKUP = 'flasharray.drive.status';

export type HardwareStatus = 'ok' | 'not_installed' | 'identifying' | 'unknown' | 'critical';

export type DriveStatus =
  | 'healthy'
  | 'empty'
  | 'unused'
  | 'updating'
  | 'identifying'
  | 'recovering'
  | 'evacuating'
  | 'unrecognized'
  | 'unhealthy'
  | 'failed';

const HARDWARE_STATUSES: readonly HardwareStatus[] = [
  'ok',
  'not_installed',
  'identifying',
  'unknown',
  'critical',
];

const DRIVE_STATUSES: readonly DriveStatus[] = [
  'healthy',
  'empty',
  'unused',
  'updating',
  'identifying',
  'recovering',
  'evacuating',
  'unrecognized',
  'unhealthy',
  'failed',
];

const assertNever = (value: never): never => {
  throw new Error(`Unhandled status variant: ${String(value)}`);
};

export function parseHardwareStatus(raw: unknown): HardwareStatus {
  const normalized = String(raw ?? '').trim().toLowerCase();
  return HARDWARE_STATUSES.find((s) => s === normalized) ?? 'unknown';
}

export function parseDriveStatus(raw: unknown): DriveStatus {
  const normalized = String(raw ?? '').trim().toLowerCase();
  return DRIVE_STATUSES.find((s) => s === normalized) ?? 'unrecognized';
}

// 0-1 ok, 2 warning, 3+ error in the shipped lookup
export function hardwareStatusCode(status: HardwareStatus): number {
  switch (status) {
    case 'ok':
      return 0;
    case 'not_installed':
      return 1;
    case 'identifying':
      return 2;
    case 'unknown':
      return 3;
    case 'critical':
      return 4;
    default:
      return assertNever(status);
  }
}

// 0-3 ok, 4-6 warning, 7+ error in the shipped lookup
export function driveStatusCode(status: DriveStatus): number {
  switch (status) {
    case 'healthy':
      return 0;
    case 'empty':
      return 1;
    case 'unused':
      return 2;
    case 'updating':
      return 3;
    case 'identifying':
      return 4;
    case 'recovering':
      return 5;
    case 'evacuating':
      return 6;
    case 'unrecognized':
      return 7;
    case 'unhealthy':
      return 8;
    case 'failed':
      return 9;
    default:
      return assertNever(status);
  }
}

export const isDriveFailed = (status: DriveStatus): boolean =>
  status === 'failed' || status === 'unhealthy';
