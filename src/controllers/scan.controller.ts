import type { Config, Scope } from '../config';
import { ConfigError, ConnectorError, EXIT_OK, EXIT_SYSTEM_ERROR, errorMessage } from '../lib/errors';
import {
  errorEnvelope,
  formatCapacity,
  formatDrives,
  formatHardware,
  formatPerformance,
  formatVolume,
  resultEnvelope,
  scanStatus,
  type UsageLimits,
} from '../lib/formatter';
import { SensorStore } from '../services/sensor-store';
import type { Envelope, ResultEnvelope } from '../types/prtg';
import type { ProvisioningBackend } from '../types/provisioning';
import type { MetricsController } from './metrics.controller';
import { ReconciliationReport, VolumeReconciler } from './volume-reconciler';
import logger from '../lib/logger';

const log = logger.child('scan');

export type ScanResult = {
  envelope: Envelope;
  exitCode: number;
};

export function summarizeReport(report: ReconciliationReport): string {
  const count = (kind: string) =>
    report.outcomes.filter((o) => o.kind === kind && o.ok).length;
  const failed = report.outcomes.filter((o) => !o.ok).length;
  return `created=${count('create')} deleted=${count('delete')} repaired=${count('repair')} failed=${failed}`;
}

/**
 * Runs one scope and turns the outcome into the single document PRTG reads.
 */
export class ScanController {
  constructor(
    private readonly config: Config,
    private readonly metrics: MetricsController,
    private readonly backend?: ProvisioningBackend
  ) {}

  async run(): Promise<ScanResult> {
    try {
      const envelope = await this.handle(this.config.scope);
      return { envelope, exitCode: EXIT_OK };
    } catch (err) {
      return this.fail(err);
    }
  }

  private get limits(): UsageLimits {
    return {
      warnPercent: this.config.thresholds.capacityWarnPercent,
      errorPercent: this.config.thresholds.capacityErrorPercent,
    };
  }

  private async handle(scope: Scope): Promise<ResultEnvelope> {
    switch (scope) {
      case 'capacity':
        return resultEnvelope(formatCapacity(await this.metrics.capacity(), this.limits));
      case 'performance':
        return resultEnvelope(formatPerformance(await this.metrics.performance()));
      case 'hardware':
        return resultEnvelope(formatHardware(await this.metrics.hardware()));
      case 'drive':
        return resultEnvelope(formatDrives(await this.metrics.drives()));
      case 'volume':
        return this.handleVolume();
      case 'volume-management':
        return this.handleVolumeManagement();
    }
  }

  private async handleVolume(): Promise<ResultEnvelope> {
    const name = this.config.volume;
    if (!name) {
      throw new ConfigError('Scope volume requires a volume name');
    }
    const { space, performance } = await this.metrics.volume(name);
    return resultEnvelope(formatVolume(space, performance, this.limits));
  }

  /**
   * volume-management flow:
   * - Resolve the array name, which keys the sensor store file
   * - Reconcile array volumes against the store through the PRTG API
   * - Report a completed run as Scan Status 1, whatever single actions did
   */
  private async handleVolumeManagement(): Promise<ResultEnvelope> {
    const prtg = this.config.prtg;
    if (!prtg || !this.backend) {
      throw new ConfigError('Scope volume-management requires the PRTG connection settings');
    }

    const info = await this.metrics.arrayInfo();
    const store = new SensorStore(this.config.stateDir, info.name);
    const reconciler = new VolumeReconciler(this.metrics, store, this.backend, {
      templateId: prtg.templateId,
      parentId: prtg.parentId,
      nameTemplate: prtg.sensorName,
      paramsTemplate: prtg.sensorParams,
    });

    const report = await reconciler.reconcile();
    const summary = summarizeReport(report);
    log.info('reconciliation finished', { array: info.name, store: store.filePath, summary });
    return resultEnvelope([scanStatus()], summary);
  }

  private fail(err: unknown): ScanResult {
    const message = errorMessage(err);
    log.error('scan failed', { scope: this.config.scope, err });
    return {
      envelope: errorEnvelope(message),
      exitCode: err instanceof ConnectorError ? err.exitCode : EXIT_SYSTEM_ERROR,
    };
  }
}
