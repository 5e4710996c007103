import { ProvisioningError, errorMessage } from '../lib/errors';
import { isStorableVolumeName, type SensorRecord, type SensorStore } from '../services/sensor-store';
import type { ProvisioningBackend } from '../types/provisioning';
import logger from '../lib/logger';

const log = logger.child('reconciler');

export type SensorRef = { volumeName: string; instanceId: string };

export type ReconciliationPlan = {
  creates: string[];
  deletes: SensorRef[];
  // matched volumes whose sensor was cloned but never fully configured
  repairs: SensorRef[];
};

export type ActionKind = 'create' | 'delete' | 'repair';

export type ActionOutcome = {
  kind: ActionKind;
  volumeName: string;
  instanceId?: string;
  ok: boolean;
  error?: string;
};

export type ReconciliationReport = {
  plan: ReconciliationPlan;
  outcomes: ActionOutcome[];
};

export type SensorTemplate = {
  templateId: string;
  parentId: string;
  // `{volume}` is replaced by the volume name
  nameTemplate: string;
  paramsTemplate: string;
};

export interface VolumeSource {
  listVolumeNames(): Promise<string[]>;
}

const fill = (template: string, volumeName: string): string =>
  template.split('{volume}').join(volumeName);

export const isEmptyPlan = (plan: ReconciliationPlan): boolean =>
  plan.creates.length === 0 && plan.deletes.length === 0 && plan.repairs.length === 0;

/**
 * Diff the array's volumes against the provisioned sensors.
 * Array names are deduplicated, first occurrence wins the order. Names the
 * store file cannot hold are skipped with a warning.
 */
export function planReconciliation(
  volumeNames: readonly string[],
  known: ReadonlyMap<string, SensorRecord>
): ReconciliationPlan {
  const unmatched = new Map(known);
  const seen = new Set<string>();
  const plan: ReconciliationPlan = { creates: [], deletes: [], repairs: [] };

  for (const name of volumeNames) {
    if (seen.has(name)) continue;
    seen.add(name);
    if (!isStorableVolumeName(name)) {
      log.warn('skipping volume with a name the sensor store cannot hold', { volumeName: name });
      continue;
    }

    const record = known.get(name);
    if (!record) {
      plan.creates.push(name);
      continue;
    }
    unmatched.delete(name);
    if (!record.configured) {
      plan.repairs.push({ volumeName: name, instanceId: record.instanceId });
    }
  }

  for (const [volumeName, record] of unmatched) {
    plan.deletes.push({ volumeName, instanceId: record.instanceId });
  }

  return plan;
}

/**
 * Keeps one monitoring sensor per array volume.
 * Provisioning failures stay local to their action; store failures are fatal.
 */
export class VolumeReconciler {
  constructor(
    private readonly volumes: VolumeSource,
    private readonly store: SensorStore,
    private readonly backend: ProvisioningBackend,
    private readonly template: SensorTemplate
  ) {}

  async reconcile(): Promise<ReconciliationReport> {
    // Query the array first so a failed query leaves the store file untouched.
    const volumeNames = await this.volumes.listVolumeNames();
    const known = await this.store.load();
    const plan = planReconciliation(volumeNames, known);

    log.info('reconciliation planned', {
      volumes: volumeNames.length,
      known: known.size,
      creates: plan.creates,
      deletes: plan.deletes,
      repairs: plan.repairs,
    });

    const outcomes: ActionOutcome[] = [];
    for (const volumeName of plan.creates) {
      outcomes.push(await this.create(volumeName));
    }
    for (const ref of plan.deletes) {
      outcomes.push(await this.delete(ref));
    }
    for (const ref of plan.repairs) {
      outcomes.push(await this.repair(ref));
    }

    return { plan, outcomes };
  }

  private async create(volumeName: string): Promise<ActionOutcome> {
    const { templateId, parentId, nameTemplate } = this.template;
    let instanceId: string;
    try {
      instanceId = await this.backend.clone(templateId, fill(nameTemplate, volumeName), parentId);
    } catch (err) {
      return this.failed('create', volumeName, undefined, err);
    }

    // Record before configuring: a crash from here on must not orphan the clone.
    await this.store.put(volumeName, instanceId, false);
    log.info('sensor cloned', { volumeName, instanceId });

    return this.configure('create', { volumeName, instanceId });
  }

  private async delete(ref: SensorRef): Promise<ActionOutcome> {
    try {
      await this.backend.delete(ref.instanceId);
    } catch (err) {
      return this.failed('delete', ref.volumeName, ref.instanceId, err);
    }
    await this.store.remove(ref.volumeName);
    log.info('sensor deleted', { ...ref });
    return { kind: 'delete', ...ref, ok: true };
  }

  private async repair(ref: SensorRef): Promise<ActionOutcome> {
    log.info('retrying configuration of pending sensor', { ...ref });
    return this.configure('repair', ref);
  }

  private async configure(kind: 'create' | 'repair', ref: SensorRef): Promise<ActionOutcome> {
    try {
      await this.backend.configure(ref.instanceId, fill(this.template.paramsTemplate, ref.volumeName));
      await this.backend.enable(ref.instanceId);
    } catch (err) {
      return this.failed(kind, ref.volumeName, ref.instanceId, err);
    }
    await this.store.put(ref.volumeName, ref.instanceId, true);
    log.info('sensor configured', { ...ref });
    return { kind, ...ref, ok: true };
  }

  private failed(
    kind: ActionKind,
    volumeName: string,
    instanceId: string | undefined,
    err: unknown
  ): ActionOutcome {
    if (!(err instanceof ProvisioningError)) throw err;
    log.warn(`${kind} failed, will retry on next run`, {
      volumeName,
      instanceId,
      operation: err.operation,
      status: err.status,
      error: err.message,
    });
    return { kind, volumeName, instanceId, ok: false, error: errorMessage(err) };
  }
}
