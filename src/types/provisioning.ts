/**
 * Configuration API of the monitoring system, reduced to what sensor
 * reconciliation needs. Every method rejects with a ProvisioningError.
 */
export interface ProvisioningBackend {
  /** Duplicate `templateId` under `parentId`; resolves with the new instance id. */
  clone(templateId: string, name: string, parentId: string): Promise<string>;
  configure(instanceId: string, parameters: string): Promise<void>;
  /** Resume a paused instance (clones start paused). */
  enable(instanceId: string): Promise<void>;
  delete(instanceId: string): Promise<void>;
}
