import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import https from 'https';
import type { PrtgCredential } from '../config';
import { ProvisioningError, ProvisioningOperation, errorMessage } from '../lib/errors';
import type { ProvisioningBackend } from '../types/provisioning';
import logger from '../lib/logger';

const log = logger.child('prtg');

export type PrtgApiOptions = {
  baseUrl: string;
  credential: PrtgCredential;
  allowInsecureTls?: boolean;
  timeoutMs?: number;
  // Transport override, used to run the client without a network.
  adapter?: AxiosRequestConfig['adapter'];
};

const NEW_ID_PATTERN = /[?&]id=(\d+)/;

/**
 * Parse the id of a duplicated object from the redirect PRTG answers with,
 * e.g. `/sensor.htm?id=2345`.
 */
export function parseNewObjectId(location: unknown): string | null {
  if (typeof location !== 'string') return null;
  const match = NEW_ID_PATTERN.exec(location);
  return match ? match[1] : null;
}

/**
 * PRTG HTTP API client. Calls go out one at a time; redirects are not
 * followed because the clone answer carries the new id in `Location`.
 */
export class PrtgApi implements ProvisioningBackend {
  private readonly client: AxiosInstance;
  private readonly credential: PrtgCredential;

  constructor(options: PrtgApiOptions) {
    this.credential = options.credential;

    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: `${options.baseUrl.replace(/\/$/, '')}/api`,
      timeout: options.timeoutMs ?? 15_000,
      httpsAgent,
      adapter: options.adapter,
      maxRedirects: 0,
      validateStatus: (status) => status >= 200 && status < 400,
    });
  }

  private authParams(): Record<string, string> {
    if (this.credential.kind === 'token') {
      return { apitoken: this.credential.apiToken };
    }
    return { username: this.credential.username, passhash: this.credential.passhash };
  }

  private async call(
    operation: ProvisioningOperation,
    path: string,
    params: Record<string, string>,
    instanceId?: string
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.client.get<unknown>(path, {
        params: { ...params, ...this.authParams() },
      });
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const reason = status !== undefined ? `HTTP ${status}` : errorMessage(err);
      throw new ProvisioningError(operation, `PRTG ${operation} failed: ${reason}`, {
        cause: err,
        status,
        instanceId,
      });
    }
  }

  async clone(templateId: string, name: string, parentId: string): Promise<string> {
    const res = await this.call('clone', '/duplicateobject.htm', {
      id: templateId,
      name,
      targetid: parentId,
    });
    const location: unknown = res.headers.location;
    const newId = parseNewObjectId(location);
    if (!newId) {
      throw new ProvisioningError('clone', 'PRTG clone answered without a new object id', {
        status: res.status,
      });
    }
    log.debug('cloned object', { templateId, parentId, name, newId });
    return newId;
  }

  async configure(instanceId: string, parameters: string): Promise<void> {
    await this.call(
      'configure',
      '/setobjectproperty.htm',
      { id: instanceId, name: 'params', value: parameters },
      instanceId
    );
  }

  async enable(instanceId: string): Promise<void> {
    await this.call('enable', '/pause.htm', { id: instanceId, action: '1' }, instanceId);
  }

  async delete(instanceId: string): Promise<void> {
    await this.call('delete', '/deleteobject.htm', { id: instanceId, approve: '1' }, instanceId);
  }
}
