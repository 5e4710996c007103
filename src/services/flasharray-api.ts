import axios, { AxiosInstance, AxiosRequestConfig, Method } from 'axios';
import https from 'https';
import type { Credential } from '../config';
import { ArrayQueryFailure, AuthFailure, errorMessage } from '../lib/errors';
import { isRecord, toText } from '../lib/parse';
import logger from '../lib/logger';

const log = logger.child('flasharray');

export type FlashArrayApiOptions = {
  baseUrl: string;
  apiVersion: string;
  credential: Credential;
  allowInsecureTls?: boolean;
  timeoutMs?: number;
  // Transport override, used to run the client without a network.
  adapter?: AxiosRequestConfig['adapter'];
};

const statusOf = (err: unknown): number | undefined =>
  axios.isAxiosError(err) ? err.response?.status : undefined;

const describeFailure = (err: unknown): string => {
  if (axios.isAxiosError(err) && err.response) {
    const data: unknown = err.response.data;
    const detail = Array.isArray(data) && isRecord(data[0]) ? toText(data[0].msg) : '';
    return detail ? `HTTP ${err.response.status}: ${detail}` : `HTTP ${err.response.status}`;
  }
  return errorMessage(err);
};

/**
 * Read-only client for the FlashArray REST 1.x API.
 * One session per instance: the first query logs in, `logout()` closes it.
 */
export class FlashArrayApi {
  private readonly client: AxiosInstance;
  private readonly credential: Credential;
  private loginPromise?: Promise<void>;

  constructor(options: FlashArrayApiOptions) {
    this.credential = options.credential;

    const httpsAgent = options.allowInsecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.client = axios.create({
      baseURL: `${options.baseUrl.replace(/\/$/, '')}/api/${options.apiVersion}`,
      timeout: options.timeoutMs ?? 15_000,
      httpsAgent,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
    });
  }

  private async issueApiToken(username: string, password: string): Promise<string> {
    const res = await this.client.post<unknown>('/auth/apitoken', { username, password });
    const token = isRecord(res.data) ? toText(res.data.api_token) : '';
    if (!token) {
      throw new AuthFailure('Array did not return an API token for the given username');
    }
    return token;
  }

  private async login(): Promise<void> {
    try {
      const apiToken =
        this.credential.kind === 'token'
          ? this.credential.apiToken
          : await this.issueApiToken(this.credential.username, this.credential.password);

      const res = await this.client.post<unknown>('/auth/session', { api_token: apiToken });
      const setCookie: unknown = res.headers['set-cookie'];
      const cookies = Array.isArray(setCookie)
        ? setCookie.map((cookie) => String(cookie).split(';')[0])
        : [];
      if (cookies.length === 0) {
        throw new AuthFailure('Array did not return a session cookie');
      }
      this.client.defaults.headers.common.Cookie = cookies.join('; ');
      log.debug('session opened', { user: isRecord(res.data) ? res.data.username : undefined });
    } catch (err) {
      if (err instanceof AuthFailure) throw err;
      throw new AuthFailure(`Array authentication failed: ${describeFailure(err)}`, {
        cause: err,
        status: statusOf(err),
      });
    }
  }

  private async ensureLogin(): Promise<void> {
    if (!this.loginPromise) {
      this.loginPromise = this.login();
    }
    return this.loginPromise;
  }

  private async request(method: Method, url: string): Promise<unknown> {
    await this.ensureLogin();
    try {
      const res = await this.client.request<unknown>({ method, url });
      return res.data;
    } catch (err) {
      throw new ArrayQueryFailure(`Array query ${method} ${url} failed: ${describeFailure(err)}`, {
        cause: err,
        status: statusOf(err),
      });
    }
  }

  /**
   * Close the session if one was opened. Never throws.
   */
  async logout(): Promise<void> {
    if (!this.loginPromise) return;
    const opened = await this.loginPromise.then(
      () => true,
      () => false
    );
    if (!opened) return;
    try {
      await this.client.delete('/auth/session');
    } catch (err) {
      log.warn('failed to close array session', { err: describeFailure(err) });
    }
  }

  // ---- Array ----

  async getArray(): Promise<unknown> {
    return this.request('GET', '/array');
  }

  async getArraySpace(): Promise<unknown> {
    return this.request('GET', '/array?space=true');
  }

  async getArrayPerformance(): Promise<unknown> {
    return this.request('GET', '/array?action=monitor');
  }

  // ---- Components ----

  async getHardware(): Promise<unknown> {
    return this.request('GET', '/hardware');
  }

  async getDrives(): Promise<unknown> {
    return this.request('GET', '/drive');
  }

  // ---- Volumes ----

  async getVolumes(): Promise<unknown> {
    return this.request('GET', '/volume');
  }

  async getVolumeSpace(name: string): Promise<unknown> {
    return this.request('GET', `/volume/${encodeURIComponent(name)}?space=true`);
  }

  async getVolumePerformance(name: string): Promise<unknown> {
    return this.request('GET', `/volume/${encodeURIComponent(name)}?action=monitor`);
  }
}
