import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { applyFlags, loadConfig } from '../src/config';
import { ConfigError } from '../src/lib/errors';

const BASE_ENV = {
  ARRAY_URL: 'array.example.test',
  ARRAY_API_TOKEN: 'test-token',
  SCOPE: 'capacity',
};

const PRTG_ENV = {
  PRTG_URL: 'https://prtg.example.test/',
  PRTG_API_TOKEN: 'test-prtg-token',
  PRTG_TEMPLATE_ID: '9001',
  PRTG_PARENT_ID: '40',
};

describe('loadConfig', () => {
  it('applies defaults and adds a scheme to the array address', () => {
    const config = loadConfig([], BASE_ENV);

    expect(config).toEqual({
      scope: 'capacity',
      volume: undefined,
      array: {
        url: 'https://array.example.test',
        apiVersion: '1.19',
        credential: { kind: 'token', apiToken: 'test-token' },
        insecureTls: false,
        timeoutMs: 15000,
      },
      thresholds: { capacityWarnPercent: 80, capacityErrorPercent: 90 },
      stateDir: './state',
    });
  });

  it('prefers the API token over username and password', () => {
    const config = loadConfig([], { ...BASE_ENV, ARRAY_USERNAME: 'pureuser', ARRAY_PASSWORD: 'test-secret' });
    expect(config.array.credential).toEqual({ kind: 'token', apiToken: 'test-token' });
  });

  it('accepts username and password without a token', () => {
    const config = loadConfig([], {
      ARRAY_URL: 'http://array.example.test',
      ARRAY_USERNAME: 'pureuser',
      ARRAY_PASSWORD: 'test-secret',
      SCOPE: 'drive',
    });
    expect(config.array.url).toBe('http://array.example.test');
    expect(config.array.credential).toEqual({ kind: 'password', username: 'pureuser', password: 'test-secret' });
  });

  it('lets flags override the environment', () => {
    const config = loadConfig(['--scope=volume', '--volume', 'vol-a', '--host', 'other.example.test'], BASE_ENV);
    expect(config.scope).toBe('volume');
    expect(config.volume).toBe('vol-a');
    expect(config.array.url).toBe('https://other.example.test');
  });

  it('reads PRTG settings for volume management', () => {
    const config = loadConfig(['-s', 'volume-management'], { ...BASE_ENV, ...PRTG_ENV });
    expect(config.prtg).toEqual({
      url: 'https://prtg.example.test',
      credential: { kind: 'token', apiToken: 'test-prtg-token' },
      templateId: '9001',
      parentId: '40',
      sensorName: 'Volume {volume}',
      sensorParams: '--scope=volume --volume={volume}',
      insecureTls: false,
    });
  });

  it('leaves PRTG settings out for the metric scopes', () => {
    expect(loadConfig([], { ...BASE_ENV, ...PRTG_ENV }).prtg).toBeUndefined();
  });

  it.each([
    ['no array address', { ...BASE_ENV, ARRAY_URL: '' }, 'Missing required parameter ARRAY_URL'],
    ['no scope', { ...BASE_ENV, SCOPE: undefined }, 'Missing required parameter SCOPE'],
    [
      'an unknown scope',
      { ...BASE_ENV, SCOPE: 'latency' },
      "Unknown scope 'latency', expected one of capacity, performance, hardware, drive, volume, volume-management",
    ],
    ['volume scope without a volume', { ...BASE_ENV, SCOPE: 'volume' }, 'Scope volume requires VOLUME (--volume)'],
    [
      'no credential',
      { ARRAY_URL: 'array.example.test', SCOPE: 'capacity' },
      'Either ARRAY_API_TOKEN or ARRAY_USERNAME/ARRAY_PASSWORD is required',
    ],
    [
      'a username without a password',
      { ARRAY_URL: 'array.example.test', SCOPE: 'capacity', ARRAY_USERNAME: 'pureuser' },
      'ARRAY_USERNAME and ARRAY_PASSWORD must be set together',
    ],
    [
      'a non-numeric timeout',
      { ...BASE_ENV, HTTP_TIMEOUT_MS: 'soon' },
      'HTTP_TIMEOUT_MS must be a number',
    ],
    [
      'volume management without a template',
      { ...BASE_ENV, ...PRTG_ENV, SCOPE: 'volume-management', PRTG_TEMPLATE_ID: undefined },
      'Missing required parameter PRTG_TEMPLATE_ID',
    ],
    [
      'volume management without a PRTG credential',
      { ...BASE_ENV, ...PRTG_ENV, SCOPE: 'volume-management', PRTG_API_TOKEN: undefined },
      'Either PRTG_API_TOKEN or PRTG_USERNAME/PRTG_PASSHASH is required',
    ],
  ])('rejects %s', (_label, env, message) => {
    expect(() => loadConfig([], env)).toThrow(new ConfigError(message));
  });

  it('turns an unknown flag into a ConfigError', () => {
    expect(() => loadConfig(['--colour'], BASE_ENV)).toThrow(ConfigError);
  });
});

describe('applyFlags', () => {
  it('maps flags onto their environment names', () => {
    expect(applyFlags(['--template-id', '7', '--state-dir=/var/lib/sensors'], {})).toEqual({
      PRTG_TEMPLATE_ID: '7',
      STATE_DIR: '/var/lib/sensors',
    });
  });
});

describe('.env file', () => {
  const LOG_VARS = ['LOG_ENABLED', 'LOG_LEVEL', 'LOG_JSON', 'LOG_SERVICE_NAME'];
  let saved: Record<string, string | undefined>;
  let cwd: string;
  let tmpDir: string;

  beforeEach(() => {
    saved = Object.fromEntries(LOG_VARS.map((name) => [name, process.env[name]]));
    LOG_VARS.forEach((name) => delete process.env[name]);
    cwd = process.cwd();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dotenv-test-'));
    fs.writeFileSync(path.join(tmpDir, '.env'), 'LOG_ENABLED=1\nLOG_LEVEL=debug\n');
    process.chdir(tmpDir);
  });

  afterEach(() => {
    process.chdir(cwd);
    fs.rmSync(tmpDir, { recursive: true, force: true });
    for (const [name, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    jest.restoreAllMocks();
  });

  it('is loaded before the logger reads its settings', async () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await jest.isolateModulesAsync(async () => {
      await import('../src/config');
      const { default: logger } = await import('../src/lib/logger');
      logger.debug('written after .env');
    });

    const lines = stderr.mock.calls
      .map(([chunk]) => String(chunk))
      .filter((line) => line.includes('written after .env'));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[[^\]]+\] \[DEBUG\] written after \.env\n$/);
  });
});
