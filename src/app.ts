#!/usr/bin/env node
// must stay the first import: it loads .env before the logger reads LOG_*
import { Config, loadConfig } from './config';
import { MetricsController } from './controllers/metrics.controller';
import { ScanController, ScanResult } from './controllers/scan.controller';
import { ConnectorError, EXIT_SYSTEM_ERROR, errorMessage } from './lib/errors';
import { errorEnvelope } from './lib/formatter';
import { FlashArrayApi } from './services/flasharray-api';
import { PrtgApi } from './services/prtg-api';
import logger from './lib/logger';

async function scan(config: Config): Promise<ScanResult> {
  const arrayApi = new FlashArrayApi({
    baseUrl: config.array.url,
    apiVersion: config.array.apiVersion,
    credential: config.array.credential,
    allowInsecureTls: config.array.insecureTls,
    timeoutMs: config.array.timeoutMs,
  });

  const prtgApi = config.prtg
    ? new PrtgApi({
        baseUrl: config.prtg.url,
        credential: config.prtg.credential,
        allowInsecureTls: config.prtg.insecureTls,
        timeoutMs: config.array.timeoutMs,
      })
    : undefined;

  const controller = new ScanController(config, new MetricsController(arrayApi), prtgApi);
  try {
    return await controller.run();
  } finally {
    await arrayApi.logout();
  }
}

async function main(): Promise<void> {
  let result: ScanResult;
  try {
    const config = loadConfig();
    logger.debug('starting scan', { scope: config.scope, array: config.array.url });
    result = await scan(config);
  } catch (err) {
    logger.error('invocation failed', { err });
    result = {
      envelope: errorEnvelope(errorMessage(err)),
      exitCode: err instanceof ConnectorError ? err.exitCode : EXIT_SYSTEM_ERROR,
    };
  }

  process.stdout.write(`${JSON.stringify(result.envelope)}\n`);
  process.exitCode = result.exitCode;
}

void main();
