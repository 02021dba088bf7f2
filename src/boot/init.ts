/**
 * Runtime initialization
 */

import { loadReportConfig } from './config';
import type { ConfigOverrides, LoadedConfig } from './config';
import { createConsoleSink, createLogger, levelFromName, LOG_LEVELS } from '../logging';
import type { ConsoleAPI } from '../logging';
import { ConfigValidationError } from '../types/errors';
import type { RawEnv } from '../validation/types';
import type { Runtime } from './types';

export function initialize(env: RawEnv, overrides: ConfigOverrides, consoleApi: ConsoleAPI): Runtime | null {
  let loaded: LoadedConfig;
  try {
    loaded = loadReportConfig(env, overrides);
  } catch (err) {
    if (!(err instanceof ConfigValidationError)) {
      throw err;
    }
    consoleApi.error('INIT FAIL: Invalid configuration');
    err.issues.forEach(function (issue) {
      consoleApi.error('  [' + issue.field + ']: ' + issue.message);
    });
    return null;
  }

  const config = loaded.config;

  // Setup logging
  const consoleSink = createConsoleSink(consoleApi, { colors: config.colors });

  const logger = createLogger({
    level: levelFromName(config.logLevel, LOG_LEVELS)
  }, {
    sinks: [consoleSink],
    fallback: consoleApi
  }, LOG_LEVELS);

  loaded.warnings.forEach(function (warn) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  });

  logger.debug(
    'Config: log=' + config.logLevel + ' | zone=' + config.timeZone +
    ' | parallel=' + (config.parallel ? 'ON' : 'OFF')
  );

  return { config: config, logger: logger };
}
