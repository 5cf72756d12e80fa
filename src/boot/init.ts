/**
 * Service initialization
 */

import { createReportService } from '@features/reports';
import { createDeviceClient } from '@hardware/device-client';
import { createS7Transport } from '@hardware/s7';
import { LOG_LEVELS, NODE_TIMERS, createConsoleSink, createLogger, createSlackSink } from '@logging';
import { createSqliteStore, openDatabase } from '@persistence';
import { createPlantApi } from '@system/api';
import { createPoller } from '@system/poller';
import { createStateStore } from '@system/state';
import { now, sleep } from '@utils/time';

import type { LoggingSettings, PlantConfig } from '$types/config';
import type { Logger, SinkWithLevel } from '@logging';
import type { ValidationIssue } from '@validation';
import type { RuntimeDependencies, Service } from './types';

export const SERVICE_NAME = 'Pump station telemetry';

/**
 * Production collaborators: global console, fetch and setTimeout
 */
export function nodeRuntime(): RuntimeDependencies {
  return {
    consoleApi: console,
    post: fetch,
    timers: NODE_TIMERS,
    clock: function() { return new Date(); }
  };
}

/**
 * Build the logger with a console sink and, when enabled, a Slack sink
 *
 * @param settings - Validated logging settings
 * @param runtime - Console, HTTP and timer implementations
 */
export function createServiceLogger(settings: LoggingSettings, runtime: RuntimeDependencies): Logger {
  const sinks: SinkWithLevel[] = [{
    sink: createConsoleSink(runtime.consoleApi, { timestamps: settings.timestamps }, runtime.clock),
    minLevel: LOG_LEVELS.DEBUG
  }];

  if (settings.slack.enabled) {
    sinks.push({
      sink: createSlackSink(runtime.post, runtime.timers, {
        enabled: true,
        webhookUrl: settings.slack.webhookUrl,
        bufferSize: settings.slack.bufferSize,
        retryDelayMs: settings.slack.retryDelayMs,
        maxRetries: settings.slack.maxRetries
      }),
      minLevel: settings.slack.minLevel
    });
  }

  return createLogger({ level: settings.level, demoteHours: settings.demoteHours }, {
    timeSource: now,
    sinks: sinks
  });
}

/**
 * Wire the service together
 *
 * Opens the database and creates every component. Nothing talks to the
 * controller until the poller runs.
 *
 * @param config - Validated configuration
 * @param runtime - Process-level collaborators
 * @returns Service ready to run
 */
export function initialize(config: PlantConfig, runtime: RuntimeDependencies = nodeRuntime()): Service {
  const logger = createServiceLogger(config.logging, runtime);
  const db = openDatabase(config.databasePath);
  const persistence = createSqliteStore(db, logger);
  const store = createStateStore(config.tags, logger);
  const transport = runtime.transport !== undefined ? runtime.transport : createS7Transport(config.tags.endpoint);
  const client = createDeviceClient(transport);

  const poller = createPoller({
    pollIntervalSec: config.pollIntervalSec,
    maxConnectAttempts: config.maxConnectAttempts
  }, {
    tagMap: config.tags,
    client: client,
    store: store,
    persistence: persistence,
    logger: logger,
    clock: runtime.clock,
    sleep: sleep
  });

  const reports = createReportService(persistence, runtime.clock);
  const api = createPlantApi(config.tags, store, reports);

  return {
    config: config,
    logger: logger,
    store: store,
    persistence: persistence,
    poller: poller,
    api: api,
    close: function() {
      logger.close();
      persistence.close();
    }
  };
}

/**
 * Start the logger and print the startup banner
 *
 * Sink setup problems and configuration warnings are logged after the
 * banner so they are easy to spot.
 *
 * @param service - Initialized service
 * @param warnings - Configuration warnings
 */
export async function announce(service: Service, warnings: ValidationIssue[]): Promise<void> {
  const logger = service.logger;
  const config = service.config;
  const messages = await logger.initialize();

  logger.info('🚀 ' + SERVICE_NAME);
  logger.info('🔌 ' + config.tags.endpoint.host + ':' + config.tags.endpoint.port +
    ' rack ' + config.tags.endpoint.rack + ' slot ' + config.tags.endpoint.slot +
    ' | ⏱️ ' + config.pollIntervalSec + 's | 💾 ' + config.databasePath);
  logger.info('⚙️ Pumps:' + config.tags.pumps.length + ' | Chillers:' + config.tags.chillers.length +
    ' | Slack:' + (config.logging.slack.enabled ? 'ON' : 'OFF') +
    ' | Live:' + (config.live.enabled ? 'ON' : 'OFF'));

  for (const message of messages) {
    if (!message.success) {
      logger.warning(message.message);
    }
  }
  for (const warning of warnings) {
    logger.warning('[' + warning.field + ']: ' + warning.message);
  }
}
