import { installConsoleTimestamps } from './utils/setup-logging';
import { initializeConfig, getConfig } from './utils/config';
import { logger } from './utils/logger';
import {
  AlertDecisionPipeline,
  AlertManager,
  AppConfig,
  IAlertSink,
  MarketScanner,
  RealtimeWebSocketClient,
  TelegramSink,
  TickFlowMonitor,
  UltraMsgSink,
} from './services';

async function bootstrap(): Promise<void> {
  await initializeConfig();
  const config = getConfig();

  installConsoleTimestamps(config.alertTimeZone);
  logger.setLevel(config.logLevel);
  logger.info('OI flow scanner - starting up');

  const alertManager = new AlertManager(createSinks(config));
  logger.info(`Alert channels: ${alertManager.getSinkNames().join(', ')}`);

  const pipeline = new AlertDecisionPipeline({
    symbols: config.symbols,
    underlyings: config.underlyings,
    defaultLotSize: config.defaultLotSize,
    buckets: config.buckets,
    oiRocThreshold: config.oiRocThreshold,
    minAlertLots: config.minAlertLots,
    atmBandFraction: config.atmBandFraction,
    timeZone: config.alertTimeZone,
    dispatcher: alertManager,
  });

  const client = new RealtimeWebSocketClient({
    url: config.websocketUrl,
    apiKey: config.apiKey,
    exchange: config.exchange,
  });

  const tickMonitor = new TickFlowMonitor({
    staleThresholdMs: config.tickStaleThresholdMs,
    checkIntervalMs: 60 * 1000,
    sleepThresholdMs: 2 * 60 * 1000,
  });

  const scanner = new MarketScanner({ client, pipeline, alertManager, tickMonitor });

  bindScannerEvents(scanner, pipeline, alertManager);
  setupProcessHandlers({ scanner, alertManager });

  await scanner.start();
  logger.info('OI flow scanner is running');
}

function createSinks(config: AppConfig): IAlertSink[] {
  const options = {
    timeoutMs: config.dispatchTimeoutMs,
    maxRetries: config.dispatchMaxRetries,
    retryDelayMs: config.dispatchRetryDelayMs,
  };

  const sinks: IAlertSink[] = [];
  if (config.telegram) {
    sinks.push(new TelegramSink(config.telegram, options));
  }
  if (config.ultraMsg) {
    sinks.push(new UltraMsgSink(config.ultraMsg, options));
  }
  return sinks;
}

function bindScannerEvents(
  scanner: MarketScanner,
  pipeline: AlertDecisionPipeline,
  alertManager: AlertManager
): void {
  scanner.on('error', (error) => logger.error('Scanner error event received', error));
  scanner.on('restarted', (reason) => logger.info(`Feed restarted (${reason})`));
  pipeline.on('futurePrice', ({ underlying, message }) =>
    logger.debug(`Future price update for ${underlying}\n${message}`)
  );
  pipeline.on('suppressed', ({ symbol, gate }) => logger.debug(`${symbol}: suppressed at ${gate}`));
  alertManager.on('dispatchFailed', ({ sink, error }) =>
    logger.warn(`Alert delivery via ${sink} failed: ${error.message}`)
  );
}

function setupProcessHandlers(params: { scanner: MarketScanner; alertManager: AlertManager }): void {
  const { scanner, alertManager } = params;
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info(`Shutdown initiated by signal: ${signal}`);

    try {
      await scanner.stop(`received ${signal}`);
    } catch (error) {
      logger.error('Error while stopping scanner', error);
    }

    logger.info('Scanner shutdown complete');
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', reason);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    void alertManager
      .sendScannerCrashed(error)
      .catch((notifyError) => logger.error('Failed to send crash notification', notifyError))
      .finally(() => process.exit(1));
  });
}

void bootstrap().catch((error) => {
  logger.error('Fatal error during scanner bootstrap', error);
  process.exit(1);
});
