import { parseArgs } from 'util';
import { t } from '@/i18n';
import { loadSettings } from '@/config';
import { createTranslationServer, listen } from '@/delivery/http';
import { toDeliveryError } from '@/delivery/translateSubtitle';
import { createTranslatorService } from '@/services/translator/TranslatorService';
import { logger } from '@/services/utils/logger';
import { bootstrap } from './bootstrap';

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      config: { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(t('cli.serveUsage'));
    return 0;
  }

  const settings = loadSettings({
    configPath: values.config,
    overrides: {
      host: values.host,
      port: values.port === undefined ? undefined : Number(values.port),
      logLevel: values['log-level'],
    },
  });
  await bootstrap(settings);

  const server = createTranslationServer({ resolver: createTranslatorService(settings), settings });
  const address = await listen(server, settings.port, settings.host);
  logger.info(t('cli.listening', { host: address.address, port: address.port }));

  const shutdown = () => {
    logger.info(t('cli.shuttingDown'));
    server.close();
    server.closeAllConnections();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return 0;
}

try {
  process.exitCode = await main();
} catch (error) {
  const failure = toDeliveryError(error);
  console.error(t('cli.failure', { kind: failure.kind, message: failure.message }));
  process.exitCode = 1;
}
