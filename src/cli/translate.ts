import { runTranslateCommand } from './translateCommand';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

process.exitCode = await runTranslateCommand(process.argv.slice(2), { signal: controller.signal });
