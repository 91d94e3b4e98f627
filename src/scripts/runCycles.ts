import 'dotenv/config';
import pino from 'pino';
import { bootstrap } from '../bootstrap';
import { loadConfig } from '../config';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

function getArg(name: string, fallback?: string): string | undefined {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

async function main(): Promise<void> {
  const count = Number(getArg('--count', '2'));
  const delayMs = Number(getArg('--delay', '60000'));
  const { runner, store } = await bootstrap(loadConfig());
  try {
    for (let i = 0; i < count; i++) {
      logger.info({ cycle: i + 1, of: count }, 'running cycle');
      const report = await runner.runCycle();
      logger.info({ cycle: i + 1, status: report.status }, 'cycle finished');
      if (i < count - 1) {
        await new Promise((r) => setTimeout(r, delayMs));
      }
    }
  } finally {
    store.close();
  }
  logger.info('runCycles completed');
}

main().catch((err) => {
  logger.error({ err }, 'runCycles failed');
  process.exit(1);
});
