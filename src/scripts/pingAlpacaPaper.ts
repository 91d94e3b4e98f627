import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from '../config';
import { createAlpacaGateway } from '../exchanges/alpaca';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const haveKeys = Boolean(process.env.ALPACA_API_KEY_ID && process.env.ALPACA_API_SECRET_KEY);
  if (!haveKeys) {
    logger.warn('No Alpaca keys in env; create a paper key in dashboard and set .env');
    return;
  }
  const cfg = loadConfig();
  const gateway = createAlpacaGateway(cfg.alpaca);
  const { symbol, longWindow } = cfg.strategy;
  const account = await gateway.getAccount();
  const open = await gateway.isMarketOpen();
  const position = await gateway.getPosition(symbol);
  const prices = await gateway.getTrailingPrices(symbol, longWindow);
  logger.info(
    {
      account: account.accountNumber,
      equity: account.equity,
      marketOpen: open,
      quantity: position.quantity,
      bars: prices.length,
      lastPrice: prices.at(-1)?.price,
    },
    'alpaca paper reachable',
  );
}

main().catch((err) => {
  logger.error({ err }, 'alpaca ping failed');
  process.exit(1);
});
