import 'dotenv/config';
import { createSqliteStore, DEFAULT_DB_PATH } from '../db';

async function main(): Promise<void> {
  const store = await createSqliteStore(process.env.DB_PATH ?? DEFAULT_DB_PATH);
  const rows = store.recentOrders(50);
  store.close();
  if (!rows.length) {
    console.log('No orders recorded yet. Run a cycle first.');
    return;
  }
  console.table(
    rows.map((r) => ({
      TS: new Date(r.ts).toISOString(),
      Symbol: r.symbol,
      Side: r.side,
      Qty: r.qty,
      Status: r.status,
      OrderId: r.orderId ?? '',
    })),
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
