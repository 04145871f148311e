/**
 * Demo run against a live MongoDB replica set:
 * provisions the demo accounts, buys a token for ACC001 and prints its account info.
 */

import { config } from '../config';
import { connectDatabase, disconnectDatabase, syncSchema } from '../config/database';
import { createServiceLogger } from '../observability';
import { MongoDataStore } from '../persistence/mongoDataStore';
import { dispatchOperation } from '../services/token/token.dispatch';
import { TokenLifecycleService } from '../services/token/token.service';

const log = createServiceLogger('demo');

const runDemo = async (): Promise<void> => {
  await connectDatabase();
  await syncSchema();

  const store = new MongoDataStore();
  const lifecycle = new TokenLifecycleService(store);

  for (const { accountNumber, initialBalance } of config.demoAccounts) {
    const outcome = await store.ledger.createAccount(accountNumber, initialBalance);
    log.info({ accountNumber, outcome }, 'Demo account provisioned');
  }

  const generated = await dispatchOperation(lifecycle, {
    operation: 'generate',
    accountNumber: 'ACC001',
    amount: 25.0,
  });
  log.info({ result: generated }, 'generate');

  const info = await dispatchOperation(lifecycle, { operation: 'info', accountNumber: 'ACC001' });
  log.info({ result: info }, 'info');
};

void runDemo()
  .catch((error: unknown) => {
    log.error({ err: error }, 'Demo failed');
    process.exitCode = 1;
  })
  .finally(() =>
    disconnectDatabase().catch((error: unknown) => {
      log.error({ err: error }, 'Disconnect failed');
    })
  );
