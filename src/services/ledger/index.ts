export { MongoLedgerStore, PAYMENT_SEQUENCE } from './ledger.store';
export { LedgerController } from './ledger.controller';
export { createLedgerRoutes } from './ledger.routes';
