import mongoose, { Connection } from 'mongoose';
import { MongoLedgerStore } from '../services/ledger/ledger.store';
import { MongoTokenRegistry, TokenRegistryOptions } from '../services/token/token.registry';
import { DataStore, StoreScope } from '../types/store';

export interface MongoDataStoreOptions {
  connection?: Connection;
  tokens?: TokenRegistryOptions;
}

/**
 * DataStore over the shared mongoose connection pool.
 *
 * Each transaction takes its own session and ends it on every exit path.
 * withTransaction retries TransientTransactionError (write conflicts on
 * the account or counter documents) and commits or aborts as a whole.
 */
export class MongoDataStore implements DataStore {
  readonly ledger: MongoLedgerStore;
  readonly tokens: MongoTokenRegistry;
  private readonly connection: Connection;
  private readonly tokenOptions: TokenRegistryOptions;

  constructor(options: MongoDataStoreOptions = {}) {
    this.connection = options.connection ?? mongoose.connection;
    this.tokenOptions = options.tokens ?? {};
    this.ledger = new MongoLedgerStore();
    this.tokens = new MongoTokenRegistry(null, this.tokenOptions);
  }

  async transaction<T>(work: (scope: StoreScope) => Promise<T>): Promise<T> {
    const session = await this.connection.startSession();
    try {
      return await session.withTransaction(() =>
        work({
          ledger: new MongoLedgerStore(session),
          tokens: new MongoTokenRegistry(session, this.tokenOptions),
        })
      );
    } finally {
      await session.endSession();
    }
  }
}
