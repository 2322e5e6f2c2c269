export {
  PostgresMinerKeyStore,
  PostgresLedgerStore,
  PostgresTaskDirectory,
  createPostgresStoresFromPool,
  registerMiner,
} from './persistence.js';
export type { PostgresStores } from './persistence.js';
