/**
 * Database module - SQLite persistence layer
 *
 * Provides persistent storage for the discharge log
 */

export { createDatabase, type Database } from './database.js';
export {
  createDischargeLogStoreSqlite,
  OUTCOMES,
  type DischargeLogStore,
  type DischargeLogStoreConfig,
  type DischargeDetail,
  type ListOptions,
} from './DischargeLogStoreSqlite.js';
