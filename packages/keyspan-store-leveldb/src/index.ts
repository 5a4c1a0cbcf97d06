/**
 * LevelDB engine for Keyspan.
 *
 * @example
 * ```typescript
 * import { openLevelDBStore } from '@keyspan/store-leveldb';
 *
 * const db = await openLevelDBStore({ path: './data/kv', ignoreExisting: true });
 * await db.namespace('sessions').put('abc', { user: 7 });
 * await db.close();
 * ```
 */

export { LevelDBStore } from './store.js';
export { openLevelDBStore, openFromConfig, type LevelDBOpenOptions } from './open.js';
