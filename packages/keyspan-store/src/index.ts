/**
 * Keyspan: a namespaced key-value store with ordered range scans, typed
 * feature columns and creation-order tracking, over a sorted KV engine.
 *
 * Usage:
 *   import { initStore, Op } from '@keyspan/store';
 *
 *   const db = await initStore({
 *     features: [{ name: 'active', type: 'boolean', default: false }],
 *   });
 *   const users = db.namespace('users');
 *   await users.put('ada', { role: 'admin' }, { active: true });
 *   for await (const [key, value] of users.keys(Op.GTE, 'ada', false, 10)) {
 *     console.log(key, value);
 *   }
 *   await db.close();
 *
 * A LevelDB engine lives in @keyspan/store-leveldb.
 */

export * from './common/index.js';
export * from './config/index.js';
