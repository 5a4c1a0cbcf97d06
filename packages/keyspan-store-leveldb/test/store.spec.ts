/**
 * Tests for the LevelDB engine.
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LevelDBStore } from '../src/store.js';

async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iter) result.push(item);
	return result;
}

describe('LevelDBStore', () => {
	let testDir: string;
	let store: LevelDBStore;

	beforeEach(async () => {
		testDir = path.join(os.tmpdir(), `keyspan-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
		fs.mkdirSync(testDir, { recursive: true });
		store = await LevelDBStore.open({ path: testDir });
	});

	afterEach(async () => {
		await store.close();
		fs.rmSync(testDir, { recursive: true, force: true });
	});

	describe('Basic operations', () => {
		it('should put and get a value', async () => {
			await store.put(new Uint8Array([1, 2, 3]), new Uint8Array([4, 5, 6]));
			const value = await store.get(new Uint8Array([1, 2, 3]));
			expect(value && Array.from(value)).to.deep.equal([4, 5, 6]);
		});

		it('should return undefined for non-existent key', async () => {
			expect(await store.get(new Uint8Array([9]))).to.be.undefined;
		});

		it('should delete a key', async () => {
			const key = new Uint8Array([1]);
			await store.put(key, new Uint8Array([2]));
			await store.delete(key);
			expect(await store.has(key)).to.be.false;
		});
	});

	describe('Iteration', () => {
		beforeEach(async () => {
			for (let i = 1; i <= 5; i++) {
				await store.put(new Uint8Array([i]), new Uint8Array([i * 10]));
			}
		});

		it('should iterate in key order within bounds', async () => {
			const entries = await collect(store.iterate({ gt: new Uint8Array([1]), lte: new Uint8Array([4]) }));
			expect(entries.map(e => e.key[0])).to.deep.equal([2, 3, 4]);
		});

		it('should iterate in reverse with a limit', async () => {
			const entries = await collect(store.iterate({ reverse: true, limit: 2 }));
			expect(entries.map(e => e.key[0])).to.deep.equal([5, 4]);
		});

		it('should release the iterator when abandoned', async () => {
			for await (const entry of store.iterate()) {
				expect(entry.key[0]).to.equal(1);
				break;
			}
			await store.put(new Uint8Array([6]), new Uint8Array([60]));
			const value = await store.get(new Uint8Array([6]));
			expect(value && Array.from(value)).to.deep.equal([60]);
		});
	});

	describe('Batch', () => {
		it('should apply operations atomically on write', async () => {
			await store.put(new Uint8Array([1]), new Uint8Array([1]));
			const batch = store.batch();
			batch.delete(new Uint8Array([1]));
			batch.put(new Uint8Array([2]), new Uint8Array([2]));
			expect(await store.has(new Uint8Array([2]))).to.be.false;
			await batch.write();
			expect(await store.has(new Uint8Array([1]))).to.be.false;
			const value = await store.get(new Uint8Array([2]));
			expect(value && Array.from(value)).to.deep.equal([2]);
		});
	});

	describe('Close', () => {
		it('should reject operations after close', async () => {
			await store.close();
			try {
				await store.get(new Uint8Array([1]));
				expect.fail('should have thrown');
			} catch (e) {
				expect((e as Error).message).to.match(/closed/i);
			}
		});
	});
});
