/**
 * Tests for anchored range scans by key and by creation timestamp.
 */

import { expect } from 'chai';
import { KeyNotFoundError } from '../src/common/errors.js';
import { initStore } from '../src/common/init.js';
import { Op } from '../src/common/range-scan.js';
import type { Store } from '../src/common/store.js';
import { collect, collectKeys, collectValues } from './helpers.js';

describe('range scans', () => {
	let db: Store;

	beforeEach(async () => {
		db = await initStore();
	});

	afterEach(async () => {
		await db.close();
	});

	describe('by key', () => {
		beforeEach(async () => {
			for (let i = 0; i < 10; i++) {
				await db.put(`base:${i}`, i);
			}
		});

		it('GT excludes the anchor and ascends', async () => {
			const entries = await collect(db.keys(Op.GT, 'base:5', 'base:'));
			expect(entries).to.deep.equal([
				['base:6', 6],
				['base:7', 7],
				['base:8', 8],
				['base:9', 9],
			]);
		});

		it('GTE includes the anchor', async () => {
			expect(await collectValues(db.keys(Op.GTE, 'base:5', 'base:'))).to.deep.equal([5, 6, 7, 8, 9]);
		});

		it('LTE includes the anchor and descends', async () => {
			expect(await collectValues(db.keys(Op.LTE, 'base:5', 'base:', false, 4))).to.deep.equal([5, 4, 3, 2]);
		});

		it('LT returns the closest entry below with limit 1', async () => {
			expect(await collectValues(db.keys('<', 'base:3', 'base:', false, 1))).to.deep.equal([2]);
		});

		it('LT from the first key is empty', async () => {
			expect(await collect(db.keys(Op.LT, 'base:0', 'base:'))).to.deep.equal([]);
		});

		it('limit 0 yields nothing', async () => {
			expect(await collect(db.keys(Op.GTE, 'base:0', 'base:', false, 0))).to.deep.equal([]);
		});

		it('compares keys by bytes', async () => {
			await db.put('base:10', 10);
			expect(await collectKeys(db.keys(Op.GT, 'base:1', 'base:', false, 2))).to.deep.equal(['base:10', 'base:2']);
		});

		it('never leaves the namespace mask', async () => {
			await db.put('basement', 'x');
			await db.put('a', 'before');
			await db.put('z', 'after');
			expect(await collectKeys(db.keys(Op.GT, 'base:8', 'base:'))).to.deep.equal(['base:9']);
			expect(await collectKeys(db.keys(Op.LT, 'base:1', 'base:'))).to.deep.equal(['base:0']);
		});

		it('clamps an anchor outside the namespace to its edge', async () => {
			await db.put('a', 'before');
			await db.put('z', 'after');
			expect(await collectValues(db.keys(Op.GT, 'a', 'base:', false, 3))).to.deep.equal([0, 1, 2]);
			expect(await collectValues(db.keys(Op.LTE, 'z', 'base:', false, 3))).to.deep.equal([9, 8, 7]);
			expect(await collect(db.keys(Op.GT, 'z', 'base:'))).to.deep.equal([]);
		});

		it('scans the whole store with an empty mask', async () => {
			await db.put('zzz', 'last');
			expect(await collectKeys(db.keys(Op.GT, 'base:9'))).to.deep.equal(['zzz']);
		});

		it('fails when the anchor does not exist', async () => {
			try {
				await collect(db.keys(Op.GT, 'base:missing', 'base:'));
				expect.fail('should have thrown');
			} catch (e) {
				expect(e).to.be.instanceOf(KeyNotFoundError);
				expect((e as KeyNotFoundError).key).to.equal('base:missing');
			}
		});

		it('releases the cursor when iteration stops early', async () => {
			const seen: number[] = [];
			for await (const [, value] of db.keys(Op.GTE, 'base:0', 'base:')) {
				if (typeof value === 'number') seen.push(value);
				if (seen.length === 2) break;
			}
			expect(seen).to.deep.equal([0, 1]);
			await db.put('base:0', 'after');
			expect(await db.get('base:0')).to.equal('after');
		});
	});

	describe('by timestamp', () => {
		beforeEach(async () => {
			for (let i = 0; i < 5; i++) {
				await db.put(`area:${i}`, i);
			}
			for (let i = 9; i > 4; i--) {
				await db.put(`area:${i}`, i);
			}
		});

		it('ascends in creation order regardless of key order', async () => {
			expect(await collectValues(db.keys(Op.GTE, 'area:0', 'area:', true)))
				.to.deep.equal([0, 1, 2, 3, 4, 9, 8, 7, 6, 5]);
		});

		it('GT excludes the anchor', async () => {
			expect(await collectValues(db.keys(Op.GT, 'area:4', 'area:', true))).to.deep.equal([9, 8, 7, 6, 5]);
		});

		it('LTE descends from the anchor in creation order', async () => {
			expect(await collectValues(db.keys(Op.LTE, 'area:5', 'area:', true, 3))).to.deep.equal([5, 6, 7]);
		});

		it('LT descends and excludes the anchor', async () => {
			expect(await collectValues(db.keys(Op.LT, 'area:9', 'area:', true))).to.deep.equal([4, 3, 2, 1, 0]);
		});

		it('differs from the key-ordered scan on the same anchor', async () => {
			expect(await collectValues(db.keys(Op.LTE, 'area:5', 'area:', false, 3))).to.deep.equal([5, 4, 3]);
		});

		it('keeps an overwritten key in its creation position', async () => {
			await db.put('area:0', 'rewritten');
			expect(await collectValues(db.keys(Op.GTE, 'area:0', 'area:', true, 3))).to.deep.equal(['rewritten', 1, 2]);
		});

		it('filters other namespaces before applying the limit', async () => {
			await db.put('other:1', 'o1');
			await db.put('area:10', 10);
			await db.put('other:2', 'o2');
			await db.put('area:11', 11);
			expect(await collectValues(db.keys(Op.GT, 'area:5', 'area:', true, 2))).to.deep.equal([10, 11]);
		});

		it('skips deleted entries', async () => {
			await db.delete('area:1');
			expect(await collectValues(db.keys(Op.GTE, 'area:0', 'area:', true, 3))).to.deep.equal([0, 2, 3]);
		});

		it('limit 0 yields nothing', async () => {
			expect(await collect(db.keys(Op.GTE, 'area:0', 'area:', true, 0))).to.deep.equal([]);
		});
	});
});
