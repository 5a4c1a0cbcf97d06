import { expect } from 'chai';
import { FeatureNotFoundError } from '../src/common/errors.js';
import { FeatureRegistry, type FeatureDefinition } from '../src/common/features.js';

const FEATURES: FeatureDefinition[] = [
	{ name: 'active', type: 'boolean', default: false },
	{ name: 'rank', type: 'integer', default: 0 },
	{ name: 'tag', type: 'string', default: 'none' },
];

function expectFeatureError(fn: () => unknown, feature: string): void {
	try {
		fn();
		expect.fail('should have thrown');
	} catch (e) {
		expect(e).to.be.instanceOf(FeatureNotFoundError);
		expect((e as FeatureNotFoundError).feature).to.equal(feature);
	}
}

describe('FeatureRegistry', () => {
	let registry: FeatureRegistry;

	beforeEach(() => {
		registry = new FeatureRegistry(FEATURES);
	});

	describe('declaration', () => {
		it('lists declared names in order', () => {
			expect(registry.names).to.deep.equal(['active', 'rank', 'tag']);
		});

		it('rejects duplicate names', () => {
			expectFeatureError(() => new FeatureRegistry([
				{ name: 'a', type: 'integer', default: 1 },
				{ name: 'a', type: 'string', default: '' },
			]), 'a');
		});

		it('rejects names that are not identifiers', () => {
			expectFeatureError(() => new FeatureRegistry([{ name: 'bad-name', type: 'integer', default: 0 }]), 'bad-name');
			expectFeatureError(() => new FeatureRegistry([{ name: '__proto__', type: 'integer', default: 0 }]), '__proto__');
		});

		it('rejects defaults of the wrong type', () => {
			expectFeatureError(() => new FeatureRegistry([{ name: 'n', type: 'integer', default: 1.5 }]), 'n');
		});
	});

	describe('lookup / require', () => {
		it('lookup returns undefined for undeclared features', () => {
			expect(registry.lookup('missing')).to.be.undefined;
			expect(registry.lookup('rank')).to.deep.equal({ name: 'rank', type: 'integer', default: 0 });
		});

		it('require throws for undeclared features', () => {
			expectFeatureError(() => registry.require('missing'), 'missing');
		});
	});

	describe('toStored', () => {
		it('stores booleans as 0/1', () => {
			expect(registry.toStored('active', true)).to.equal(1);
			expect(registry.toStored('active', false)).to.equal(0);
		});

		it('stores integers and strings as-is', () => {
			expect(registry.toStored('rank', -3)).to.equal(-3);
			expect(registry.toStored('tag', 'x')).to.equal('x');
		});

		it('rejects mismatched types instead of coercing', () => {
			expectFeatureError(() => registry.toStored('active', 1), 'active');
			expectFeatureError(() => registry.toStored('rank', '3'), 'rank');
			expectFeatureError(() => registry.toStored('rank', 2.5), 'rank');
			expectFeatureError(() => registry.toStored('tag', false), 'tag');
		});

		it('toStoredAll fails as a whole on one bad assignment', () => {
			expectFeatureError(() => registry.toStoredAll({ rank: 1, nope: 2 }), 'nope');
			expect(registry.toStoredAll({ rank: 1, active: true })).to.deep.equal({ rank: 1, active: 1 });
		});
	});

	describe('fromStored / materialize', () => {
		it('converts stored scalars back to typed values', () => {
			expect(registry.fromStored('active', 1)).to.equal(true);
			expect(registry.fromStored('active', 0)).to.equal(false);
			expect(registry.fromStored('rank', 9)).to.equal(9);
		});

		it('falls back to defaults for absent or ill-typed scalars', () => {
			expect(registry.fromStored('active', undefined)).to.equal(false);
			expect(registry.fromStored('active', 'yes')).to.equal(false);
			expect(registry.fromStored('tag', 4)).to.equal('none');
		});

		it('materializes a frozen bag of every declared feature', () => {
			const bag = registry.materialize({ rank: 4, stale: 'ignored' });
			expect(bag).to.deep.equal({ active: false, rank: 4, tag: 'none' });
			expect(Object.isFrozen(bag)).to.be.true;
		});
	});
});
