import assert from 'node:assert'
import { describe, it } from 'node:test'
import { BorrowTracker } from '../../src/check/borrows.ts'
import { type AnalyzerOptions, DEFAULT_OPTIONS } from '../../src/check/options.ts'
import { type BindingSpec, OwnershipStore } from '../../src/check/ownership.ts'
import { bindingId, ErrorKind, OwnershipState } from '../../src/check/types.ts'
import { testFacts } from '../fixtures.ts'

function createStore(options: AnalyzerOptions = DEFAULT_OPTIONS): {
	store: OwnershipStore
	borrows: BorrowTracker
} {
	const borrows = new BorrowTracker()
	return { borrows, store: new OwnershipStore(testFacts(), options, borrows) }
}

function spec(name: string, typeName = 'Vec', overrides: Partial<BindingSpec> = {}): BindingSpec {
	return { at: 0, mutable: false, name, typeName, ...overrides }
}

describe('check/ownership', () => {
	describe('declare', () => {
		it('starts bindings uninitialized with dense ids', () => {
			const { store } = createStore()
			const a = store.declare(spec('a'))
			const b = store.declare(spec('b'))
			assert.strictEqual(a, 0)
			assert.strictEqual(b, 1)
			assert.strictEqual(store.get(a).state, OwnershipState.Uninitialized)
			assert.strictEqual(store.get(a).access, 'owned')
			assert.strictEqual(store.count(), 2)
		})

		it('declares captured bindings as owned', () => {
			const { store } = createStore()
			const id = store.declare(spec('a', 'Vec', { access: 'shared-capture', initialized: true }))
			assert.strictEqual(store.get(id).state, OwnershipState.Owned)
		})

		it('throws for unknown ids', () => {
			const { store } = createStore()
			store.declare(spec('a'))
			assert.throws(() => store.get(bindingId(1)), /Invalid BindingId: 1/)
		})
	})

	describe('transitions', () => {
		it('reads only owned bindings', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			assert.strictEqual(store.read(id)?.kind, ErrorKind.UseOfUninitialized)
			assert.strictEqual(store.initialize(id), null)
			assert.strictEqual(store.read(id), null)
		})

		it('marks moved bindings with the move position', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			assert.strictEqual(store.moveOut(id, 4), null)
			assert.strictEqual(store.get(id).state, OwnershipState.Moved)
			assert.strictEqual(store.get(id).movedAt, 4)
			assert.deepStrictEqual(store.read(id), {
				args: { binding: 'a' },
				bindings: ['a'],
				kind: ErrorKind.UseAfterMove,
			})
		})

		it('refuses to initialize a moved binding', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			store.moveOut(id, 1)
			assert.strictEqual(store.initialize(id)?.kind, ErrorKind.UseAfterMove)
		})

		it('throws when a binding is initialized twice', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			assert.throws(() => store.initialize(id), /initialized twice/)
		})

		it('keeps moved bindings moved on drop', () => {
			const { store } = createStore()
			const kept = store.declare(spec('a'))
			const moved = store.declare(spec('b'))
			store.initialize(kept)
			store.initialize(moved)
			store.moveOut(moved, 2)
			store.drop(kept)
			store.drop(moved)
			assert.strictEqual(store.get(kept).state, OwnershipState.Dropped)
			assert.strictEqual(store.get(moved).state, OwnershipState.Moved)
			assert.strictEqual(store.get(kept).inScope, false)
		})

		it('throws when a dropped binding is read', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			store.drop(id)
			assert.throws(() => store.read(id), /used after its scope ended/)
		})
	})

	describe('writes', () => {
		it('refuses writes to immutable bindings', () => {
			const { store } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			assert.deepStrictEqual(store.write(id)?.args, { action: 'assign to', binding: 'a' })
		})

		it('refuses writes to borrowed bindings', () => {
			const { store, borrows } = createStore()
			const id = store.declare(spec('a', 'Vec', { mutable: true }))
			store.initialize(id)
			borrows.borrowShared({ at: 1, holderKind: 'ref', holderName: 'r', liveUntil: 3, target: id })
			assert.deepStrictEqual(store.write(id), {
				args: { binding: 'a', holder: '`r`' },
				bindings: ['a', 'r'],
				kind: ErrorKind.MutateWhileBorrowed,
			})
		})

		it('decides writability by access', () => {
			const { store } = createStore()
			const shared = store.declare(spec('a', 'Vec', { access: 'shared-capture', mutable: true }))
			const exclusive = store.declare(spec('b', 'Vec', { access: 'exclusive-capture' }))
			assert.strictEqual(store.isWritable(store.get(shared)), false)
			assert.strictEqual(store.isWritable(store.get(exclusive)), true)
		})
	})

	describe('moves', () => {
		it('leaves Copy bindings owned', () => {
			const { store } = createStore()
			const id = store.declare(spec('n', 'i32'))
			store.initialize(id)
			assert.strictEqual(store.isCopy(id), true)
			assert.strictEqual(store.moveOut(id, 1), null)
			assert.strictEqual(store.get(id).state, OwnershipState.Owned)
		})

		it('moves Copy bindings when the exemption is off', () => {
			const { store } = createStore({ ...DEFAULT_OPTIONS, treatCopyTypesAsExempt: false })
			const id = store.declare(spec('n', 'i32'))
			store.initialize(id)
			assert.strictEqual(store.isCopy(id), false)
			store.moveOut(id, 1)
			assert.strictEqual(store.get(id).state, OwnershipState.Moved)
		})

		it('refuses to move a borrowed binding', () => {
			const { store, borrows } = createStore()
			const id = store.declare(spec('a'))
			store.initialize(id)
			borrows.borrowShared({ at: 1, holderKind: 'call', holderName: 'f', liveUntil: 1, target: id })
			assert.strictEqual(store.moveOut(id, 1)?.args.holder, 'the call to `f`')
			assert.strictEqual(store.get(id).state, OwnershipState.Owned)
		})

		it('refuses to move out of a captured reference', () => {
			const { store } = createStore()
			const id = store.declare(spec('a', 'Vec', { access: 'exclusive-capture', initialized: true }))
			assert.deepStrictEqual(store.moveOut(id, 1), {
				args: { binding: 'a', holder: "the closure's capture" },
				bindings: ['a'],
				kind: ErrorKind.BorrowWhileMoving,
			})
		})
	})

	describe('snapshot', () => {
		it('covers in-scope bindings only', () => {
			const { store } = createStore()
			const a = store.declare(spec('a'))
			const b = store.declare(spec('b'))
			store.initialize(a)
			store.initialize(b)
			store.drop(b)
			assert.deepStrictEqual([...store.snapshot()], [[a, OwnershipState.Owned]])
		})
	})
})
