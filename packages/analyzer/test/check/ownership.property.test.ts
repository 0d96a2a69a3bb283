import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { BorrowTracker } from '../../src/check/borrows.ts'
import { DEFAULT_OPTIONS } from '../../src/check/options.ts'
import { OwnershipStore } from '../../src/check/ownership.ts'
import { type BindingId, OwnershipState } from '../../src/check/types.ts'
import { testFacts } from '../fixtures.ts'

const RANK: Record<OwnershipState, number> = {
	[OwnershipState.Uninitialized]: 0,
	[OwnershipState.Owned]: 1,
	[OwnershipState.Moved]: 2,
	[OwnershipState.Dropped]: 2,
}

type Op = 'initialize' | 'read' | 'move' | 'drop'

const opArb = fc.constantFrom<Op>('initialize', 'read', 'move', 'drop')

function apply(store: OwnershipStore, id: BindingId, op: Op): void {
	const record = store.get(id)
	switch (op) {
		case 'initialize':
			if (record.state === OwnershipState.Uninitialized || record.state === OwnershipState.Moved) {
				store.initialize(id)
			}
			return
		case 'read':
			if (record.state !== OwnershipState.Dropped) store.read(id)
			return
		case 'move':
			if (record.state !== OwnershipState.Dropped) store.moveOut(id, 0)
			return
		case 'drop':
			store.drop(id)
			return
	}
}

describe('check/ownership properties', () => {
	it('only moves states forward', () => {
		fc.assert(
			fc.property(fc.constantFrom('Vec', 'i32'), fc.array(opArb, { maxLength: 20 }), (type, ops) => {
				const store = new OwnershipStore(testFacts(), DEFAULT_OPTIONS, new BorrowTracker())
				const id = store.declare({ at: 0, mutable: true, name: 'a', typeName: type })
				let rank = RANK[store.get(id).state]
				for (const op of ops) {
					apply(store, id, op)
					const next = RANK[store.get(id).state]
					assert.ok(next >= rank)
					rank = next
				}
			})
		)
	})

	it('never invalidates Copy bindings by moving them', () => {
		fc.assert(
			fc.property(fc.integer({ max: 20, min: 1 }), (moves) => {
				const store = new OwnershipStore(testFacts(), DEFAULT_OPTIONS, new BorrowTracker())
				const id = store.declare({ at: 0, mutable: false, name: 'n', typeName: 'i32' })
				store.initialize(id)
				for (let at = 1; at <= moves; at++) assert.strictEqual(store.moveOut(id, at), null)
				assert.strictEqual(store.read(id), null)
			})
		)
	})
})
