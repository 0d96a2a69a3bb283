import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { BorrowTracker } from '../../src/check/borrows.ts'
import { type BindingId, bindingId, BorrowKind } from '../../src/check/types.ts'

type Op =
	| { readonly kind: 'shared' | 'exclusive'; readonly target: number }
	| { readonly kind: 'expire'; readonly pick: number }

const opArb: fc.Arbitrary<Op> = fc.oneof(
	fc.record({ kind: fc.constantFrom('shared' as const, 'exclusive' as const), target: fc.nat(3) }),
	fc.record({ kind: fc.constant('expire' as const), pick: fc.nat(20) })
)

function holdsExclusivity(tracker: BorrowTracker, target: BindingId): boolean {
	const borrows = tracker.borrowsOf(target)
	const exclusive = borrows.filter((borrow) => borrow.kind === BorrowKind.Exclusive)
	return exclusive.length === 0 || borrows.length === 1
}

describe('check/borrows properties', () => {
	it('never holds an exclusive borrow next to any other borrow', () => {
		fc.assert(
			fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
				const tracker = new BorrowTracker()
				ops.forEach((op, at) => {
					if (op.kind === 'expire') {
						const active = [...tracker]
						const victim = active[op.pick % Math.max(active.length, 1)]
						if (victim) tracker.expire(victim.id)
					} else {
						const request = {
							at,
							holderKind: 'ref' as const,
							holderName: `r${at}`,
							liveUntil: at,
							target: bindingId(op.target),
						}
						if (op.kind === 'shared') tracker.borrowShared(request)
						else tracker.borrowExclusive(request)
					}
					for (let target = 0; target <= 3; target++) {
						assert.ok(holdsExclusivity(tracker, bindingId(target)))
					}
				})
			}),
			{ numRuns: 300 }
		)
	})

	it('grants exactly the requests the exclusivity rule allows', () => {
		fc.assert(
			fc.property(fc.array(fc.boolean(), { maxLength: 10 }), (exclusives) => {
				const tracker = new BorrowTracker()
				let sharedSoFar = 0
				let exclusiveSoFar = 0
				exclusives.forEach((isExclusive, at) => {
					const request = {
						at,
						holderKind: 'ref' as const,
						holderName: 'r',
						liveUntil: at,
						target: bindingId(0),
					}
					const granted = isExclusive
						? tracker.borrowExclusive(request).granted
						: tracker.borrowShared(request).granted
					const expected = isExclusive
						? sharedSoFar === 0 && exclusiveSoFar === 0
						: exclusiveSoFar === 0
					assert.strictEqual(granted, expected)
					if (granted && isExclusive) exclusiveSoFar++
					if (granted && !isExclusive) sharedSoFar++
				})
			})
		)
	})
})
