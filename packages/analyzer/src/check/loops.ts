/**
 * Loop fixed-point check.
 *
 * The body is replayed from the state the previous pass left behind until
 * the region state stops changing. A binding that loses permission between
 * passes (for example Owned to Moved) would be observed in that weaker state
 * by the next iteration, which is reported at the statement that caused it.
 */

import type { IndexedStatement } from '../ir/positions.ts'
import { loopRegression, pin } from './faults.ts'
import { closeScope, openScope } from './scopes.ts'
import {
	type CheckerState,
	locationOf,
	type RegionSnapshot,
	sameSnapshot,
	snapshotRegion,
} from './state.ts'
import { type BindingId, OwnershipState, type Violation } from './types.ts'

export type BodyRunner = (
	state: CheckerState,
	body: readonly IndexedStatement[]
) => Violation | null

/** Permission order; lower means fewer operations are allowed. */
const PERMISSION: Record<OwnershipState, number> = {
	[OwnershipState.Dropped]: 0,
	[OwnershipState.Moved]: 0,
	[OwnershipState.Owned]: 2,
	[OwnershipState.Uninitialized]: 1,
}

/**
 * End body-local borrows at the back edge. Borrows created in the body and
 * not needed past it are gone before the next iteration starts.
 */
function expireAtBackEdge(state: CheckerState, loop: IndexedStatement): void {
	state.region.borrows.expireWhere(
		(borrow) =>
			borrow.origin > loop.position &&
			borrow.origin <= loop.end &&
			borrow.liveUntil <= loop.end &&
			!state.liveness.isCarriedBy(borrow.origin, loop.position)
	)
}

function findRegression(
	state: CheckerState,
	loop: IndexedStatement,
	before: RegionSnapshot,
	after: RegionSnapshot
): Violation | null {
	for (const [id, previous] of before.states) {
		const current = after.states.get(id)
		if (current === undefined || PERMISSION[current] >= PERMISSION[previous]) continue
		const record = state.region.ownership.get(id)
		const position = record.movedAt ?? loop.position
		return pin(loopRegression(record.name, 'moved'), position, locationOf(state, position))
	}
	return null
}

function firstDifference(before: RegionSnapshot, after: RegionSnapshot): BindingId {
	for (const [key, borrow] of after.borrows) {
		if (!before.borrows.has(key)) return borrow.target
	}
	for (const [key, borrow] of before.borrows) {
		if (!after.borrows.has(key)) return borrow.target
	}
	for (const [id, current] of after.states) {
		if (before.states.get(id) !== current) return id
	}
	throw new Error('Loop snapshots differ without a differing binding')
}

export function checkLoop(
	state: CheckerState,
	loop: IndexedStatement,
	runBody: BodyRunner
): Violation | null {
	let previous = snapshotRegion(state.region)
	let earlier = previous

	for (let pass = 0; pass < state.options.loopFixedPointIterations; pass++) {
		openScope(state, 'loop')
		const violation = runBody(state, loop.body)
		if (violation) return violation

		const fault = closeScope(
			state,
			loop.end + 1,
			(borrow) =>
				borrow.liveUntil > loop.end || state.liveness.isCarriedBy(borrow.origin, loop.position)
		)
		if (fault) return pin(fault, loop.position, loop.stmt.loc)
		expireAtBackEdge(state, loop)

		const current = snapshotRegion(state.region)
		const regression = findRegression(state, loop, previous, current)
		if (regression) return regression
		if (sameSnapshot(previous, current)) return null
		earlier = previous
		previous = current
	}

	const name = state.region.ownership.get(firstDifference(earlier, previous)).name
	return pin(loopRegression(name, 'borrowed'), loop.position, loop.stmt.loc)
}
