/**
 * Scope entry and exit.
 */

import { type Borrow, describeHolder } from './borrows.ts'
import { borrowOutlivesOwner } from './faults.ts'
import { type CheckerState, pushFrame, type ScopeFrame, type ScopeKind } from './state.ts'
import { type Fault, OwnershipState } from './types.ts'

export function openScope(state: CheckerState, kind: ScopeKind): ScopeFrame {
	return pushFrame(state, kind)
}

/**
 * Close the innermost scope at `boundary`.
 *
 * Capture borrows held by the scope end first. Bindings are then dropped in
 * reverse declaration order; a binding that still has a borrow needed at or
 * after the boundary cannot be dropped. Loop bodies pass their own test,
 * since borrows carried to the next iteration are needed past the body.
 */
export function closeScope(
	state: CheckerState,
	boundary: number,
	stillNeeded: (borrow: Borrow) => boolean = (borrow) => borrow.liveUntil >= boundary
): Fault | null {
	const { ownership, borrows, frames } = state.region
	const frame = frames.pop()
	if (frame === undefined) throw new Error('Scope exit without a matching entry')

	for (const id of frame.heldBorrows) borrows.expire(id)

	for (let i = frame.bindings.length - 1; i >= 0; i--) {
		const id = frame.bindings[i]
		if (id === undefined) continue
		const record = ownership.get(id)

		const outliving = borrows.borrowsOf(id).find(stillNeeded)
		if (outliving !== undefined) return borrowOutlivesOwner(record.name, describeHolder(outliving))

		for (const borrow of borrows.borrowsOf(id)) borrows.expire(borrow.id)
		const owned = record.state === OwnershipState.Owned
		ownership.drop(id)
		if (owned && record.access === 'owned') state.dropped.push(record.name)
	}
	return null
}
