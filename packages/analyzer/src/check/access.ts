/**
 * Binding and reference accesses shared by the statement handlers.
 */

import { type Argument, type Expr, ExprKind, PassMode } from '../ir/nodes.ts'
import { type Borrow, type BorrowRequest, describeHolder, type HolderKind } from './borrows.ts'
import { conflictingBorrow, mutabilityViolation, mutateWhileBorrowed } from './faults.ts'
import { type CheckerState, isReference, resolveBinding } from './state.ts'
import { type BindingId, type BorrowId, BorrowKind, type Fault } from './types.ts'

/**
 * Result of a borrow attempt: the granted borrow, or the fault.
 */
export type BorrowAttempt =
	| { readonly borrow: Borrow; readonly fault: null }
	| { readonly borrow: null; readonly fault: Fault }

export interface BorrowHolder {
	readonly kind: HolderKind
	readonly name: string
	readonly liveUntil: number
}

/**
 * Read a binding. Reading while an exclusive borrow is live conflicts with
 * that borrow.
 */
export function readBinding(state: CheckerState, id: BindingId): Fault | null {
	const { ownership, borrows } = state.region
	const fault = ownership.read(id)
	if (fault) return fault
	const exclusive = borrows.exclusiveOf(id)
	if (exclusive === undefined) return null
	const record = ownership.get(id)
	return conflictingBorrow(
		record.name,
		BorrowKind.Shared,
		BorrowKind.Exclusive,
		null,
		describeHolder(exclusive)
	)
}

/**
 * Value use of a binding: a move, or a read for Copy bindings.
 */
export function moveBinding(state: CheckerState, id: BindingId, at: number): Fault | null {
	if (state.region.ownership.isCopy(id)) return readBinding(state, id)
	return state.region.ownership.moveOut(id, at)
}

/**
 * Dereference a reference or handle. Its borrows must still be active.
 */
export function useReference(state: CheckerState, name: string): void {
	const ids = state.region.refs.get(name) ?? []
	for (const id of ids) {
		if (!state.region.borrows.has(id)) {
			throw new Error(`Reference ${name} used after its borrow ended`)
		}
	}
}

/**
 * Take a shared or exclusive borrow of a binding on behalf of `holder`.
 */
export function borrowBinding(
	state: CheckerState,
	id: BindingId,
	kind: BorrowKind,
	at: number,
	holder: BorrowHolder
): BorrowAttempt {
	const { ownership, borrows } = state.region
	const record = ownership.get(id)
	const stateFault = ownership.read(id)
	if (stateFault) return { borrow: null, fault: stateFault }

	if (kind === BorrowKind.Exclusive && !ownership.isWritable(record)) {
		return { borrow: null, fault: mutabilityViolation(record.name, 'mutably borrow') }
	}

	const request: BorrowRequest = {
		at,
		holderKind: holder.kind,
		holderName: holder.name,
		liveUntil: holder.liveUntil,
		target: id,
	}
	const outcome =
		kind === BorrowKind.Exclusive ? borrows.borrowExclusive(request) : borrows.borrowShared(request)
	if (outcome.granted) return { borrow: outcome.borrow, fault: null }

	const requester = holder.kind === 'ref' ? holder.name : null
	return {
		borrow: null,
		fault: conflictingBorrow(
			record.name,
			kind,
			outcome.existing.kind,
			requester,
			describeHolder(outcome.existing)
		),
	}
}

/**
 * Exclusive call argument: the callee may mutate the binding in place, so
 * any live borrow is a mutation conflict rather than a borrow conflict.
 */
function mutateInPlace(
	state: CheckerState,
	id: BindingId,
	at: number,
	callee: string
): BorrowAttempt {
	const { ownership, borrows } = state.region
	const record = ownership.get(id)
	const stateFault = ownership.read(id)
	if (stateFault) return { borrow: null, fault: stateFault }
	if (!ownership.isWritable(record)) {
		return { borrow: null, fault: mutabilityViolation(record.name, 'mutate') }
	}
	const holder = borrows.firstHolder(id)
	if (holder !== null) return { borrow: null, fault: mutateWhileBorrowed(record.name, holder) }
	return borrowBinding(state, id, BorrowKind.Exclusive, at, {
		kind: 'call',
		liveUntil: at,
		name: callee,
	})
}

function passArgument(
	state: CheckerState,
	arg: Argument,
	callee: string,
	at: number,
	temporaries: BorrowId[]
): Fault | null {
	if (isReference(state, arg.name)) {
		useReference(state, arg.name)
		return null
	}
	const id = resolveBinding(state, arg.name)
	switch (arg.mode) {
		case PassMode.Value:
			return moveBinding(state, id, at)
		case PassMode.Shared: {
			const attempt = borrowBinding(state, id, BorrowKind.Shared, at, {
				kind: 'call',
				liveUntil: at,
				name: callee,
			})
			if (attempt.borrow) temporaries.push(attempt.borrow.id)
			return attempt.fault
		}
		case PassMode.Exclusive: {
			const attempt = mutateInPlace(state, id, at, callee)
			if (attempt.borrow) temporaries.push(attempt.borrow.id)
			return attempt.fault
		}
	}
}

/**
 * Pass arguments left to right. Reference arguments hold temporary borrows
 * that end when the call returns.
 */
export function passArguments(
	state: CheckerState,
	callee: string,
	args: readonly Argument[],
	at: number
): Fault | null {
	const temporaries: BorrowId[] = []
	for (const arg of args) {
		const fault = passArgument(state, arg, callee, at, temporaries)
		if (fault) return fault
	}
	for (const id of temporaries) state.region.borrows.expire(id)
	return null
}

export function evaluateExpr(state: CheckerState, expr: Expr, at: number): Fault | null {
	switch (expr.kind) {
		case ExprKind.Fresh:
			return null
		case ExprKind.Read:
			if (isReference(state, expr.name)) {
				useReference(state, expr.name)
				return null
			}
			return readBinding(state, resolveBinding(state, expr.name))
		case ExprKind.Move:
			if (isReference(state, expr.name)) {
				useReference(state, expr.name)
				return null
			}
			return moveBinding(state, resolveBinding(state, expr.name), at)
		case ExprKind.Call:
			return passArguments(state, expr.callee, expr.args, at)
	}
}
