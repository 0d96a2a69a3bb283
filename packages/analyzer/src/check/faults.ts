/**
 * Fault constructors. Keeps the argument names used by the catalog
 * templates in one place.
 */

import type { SourceLocation } from '../ir/nodes.ts'
import { type BorrowKind, ErrorKind, type Fault, type Violation } from './types.ts'

/**
 * Who holds a borrow: `name` goes into the diagnostic's binding list,
 * `label` into its message.
 */
export interface Holder {
	readonly name: string
	readonly label: string
}

/** Anonymous holders (closures without a handle) have an empty name. */
function involved(...names: string[]): string[] {
	return names.filter((name) => name !== '')
}

function borrowWord(kind: BorrowKind): string {
	return kind === 'Exclusive' ? 'mutable' : 'immutable'
}

export function useOfUninitialized(binding: string): Fault {
	return { args: { binding }, bindings: [binding], kind: ErrorKind.UseOfUninitialized }
}

export function useAfterMove(binding: string): Fault {
	return { args: { binding }, bindings: [binding], kind: ErrorKind.UseAfterMove }
}

export function mutabilityViolation(
	binding: string,
	action: 'assign to' | 'mutably borrow' | 'mutate'
): Fault {
	return { args: { action, binding }, bindings: [binding], kind: ErrorKind.MutabilityViolation }
}

export function conflictingBorrow(
	binding: string,
	requested: BorrowKind,
	existing: BorrowKind,
	requester: string | null,
	holder: Holder
): Fault {
	return {
		args: {
			binding,
			existing: borrowWord(existing),
			holder: holder.label,
			requested: borrowWord(requested),
		},
		bindings:
			requester === null ? involved(binding, holder.name) : involved(binding, requester, holder.name),
		kind: ErrorKind.ConflictingBorrow,
	}
}

export function mutateWhileBorrowed(binding: string, holder: Holder): Fault {
	return {
		args: { binding, holder: holder.label },
		bindings: involved(binding, holder.name),
		kind: ErrorKind.MutateWhileBorrowed,
	}
}

export function borrowWhileMoving(binding: string, holder: Holder): Fault {
	return {
		args: { binding, holder: holder.label },
		bindings: involved(binding, holder.name),
		kind: ErrorKind.BorrowWhileMoving,
	}
}

export function borrowOutlivesOwner(binding: string, holder: Holder): Fault {
	return {
		args: { binding, holder: holder.label },
		bindings: involved(binding, holder.name),
		kind: ErrorKind.BorrowOutlivesOwner,
	}
}

export function loopRegression(binding: string, reason: 'moved' | 'borrowed'): Fault {
	return { args: { binding, reason }, bindings: [binding], kind: ErrorKind.LoopFixedPointViolation }
}

export function unsafeCrossThreadMove(binding: string, type: string): Fault {
	return { args: { binding, type }, bindings: [binding], kind: ErrorKind.UnsafeCrossThreadMove }
}

export function unsafeCrossThreadShare(binding: string, type: string): Fault {
	return { args: { binding, type }, bindings: [binding], kind: ErrorKind.UnsafeCrossThreadShare }
}

/**
 * Pin a fault to the statement at `position`.
 */
export function pin(fault: Fault, position: number, loc?: SourceLocation): Violation {
	return { ...fault, position, ...(loc ? { loc } : {}) }
}
