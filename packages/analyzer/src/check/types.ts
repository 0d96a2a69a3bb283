/**
 * Type definitions for the ownership and borrow check.
 */

import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import type { SourceLocation } from '../ir/nodes.ts'

export type BindingId = number & { readonly __brand: 'BindingId' }

export function bindingId(n: number): BindingId {
	return n as BindingId
}

export type BorrowId = number & { readonly __brand: 'BorrowId' }

export function borrowId(n: number): BorrowId {
	return n as BorrowId
}

/**
 * Per-binding ownership state. Transitions only move forward:
 * Uninitialized → Owned → (Moved | Dropped).
 */
export const OwnershipState = {
	Dropped: 'Dropped',
	Moved: 'Moved',
	Owned: 'Owned',
	Uninitialized: 'Uninitialized',
} as const

export type OwnershipState = (typeof OwnershipState)[keyof typeof OwnershipState]

/**
 * How the current region holds a binding. Capture accesses only appear
 * inside closure bodies, for by-reference captures.
 */
export type BindingAccess = 'owned' | 'shared-capture' | 'exclusive-capture'

export const BorrowKind = {
	Exclusive: 'Exclusive',
	Shared: 'Shared',
} as const

export type BorrowKind = (typeof BorrowKind)[keyof typeof BorrowKind]

/**
 * Reported error kinds.
 */
export const ErrorKind = {
	BorrowOutlivesOwner: 'BorrowOutlivesOwner',
	BorrowWhileMoving: 'BorrowWhileMoving',
	ConflictingBorrow: 'ConflictingBorrow',
	LoopFixedPointViolation: 'LoopFixedPointViolation',
	MutabilityViolation: 'MutabilityViolation',
	MutateWhileBorrowed: 'MutateWhileBorrowed',
	UnsafeCrossThreadMove: 'UnsafeCrossThreadMove',
	UnsafeCrossThreadShare: 'UnsafeCrossThreadShare',
	UseAfterMove: 'UseAfterMove',
	UseOfUninitialized: 'UseOfUninitialized',
} as const

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind]

/**
 * Catalog code for each error kind.
 */
export const ERROR_CODES: Record<ErrorKind, DiagnosticCode> = {
	[ErrorKind.BorrowOutlivesOwner]: 'TTBRW004',
	[ErrorKind.BorrowWhileMoving]: 'TTBRW003',
	[ErrorKind.ConflictingBorrow]: 'TTBRW001',
	[ErrorKind.LoopFixedPointViolation]: 'TTLOOP001',
	[ErrorKind.MutabilityViolation]: 'TTOWN003',
	[ErrorKind.MutateWhileBorrowed]: 'TTBRW002',
	[ErrorKind.UnsafeCrossThreadMove]: 'TTTHR001',
	[ErrorKind.UnsafeCrossThreadShare]: 'TTTHR002',
	[ErrorKind.UseAfterMove]: 'TTOWN002',
	[ErrorKind.UseOfUninitialized]: 'TTOWN001',
}

/**
 * A rule violation, before it is pinned to a statement.
 */
export interface Fault {
	readonly kind: ErrorKind
	/** Binding and reference names involved, most relevant first */
	readonly bindings: readonly string[]
	readonly args: DiagnosticArgs
}

/**
 * A fault pinned to the statement where it was detected.
 */
export interface Violation extends Fault {
	readonly position: number
	readonly loc?: SourceLocation
}
