/**
 * Analyzer diagnostic definitions.
 *
 * Error code format: TT<AREA><NUMBER>
 * - TTOWN: Ownership errors (001-099)
 * - TTBRW: Borrow errors (001-099)
 * - TTLOOP: Loop convergence errors (001-099)
 * - TTTHR: Cross-thread capture errors (001-099)
 * - TTIR: Malformed program representation (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// OWNERSHIP ERRORS (TTOWN001-099)
// =============================================================================

export const TTOWN001: DiagnosticDef = {
	code: 'TTOWN001',
	description: 'A binding was read, borrowed or moved before any value was stored in it.',
	message: 'used binding `{binding}` is not initialized',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Give `{binding}` a value when you declare it, or assign one before this point.',
}

export const TTOWN002: DiagnosticDef = {
	code: 'TTOWN002',
	description:
		'Ownership of this value was moved to another binding, so the original binding is no longer usable.',
	message: 'use of moved value: `{binding}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Borrow `{binding}` instead of moving it, or stop using it after the move.',
}

export const TTOWN003: DiagnosticDef = {
	code: 'TTOWN003',
	description: 'Only bindings declared mutable can be reassigned or borrowed exclusively.',
	message: 'cannot {action} `{binding}`: it is not mutable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{binding}` with `mut` (or capture it by exclusive reference).',
}

// =============================================================================
// BORROW ERRORS (TTBRW001-099)
// =============================================================================

export const TTBRW001: DiagnosticDef = {
	code: 'TTBRW001',
	description:
		'A binding can have many shared borrows or exactly one exclusive borrow at a time, never both.',
	message: 'cannot borrow `{binding}` as {requested} because it is also borrowed as {existing}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'End the use of {holder} before borrowing `{binding}` again.',
}

export const TTBRW002: DiagnosticDef = {
	code: 'TTBRW002',
	description:
		'A borrowed binding must not change while the borrow is still used later on; the borrow could observe stale data.',
	message: 'cannot mutate `{binding}` because it is borrowed by {holder}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the last use of {holder} before this mutation.',
}

export const TTBRW003: DiagnosticDef = {
	code: 'TTBRW003',
	description: 'A value cannot change owners while something still holds a borrow of it.',
	message: 'cannot move out of `{binding}` because it is borrowed by {holder}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Finish using {holder} before moving `{binding}`.',
}

export const TTBRW004: DiagnosticDef = {
	code: 'TTBRW004',
	description: 'The scope that owns this binding ends while a borrow of it is still used afterwards.',
	message: '`{binding}` does not live long enough',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{binding}` in an outer scope so it outlives {holder}.',
}

// =============================================================================
// LOOP ERRORS (TTLOOP001-099)
// =============================================================================

export const TTLOOP001: DiagnosticDef = {
	code: 'TTLOOP001',
	description:
		'Every iteration of a loop starts from the state the previous one left behind. A value moved during one iteration is gone in the next.',
	message: '`{binding}` is {reason} in a previous iteration of the loop',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Clone or borrow `{binding}` inside the loop instead.',
}

// =============================================================================
// THREAD ERRORS (TTTHR001-099)
// =============================================================================

export const TTTHR001: DiagnosticDef = {
	code: 'TTTHR001',
	description: 'Values moved into a thread must have a type that is safe to send between threads.',
	message: '`{type}` cannot be sent between threads safely',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use an atomically shared type for `{binding}` instead.',
}

export const TTTHR002: DiagnosticDef = {
	code: 'TTTHR002',
	description:
		'Values referenced from a thread must have a type that is safe to share between threads.',
	message: '`{type}` cannot be shared between threads safely',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move `{binding}` into the thread, or wrap it in a thread-safe type.',
}

// =============================================================================
// MALFORMED PROGRAM (TTIR001-099)
// =============================================================================

export const TTIR001: DiagnosticDef = {
	code: 'TTIR001',
	description: 'The program refers to a name that no visible binding or reference defines.',
	message: 'cannot find `{name}` in this scope',
	severity: DiagnosticSeverity.Error,
}

export const TTIR002: DiagnosticDef = {
	code: 'TTIR002',
	description: 'Every scope opened in a body has to be closed in the same body.',
	message: 'unbalanced scope: {detail}',
	severity: DiagnosticSeverity.Error,
}

export const TTIR003: DiagnosticDef = {
	code: 'TTIR003',
	description: 'A declaration names a type the type facts table does not know.',
	message: 'unknown type `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const TTIR004: DiagnosticDef = {
	code: 'TTIR004',
	description: 'A name has to be either a binding or a reference within one body.',
	message: '`{name}` is used both as a binding and as a reference',
	severity: DiagnosticSeverity.Error,
}

export const TTIR005: DiagnosticDef = {
	code: 'TTIR005',
	description: 'This operation needs a binding, not a reference.',
	message: '`{name}` is a reference; {operation} needs a binding',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all analyzer diagnostics.
 */
export const ANALYZER_DIAGNOSTICS = {
	// Borrow errors
	TTBRW001,
	TTBRW002,
	TTBRW003,
	TTBRW004,
	// Malformed program
	TTIR001,
	TTIR002,
	TTIR003,
	TTIR004,
	TTIR005,
	// Loop errors
	TTLOOP001,
	// Ownership errors
	TTOWN001,
	TTOWN002,
	TTOWN003,
	// Thread errors
	TTTHR001,
	TTTHR002,
} as const

/**
 * All valid analyzer diagnostic codes.
 */
export type AnalyzerDiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS
