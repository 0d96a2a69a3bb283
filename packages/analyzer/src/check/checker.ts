/**
 * Checker pass: one forward traversal per function.
 *
 * Each function gets its own ownership store and borrow tracker, and each
 * closure body its own pair. The first violation ends the function's
 * analysis.
 */

import type { TypeFactsTable } from '../facts/type-facts.ts'
import {
	type BorrowExclusiveStmt,
	type BorrowSharedStmt,
	CaptureMode,
	type DeclareStmt,
	type FunctionDef,
	type MoveStmt,
	type SourceLocation,
	type SpawnClosureStmt,
	StmtKind,
} from '../ir/nodes.ts'
import { type IndexedStatement, indexFunction, walkIndexed } from '../ir/positions.ts'
import {
	type BorrowHolder,
	borrowBinding,
	evaluateExpr,
	moveBinding,
	passArguments,
	readBinding,
	useReference,
} from './access.ts'
import { checkThreadCaptures, type ThreadCapture } from './capture.ts'
import { pin } from './faults.ts'
import { computeLiveRanges } from './liveness.ts'
import { checkLoop } from './loops.ts'
import type { AnalyzerOptions } from './options.ts'
import type { BindingRecord } from './ownership.ts'
import { closeScope, openScope } from './scopes.ts'
import {
	bindHolder,
	type CheckerState,
	createRegion,
	currentFrame,
	declareInFrame,
	isReference,
	lookupBinding,
	releaseHolder,
	resolveBinding,
} from './state.ts'
import {
	type BindingId,
	type BorrowId,
	BorrowKind,
	type Fault,
	OwnershipState,
	type Violation,
} from './types.ts'

/**
 * Outcome of checking one function.
 */
export interface FunctionCheck {
	readonly name: string
	/** The violation that ended the analysis, or null if the function is sound */
	readonly violation: Violation | null
	/** Names of dropped bindings, in drop order */
	readonly dropped: readonly string[]
}

// ============================================================================
// Stores into bindings
// ============================================================================

/**
 * Store a value into a binding: initializes an empty binding, overwrites an
 * initialized one.
 */
function storeInto(state: CheckerState, id: BindingId): Fault | null {
	const { ownership } = state.region
	if (ownership.get(id).state === OwnershipState.Uninitialized) return ownership.initialize(id)
	return ownership.write(id)
}

function checkDeclare(state: CheckerState, stmt: DeclareStmt, at: number): Fault | null {
	if (stmt.init) {
		const fault = evaluateExpr(state, stmt.init, at)
		if (fault) return fault
	}
	const id = declareInFrame(state, {
		at,
		mutable: stmt.mutable,
		name: stmt.binding,
		typeName: stmt.type,
	})
	return stmt.init ? state.region.ownership.initialize(id) : null
}

function checkMove(state: CheckerState, stmt: MoveStmt, at: number): Fault | null {
	const source = resolveBinding(state, stmt.source)
	const fault = moveBinding(state, source, at)
	if (fault) return fault

	const existing = lookupBinding(state, stmt.destination)
	if (existing !== null) return storeInto(state, existing)

	const destination = declareInFrame(state, {
		at,
		mutable: false,
		name: stmt.destination,
		typeName: state.region.ownership.get(source).typeName,
	})
	return state.region.ownership.initialize(destination)
}

function checkBorrow(
	state: CheckerState,
	stmt: BorrowSharedStmt | BorrowExclusiveStmt,
	at: number
): Fault | null {
	releaseHolder(state, stmt.ref)
	const kind = stmt.kind === StmtKind.BorrowExclusive ? BorrowKind.Exclusive : BorrowKind.Shared
	const attempt = borrowBinding(state, resolveBinding(state, stmt.binding), kind, at, {
		kind: 'ref',
		liveUntil: state.liveness.liveUntil(at),
		name: stmt.ref,
	})
	if (attempt.borrow === null) return attempt.fault
	bindHolder(state, stmt.ref, [attempt.borrow.id])
	return null
}

function checkUse(state: CheckerState, name: string): Fault | null {
	if (isReference(state, name)) {
		useReference(state, name)
		return null
	}
	return readBinding(state, resolveBinding(state, name))
}

// ============================================================================
// Closures and threads
// ============================================================================

interface CapturedBinding {
	readonly record: BindingRecord
	readonly mode: CaptureMode
	readonly mutable: boolean
}

/**
 * Analyze a closure body as a region of its own. Captured bindings are
 * visible there already initialized.
 */
function checkClosureBody(
	state: CheckerState,
	node: IndexedStatement,
	captured: readonly CapturedBinding[]
): Violation | null {
	const inner: CheckerState = { ...state, region: createRegion(state.facts, state.options) }
	openScope(inner, 'closure')

	for (const { record, mode, mutable } of captured) {
		const byMove = mode === CaptureMode.ByMove
		declareInFrame(inner, {
			access: byMove ? 'owned' : mutable ? 'exclusive-capture' : 'shared-capture',
			at: node.position,
			initialized: true,
			mutable: byMove ? record.mutable : mutable,
			name: record.name,
			typeName: record.typeName,
		})
	}

	const violation = checkBody(inner, node.body)
	if (violation) return violation

	const fault = closeScope(inner, node.end + 1)
	return fault ? pin(fault, node.position, node.stmt.loc) : null
}

function checkSpawn(
	state: CheckerState,
	node: IndexedStatement,
	stmt: SpawnClosureStmt
): Violation | null {
	const at = node.position
	const fail = (fault: Fault): Violation => pin(fault, at, stmt.loc)
	const holder: BorrowHolder = {
		kind: stmt.target === 'thread' ? 'thread' : 'closure',
		// Without a handle the enclosing scope holds the captures until it exits
		liveUntil:
			stmt.handle === undefined ? Number.POSITIVE_INFINITY : state.liveness.liveUntil(at),
		name: stmt.handle ?? '',
	}
	if (stmt.handle !== undefined) releaseHolder(state, stmt.handle)

	const { ownership, borrows } = state.region
	const held: BorrowId[] = []
	const captured: CapturedBinding[] = []
	const threadCaptures: ThreadCapture[] = []

	for (const capture of stmt.captures) {
		const id = resolveBinding(state, capture.binding)
		const record = ownership.get(id)

		if (capture.mode === CaptureMode.ByMove) {
			const fault = moveBinding(state, id, at)
			if (fault) return fail(fault)
		} else {
			const kind = capture.mutable ? BorrowKind.Exclusive : BorrowKind.Shared
			const attempt = borrowBinding(state, id, kind, at, holder)
			if (attempt.borrow === null) return fail(attempt.fault)
			held.push(attempt.borrow.id)
		}

		captured.push({ mode: capture.mode, mutable: capture.mutable, record })
		threadCaptures.push({
			binding: capture.binding,
			facts: state.facts.get(record.typeName),
			mode: capture.mode,
			mutable: capture.mutable,
			soleBorrow: borrows.borrowsOf(id).length === 1,
			typeName: record.typeName,
		})
	}

	if (stmt.target === 'thread') {
		const fault = checkThreadCaptures(threadCaptures)
		if (fault) return fail(fault)
	}

	const violation = checkClosureBody(state, node, captured)
	if (violation) return violation

	if (stmt.handle !== undefined) bindHolder(state, stmt.handle, held)
	else currentFrame(state).heldBorrows.push(...held)
	return null
}

// ============================================================================
// Traversal
// ============================================================================

function checkSimple(state: CheckerState, node: IndexedStatement): Fault | null {
	const { stmt, position } = node
	switch (stmt.kind) {
		case StmtKind.Declare:
			return checkDeclare(state, stmt, position)
		case StmtKind.Assign: {
			const fault = evaluateExpr(state, stmt.value, position)
			return fault ?? storeInto(state, resolveBinding(state, stmt.binding))
		}
		case StmtKind.Move:
			return checkMove(state, stmt, position)
		case StmtKind.BorrowShared:
		case StmtKind.BorrowExclusive:
			return checkBorrow(state, stmt, position)
		case StmtKind.Use:
			return checkUse(state, stmt.name)
		case StmtKind.Call:
			return passArguments(state, stmt.callee, stmt.args, position)
		case StmtKind.EnterScope:
			openScope(state, 'block')
			return null
		case StmtKind.ExitScope:
			return closeScope(state, position)
		case StmtKind.Loop:
		case StmtKind.SpawnClosure:
			throw new Error(`${stmt.kind} has a body and is not a simple statement`)
	}
}

function checkStatement(state: CheckerState, node: IndexedStatement): Violation | null {
	state.region.borrows.expireBefore(node.position)
	const { stmt } = node
	if (stmt.kind === StmtKind.Loop) return checkLoop(state, node, checkBody)
	if (stmt.kind === StmtKind.SpawnClosure) return checkSpawn(state, node, stmt)
	const fault = checkSimple(state, node)
	return fault ? pin(fault, node.position, stmt.loc) : null
}

function checkBody(state: CheckerState, body: readonly IndexedStatement[]): Violation | null {
	for (const node of body) {
		const violation = checkStatement(state, node)
		if (violation) return violation
	}
	return null
}

/**
 * Check one function. Pure: the result depends only on the arguments.
 */
export function checkFunction(
	fn: FunctionDef,
	facts: TypeFactsTable,
	options: AnalyzerOptions
): FunctionCheck {
	const indexed = indexFunction(fn)
	const locations = new Map<number, SourceLocation>()
	for (const node of walkIndexed(indexed.statements)) {
		if (node.stmt.loc) locations.set(node.position, node.stmt.loc)
	}

	const state: CheckerState = {
		dropped: [],
		facts,
		fn: indexed,
		liveness: computeLiveRanges(indexed),
		locations,
		options,
		region: createRegion(facts, options),
	}

	openScope(state, 'function')
	let violation = checkBody(state, indexed.statements)
	if (violation === null) {
		state.region.borrows.expireBefore(indexed.exitPosition)
		const fault = closeScope(state, indexed.exitPosition)
		if (fault) violation = pin(fault, indexed.exitPosition, indexed.endLoc)
	}
	return { dropped: state.dropped, name: fn.name, violation }
}
