/**
 * Structural validation of a program before analysis.
 *
 * Problems found here are front-end defects rather than ownership errors,
 * so they are raised as an exception instead of being reported per function.
 */

import type { Diagnostic } from '../core/context.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	getDiagnostic,
	interpolateMessage,
} from '../core/diagnostics.ts'
import type { TypeFactsTable } from '../facts/type-facts.ts'
import {
	type Argument,
	type Expr,
	ExprKind,
	type FunctionDef,
	PassMode,
	type Program,
	StmtKind,
} from './nodes.ts'
import { type IndexedStatement, indexFunction } from './positions.ts'

export class InvalidProgramError extends Error {
	readonly issues: readonly Diagnostic[]

	constructor(issues: readonly Diagnostic[]) {
		const [first] = issues
		super(first === undefined ? 'Invalid program' : `Invalid program: ${first.message}`)
		this.name = 'InvalidProgramError'
		this.issues = issues
	}
}

/**
 * Names known in one region: the function body, or one closure body.
 * Bindings are lexically scoped; reference and handle names are visible from
 * their definition to the end of the region.
 */
interface RegionNames {
	readonly frames: Set<string>[]
	readonly bindings: Set<string>
	readonly refs: Set<string>
}

interface ValidationState {
	readonly fn: FunctionDef
	readonly facts: TypeFactsTable
	readonly regions: RegionNames[]
	/** Frame depth at which each open body starts */
	readonly bodies: number[]
	readonly issues: Diagnostic[]
	/** Names already reported as both binding and reference */
	readonly mixed: Set<string>
}

function issue(
	state: ValidationState,
	code: DiagnosticCode,
	node: IndexedStatement | null,
	args: DiagnosticArgs
): void {
	const def = getDiagnostic(code)
	const loc = node === null ? state.fn.endLoc : node.stmt.loc
	state.issues.push({
		args,
		def,
		functionName: state.fn.name,
		message: interpolateMessage(def.message, args),
		...(node !== null ? { position: node.position } : {}),
		...(loc ? { loc } : {}),
	})
}

function region(state: ValidationState): RegionNames {
	const current = state.regions.at(-1)
	if (current === undefined) throw new Error('Validation has no open region')
	return current
}

function newRegion(): RegionNames {
	return { bindings: new Set(), frames: [new Set()], refs: new Set() }
}

function isBindingVisible(names: RegionNames, name: string): boolean {
	return names.frames.some((frame) => frame.has(name))
}

function declareBinding(state: ValidationState, node: IndexedStatement, name: string): void {
	const names = region(state)
	if (names.refs.has(name)) reportMixed(state, node, name)
	names.bindings.add(name)
	names.frames.at(-1)?.add(name)
}

function defineRef(state: ValidationState, node: IndexedStatement, name: string): void {
	const names = region(state)
	if (names.bindings.has(name)) reportMixed(state, node, name)
	names.refs.add(name)
}

function reportMixed(state: ValidationState, node: IndexedStatement, name: string): void {
	if (state.mixed.has(name)) return
	state.mixed.add(name)
	issue(state, 'TTIR004', node, { name })
}

/** A name read, used or passed by value: a binding or a reference. */
function requireName(state: ValidationState, node: IndexedStatement, name: string): void {
	const names = region(state)
	if (isBindingVisible(names, name) || names.refs.has(name)) return
	issue(state, 'TTIR001', node, { name })
}

/** A name an operation needs to own or borrow: a binding only. */
function requireBinding(
	state: ValidationState,
	node: IndexedStatement,
	name: string,
	operation: string
): void {
	const names = region(state)
	if (isBindingVisible(names, name)) return
	if (names.refs.has(name)) issue(state, 'TTIR005', node, { name, operation })
	else issue(state, 'TTIR001', node, { name })
}

function checkExpr(state: ValidationState, node: IndexedStatement, expr: Expr): void {
	switch (expr.kind) {
		case ExprKind.Fresh:
			return
		case ExprKind.Read:
		case ExprKind.Move:
			requireName(state, node, expr.name)
			return
		case ExprKind.Call:
			checkArgs(state, node, expr.args)
			return
	}
}

function checkArgs(
	state: ValidationState,
	node: IndexedStatement,
	args: readonly Argument[]
): void {
	for (const arg of args) {
		if (arg.mode === PassMode.Value) requireName(state, node, arg.name)
		else requireBinding(state, node, arg.name, 'a borrow')
	}
}

function checkBody(state: ValidationState, body: readonly IndexedStatement[]): void {
	const names = region(state)
	const depth = names.frames.length
	state.bodies.push(depth)
	for (const node of body) checkStatement(state, node)
	state.bodies.pop()

	if (names.frames.length > depth) {
		issue(state, 'TTIR002', null, { detail: 'scope entered but never exited' })
		names.frames.length = depth
	}
}

function checkStatement(state: ValidationState, node: IndexedStatement): void {
	const { stmt } = node
	switch (stmt.kind) {
		case StmtKind.Declare:
			if (stmt.init) checkExpr(state, node, stmt.init)
			if (!state.facts.has(stmt.type)) issue(state, 'TTIR003', node, { name: stmt.type })
			declareBinding(state, node, stmt.binding)
			return
		case StmtKind.Assign:
			checkExpr(state, node, stmt.value)
			requireBinding(state, node, stmt.binding, 'an assignment')
			return
		case StmtKind.Move:
			requireBinding(state, node, stmt.source, 'a move')
			if (region(state).refs.has(stmt.destination)) {
				issue(state, 'TTIR005', node, { name: stmt.destination, operation: 'a move' })
			} else if (!isBindingVisible(region(state), stmt.destination)) {
				declareBinding(state, node, stmt.destination)
			}
			return
		case StmtKind.BorrowShared:
		case StmtKind.BorrowExclusive:
			requireBinding(state, node, stmt.binding, 'a borrow')
			defineRef(state, node, stmt.ref)
			return
		case StmtKind.Use:
			requireName(state, node, stmt.name)
			return
		case StmtKind.Call:
			checkArgs(state, node, stmt.args)
			return
		case StmtKind.EnterScope:
			region(state).frames.push(new Set())
			return
		case StmtKind.ExitScope: {
			const names = region(state)
			const base = state.bodies.at(-1) ?? 1
			// Frames up to `base` belong to the enclosing body, not to a block
			if (names.frames.length <= base) {
				issue(state, 'TTIR002', node, { detail: 'scope exited but never entered' })
			} else {
				names.frames.pop()
			}
			return
		}
		case StmtKind.Loop: {
			const names = region(state)
			names.frames.push(new Set())
			checkBody(state, node.body)
			names.frames.pop()
			return
		}
		case StmtKind.SpawnClosure: {
			const inner = newRegion()
			for (const capture of stmt.captures) {
				requireBinding(state, node, capture.binding, 'a capture')
				inner.bindings.add(capture.binding)
				inner.frames[0]?.add(capture.binding)
			}
			state.regions.push(inner)
			checkBody(state, node.body)
			state.regions.pop()
			if (stmt.handle !== undefined) defineRef(state, node, stmt.handle)
			return
		}
	}
}

/**
 * Collect the structural problems of one function.
 */
export function validateFunction(fn: FunctionDef, facts: TypeFactsTable): Diagnostic[] {
	const state: ValidationState = {
		bodies: [],
		facts,
		fn,
		issues: [],
		mixed: new Set(),
		regions: [newRegion()],
	}
	checkBody(state, indexFunction(fn).statements)
	return state.issues
}

/**
 * Validate every function of a program.
 *
 * @throws {InvalidProgramError} if any function is malformed
 */
export function validateProgram(program: Program, facts: TypeFactsTable): void {
	const issues = program.functions.flatMap((fn) => validateFunction(fn, facts))
	if (issues.length > 0) throw new InvalidProgramError(issues)
}
