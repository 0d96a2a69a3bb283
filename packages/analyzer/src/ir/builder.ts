/**
 * Fluent construction of programs, for front ends and tests.
 *
 * @example
 * ```ts
 * const program = new ProgramBuilder()
 *   .function('main', (body) =>
 *     body
 *       .declare('v', 'Vec', { init: fresh(), mutable: true })
 *       .borrowShared('v', 'first')
 *       .call('push', [exclusive('v')])
 *       .use('first')
 *   )
 *   .build()
 * ```
 */

import {
	type Argument,
	type CallExpr,
	type Capture,
	CaptureMode,
	type Expr,
	ExprKind,
	type FunctionDef,
	PassMode,
	type Program,
	type SourceLocation,
	type SpawnTarget,
	type Statement,
	StmtKind,
} from './nodes.ts'

// ============================================================================
// Expressions, arguments and captures
// ============================================================================

export function fresh(): Expr {
	return { kind: ExprKind.Fresh }
}

export function read(name: string): Expr {
	return { kind: ExprKind.Read, name }
}

export function take(name: string): Expr {
	return { kind: ExprKind.Move, name }
}

export function callOf(callee: string, args: readonly Argument[] = []): CallExpr {
	return { args, callee, kind: ExprKind.Call }
}

export function byValue(name: string): Argument {
	return { mode: PassMode.Value, name }
}

export function shared(name: string): Argument {
	return { mode: PassMode.Shared, name }
}

export function exclusive(name: string): Argument {
	return { mode: PassMode.Exclusive, name }
}

export function captureMove(binding: string): Capture {
	return { binding, mode: CaptureMode.ByMove, mutable: false }
}

export function captureRef(binding: string): Capture {
	return { binding, mode: CaptureMode.ByReference, mutable: false }
}

export function captureMut(binding: string): Capture {
	return { binding, mode: CaptureMode.ByReference, mutable: true }
}

// ============================================================================
// Bodies
// ============================================================================

export interface DeclareOptions {
	readonly mutable?: boolean
	readonly init?: Expr
	readonly loc?: SourceLocation
}

export interface SpawnOptions {
	readonly target?: SpawnTarget
	readonly handle?: string
	readonly loc?: SourceLocation
}

type BodyBuild = (body: BodyBuilder) => unknown

function located(loc: SourceLocation | undefined): { loc?: SourceLocation } {
	return loc ? { loc } : {}
}

export class BodyBuilder {
	private readonly statements: Statement[] = []

	declare(binding: string, type: string, options: DeclareOptions = {}): this {
		return this.push({
			binding,
			kind: StmtKind.Declare,
			mutable: options.mutable ?? false,
			type,
			...(options.init ? { init: options.init } : {}),
			...located(options.loc),
		})
	}

	assign(binding: string, value: Expr, loc?: SourceLocation): this {
		return this.push({ binding, kind: StmtKind.Assign, value, ...located(loc) })
	}

	move(source: string, destination: string, loc?: SourceLocation): this {
		return this.push({ destination, kind: StmtKind.Move, source, ...located(loc) })
	}

	borrowShared(binding: string, ref: string, loc?: SourceLocation): this {
		return this.push({ binding, kind: StmtKind.BorrowShared, ref, ...located(loc) })
	}

	borrowExclusive(binding: string, ref: string, loc?: SourceLocation): this {
		return this.push({ binding, kind: StmtKind.BorrowExclusive, ref, ...located(loc) })
	}

	use(name: string, loc?: SourceLocation): this {
		return this.push({ kind: StmtKind.Use, name, ...located(loc) })
	}

	call(callee: string, args: readonly Argument[] = [], loc?: SourceLocation): this {
		return this.push({ args, callee, kind: StmtKind.Call, ...located(loc) })
	}

	spawn(captures: readonly Capture[], build: BodyBuild, options: SpawnOptions = {}): this {
		return this.push({
			body: nested(build),
			captures,
			kind: StmtKind.SpawnClosure,
			target: options.target ?? 'thread',
			...(options.handle !== undefined ? { handle: options.handle } : {}),
			...located(options.loc),
		})
	}

	/** A closure that runs on the spawning thread. */
	closure(captures: readonly Capture[], build: BodyBuild, options: SpawnOptions = {}): this {
		return this.spawn(captures, build, { ...options, target: 'local' })
	}

	enterScope(loc?: SourceLocation): this {
		return this.push({ kind: StmtKind.EnterScope, ...located(loc) })
	}

	exitScope(loc?: SourceLocation): this {
		return this.push({ kind: StmtKind.ExitScope, ...located(loc) })
	}

	/** `EnterScope`, the statements added by `build`, then `ExitScope`. */
	scope(build: BodyBuild): this {
		this.enterScope()
		build(this)
		return this.exitScope()
	}

	loop(build: BodyBuild, loc?: SourceLocation): this {
		return this.push({ body: nested(build), kind: StmtKind.Loop, ...located(loc) })
	}

	/** Append an already built statement. */
	push(stmt: Statement): this {
		this.statements.push(stmt)
		return this
	}

	build(): Statement[] {
		return [...this.statements]
	}
}

function nested(build: BodyBuild): Statement[] {
	const body = new BodyBuilder()
	build(body)
	return body.build()
}

export class ProgramBuilder {
	private readonly functions: FunctionDef[] = []

	function(name: string, build: BodyBuild, endLoc?: SourceLocation): this {
		this.functions.push({ body: nested(build), name, ...(endLoc ? { endLoc } : {}) })
		return this
	}

	build(): Program {
		return { functions: [...this.functions] }
	}
}
