/**
 * Program representation consumed by the analyzer.
 *
 * Built by an external front end (or by `ProgramBuilder`). There is no
 * source syntax here: statements are plain tagged objects, ordered per body.
 */

/**
 * Statement kinds.
 */
export const StmtKind = {
	Assign: 'Assign',
	BorrowExclusive: 'BorrowExclusive',
	BorrowShared: 'BorrowShared',
	Call: 'Call',
	Declare: 'Declare',
	EnterScope: 'EnterScope',
	ExitScope: 'ExitScope',
	Loop: 'Loop',
	Move: 'Move',
	SpawnClosure: 'SpawnClosure',
	Use: 'Use',
} as const

export type StmtKind = (typeof StmtKind)[keyof typeof StmtKind]

/**
 * Expression kinds (initializers and assigned values).
 */
export const ExprKind = {
	/** Call result - a freshly owned value */
	Call: 'Call',
	/** A freshly owned value with no inputs */
	Fresh: 'Fresh',
	/** Value use of a binding: moves it unless its type is Copy */
	Move: 'Move',
	/** Copy out of a binding, or dereference a reference */
	Read: 'Read',
} as const

export type ExprKind = (typeof ExprKind)[keyof typeof ExprKind]

/**
 * How a call argument is passed.
 */
export const PassMode = {
	Exclusive: 'exclusive',
	Shared: 'shared',
	Value: 'value',
} as const

export type PassMode = (typeof PassMode)[keyof typeof PassMode]

/**
 * How a closure body binds an outer binding.
 */
export const CaptureMode = {
	ByMove: 'ByMove',
	ByReference: 'ByReference',
} as const

export type CaptureMode = (typeof CaptureMode)[keyof typeof CaptureMode]

/**
 * Where a closure body runs. Only thread targets are checked for
 * cross-thread safety.
 */
export type SpawnTarget = 'thread' | 'local'

/** Location in the front end's source, forwarded into diagnostics as-is. */
export interface SourceLocation {
	readonly line: number
	readonly column: number
}

export interface Argument {
	readonly name: string
	readonly mode: PassMode
}

export interface Capture {
	readonly binding: string
	readonly mode: CaptureMode
	/** Only meaningful for by-reference captures */
	readonly mutable: boolean
}

export interface FreshExpr {
	readonly kind: typeof ExprKind.Fresh
}

export interface ReadExpr {
	readonly kind: typeof ExprKind.Read
	readonly name: string
}

export interface MoveExpr {
	readonly kind: typeof ExprKind.Move
	readonly name: string
}

export interface CallExpr {
	readonly kind: typeof ExprKind.Call
	readonly callee: string
	readonly args: readonly Argument[]
}

export type Expr = FreshExpr | ReadExpr | MoveExpr | CallExpr

interface StmtBase {
	readonly loc?: SourceLocation
}

export interface DeclareStmt extends StmtBase {
	readonly kind: typeof StmtKind.Declare
	readonly binding: string
	readonly type: string
	readonly mutable: boolean
	readonly init?: Expr
}

export interface AssignStmt extends StmtBase {
	readonly kind: typeof StmtKind.Assign
	readonly binding: string
	readonly value: Expr
}

export interface MoveStmt extends StmtBase {
	readonly kind: typeof StmtKind.Move
	readonly source: string
	readonly destination: string
}

export interface BorrowSharedStmt extends StmtBase {
	readonly kind: typeof StmtKind.BorrowShared
	readonly binding: string
	readonly ref: string
}

export interface BorrowExclusiveStmt extends StmtBase {
	readonly kind: typeof StmtKind.BorrowExclusive
	readonly binding: string
	readonly ref: string
}

export interface UseStmt extends StmtBase {
	readonly kind: typeof StmtKind.Use
	/** A reference, a closure/thread handle or a binding */
	readonly name: string
}

export interface CallStmt extends StmtBase {
	readonly kind: typeof StmtKind.Call
	readonly callee: string
	readonly args: readonly Argument[]
}

export interface SpawnClosureStmt extends StmtBase {
	readonly kind: typeof StmtKind.SpawnClosure
	readonly captures: readonly Capture[]
	readonly body: readonly Statement[]
	readonly target: SpawnTarget
	readonly handle?: string
}

export interface EnterScopeStmt extends StmtBase {
	readonly kind: typeof StmtKind.EnterScope
}

export interface ExitScopeStmt extends StmtBase {
	readonly kind: typeof StmtKind.ExitScope
}

export interface LoopStmt extends StmtBase {
	readonly kind: typeof StmtKind.Loop
	readonly body: readonly Statement[]
}

export type Statement =
	| DeclareStmt
	| AssignStmt
	| MoveStmt
	| BorrowSharedStmt
	| BorrowExclusiveStmt
	| UseStmt
	| CallStmt
	| SpawnClosureStmt
	| EnterScopeStmt
	| ExitScopeStmt
	| LoopStmt

/** Statements that own a nested body. */
export type BodyStmt = SpawnClosureStmt | LoopStmt

export interface FunctionDef {
	readonly name: string
	readonly body: readonly Statement[]
	/** Location of the function's closing boundary */
	readonly endLoc?: SourceLocation
}

export interface Program {
	readonly functions: readonly FunctionDef[]
}

/**
 * Nested body of a statement, or an empty list.
 */
export function bodyOf(stmt: Statement): readonly Statement[] {
	return stmt.kind === StmtKind.Loop || stmt.kind === StmtKind.SpawnClosure ? stmt.body : []
}

/**
 * Names an expression reads, moves or passes, in evaluation order.
 */
export function namesInExpr(expr: Expr): string[] {
	switch (expr.kind) {
		case ExprKind.Fresh:
			return []
		case ExprKind.Read:
		case ExprKind.Move:
			return [expr.name]
		case ExprKind.Call:
			return expr.args.map((arg) => arg.name)
	}
}
