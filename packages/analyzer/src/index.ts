/**
 * tether analyzer public API
 *
 * Static ownership and borrow analysis over a small imperative IR:
 * - Per-function ownership store and borrow tracker, no shared state
 * - Live ranges from a separate liveness pass over numbered statements
 * - Loop bodies replayed to a fixed point
 * - Thread captures classified by a first-match decision table
 */

export {
	type AnalysisResult,
	analyze,
	analyzeFunction,
	type FunctionReport,
} from './analyze.ts'
export {
	type AnalyzerOptions,
	type BindingId,
	type BorrowId,
	BorrowKind,
	DEFAULT_OPTIONS,
	ErrorKind,
	InvalidOptionsError,
	OwnershipState,
	resolveOptions,
	THREAD_CAPTURE_RULES,
} from './check/index.ts'
export {
	AnalysisContext,
	type AnalysisDiagnostic,
	type Diagnostic,
	type DiagnosticSite,
} from './core/index.ts'
export {
	compositeFacts,
	SharingKind,
	sharedFacts,
	type TypeFacts,
	TypeFactsTable,
	type TypeShape,
	UnknownTypeError,
} from './facts/type-facts.ts'
export {
	BodyBuilder,
	byValue,
	callOf,
	captureMove,
	captureMut,
	captureRef,
	type DeclareOptions,
	exclusive,
	fresh,
	ProgramBuilder,
	read,
	type SpawnOptions,
	shared,
	take,
} from './ir/builder.ts'
export {
	type Argument,
	type AssignStmt,
	type BodyStmt,
	type BorrowExclusiveStmt,
	type BorrowSharedStmt,
	type CallExpr,
	type CallStmt,
	type Capture,
	CaptureMode,
	type DeclareStmt,
	type EnterScopeStmt,
	type ExitScopeStmt,
	type Expr,
	ExprKind,
	type FreshExpr,
	type FunctionDef,
	type LoopStmt,
	type MoveExpr,
	type MoveStmt,
	PassMode,
	type Program,
	type ReadExpr,
	type SourceLocation,
	type SpawnClosureStmt,
	type SpawnTarget,
	type Statement,
	StmtKind,
	type UseStmt,
} from './ir/nodes.ts'
export { type IndexedFunction, type IndexedStatement, indexFunction } from './ir/positions.ts'
export { InvalidProgramError, validateFunction, validateProgram } from './ir/validate.ts'
