/**
 * Ownership and borrow checking.
 */

export type { BorrowAttempt, BorrowHolder } from './access.ts'
export {
	type Borrow,
	type BorrowOutcome,
	type BorrowRequest,
	BorrowTracker,
	describeHolder,
	type HolderKind,
} from './borrows.ts'
export {
	type CaptureInput,
	type CaptureVerdict,
	checkThreadCaptures,
	THREAD_CAPTURE_RULES,
	type ThreadCapture,
} from './capture.ts'
export { checkFunction, type FunctionCheck } from './checker.ts'
export { type Decision, type DecisionRule, type DecisionTable, decide } from './dispatch.ts'
export type { Holder } from './faults.ts'
export { computeLiveRanges, LiveRanges } from './liveness.ts'
export {
	type AnalyzerOptions,
	DEFAULT_OPTIONS,
	InvalidOptionsError,
	resolveOptions,
} from './options.ts'
export { type BindingRecord, type BindingSpec, OwnershipStore } from './ownership.ts'
export {
	type BindingAccess,
	type BindingId,
	type BorrowId,
	BorrowKind,
	bindingId,
	borrowId,
	ERROR_CODES,
	ErrorKind,
	type Fault,
	OwnershipState,
	type Violation,
} from './types.ts'
