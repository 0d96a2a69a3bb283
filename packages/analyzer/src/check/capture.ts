/**
 * Capture-safety classification for closures spawned onto threads.
 *
 * Runs after the captures went through the ordinary borrow and move rules,
 * so it only adds the type-level layer: can this value cross a thread
 * boundary the way it is captured.
 */

import type { TypeFacts } from '../facts/type-facts.ts'
import { CaptureMode } from '../ir/nodes.ts'
import { type DecisionTable, decide } from './dispatch.ts'
import { unsafeCrossThreadMove, unsafeCrossThreadShare } from './faults.ts'
import { ErrorKind, type Fault } from './types.ts'

export interface CaptureInput {
	readonly mode: CaptureMode
	readonly mutable: boolean
	readonly facts: TypeFacts
	/** The capture's borrow is the only live borrow of the binding */
	readonly soleBorrow: boolean
}

export type CaptureVerdict =
	| typeof ErrorKind.UnsafeCrossThreadMove
	| typeof ErrorKind.UnsafeCrossThreadShare
	| 'accepted'

export const THREAD_CAPTURE_RULES: DecisionTable<CaptureInput, CaptureVerdict> = {
	otherwise: 'accepted',
	rules: [
		{
			name: 'moved value must be sendable',
			then: ErrorKind.UnsafeCrossThreadMove,
			when: (c) => c.mode === CaptureMode.ByMove && !c.facts.isThreadSafeMove,
		},
		{
			name: 'moved value',
			then: 'accepted',
			when: (c) => c.mode === CaptureMode.ByMove,
		},
		{
			name: 'shared reference must be shareable',
			then: ErrorKind.UnsafeCrossThreadShare,
			when: (c) => !c.mutable && !c.facts.isThreadSafeShared,
		},
		// Never fires from a spawn: an exclusive capture of a borrowed binding
		// is refused as a conflict before classification
		{
			name: 'exclusive reference must be the only borrow',
			then: ErrorKind.UnsafeCrossThreadShare,
			when: (c) => c.mutable && !c.soleBorrow,
		},
	],
}

export interface ThreadCapture extends CaptureInput {
	readonly binding: string
	readonly typeName: string
}

/**
 * First capture that cannot cross into another thread, in capture order.
 */
export function checkThreadCaptures(captures: readonly ThreadCapture[]): Fault | null {
	for (const capture of captures) {
		const { outcome } = decide(THREAD_CAPTURE_RULES, capture)
		if (outcome === ErrorKind.UnsafeCrossThreadMove) {
			return unsafeCrossThreadMove(capture.binding, capture.typeName)
		}
		if (outcome === ErrorKind.UnsafeCrossThreadShare) {
			return unsafeCrossThreadShare(capture.binding, capture.typeName)
		}
	}
	return null
}
