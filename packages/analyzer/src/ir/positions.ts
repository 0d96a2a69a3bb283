/**
 * Pre-order statement numbering.
 *
 * Every statement of a function, nested loop and closure bodies included,
 * gets a position. Diagnostics and live ranges are expressed in positions.
 */

import type { FunctionDef, SourceLocation, Statement } from './nodes.ts'
import { bodyOf } from './nodes.ts'

export interface IndexedStatement {
	readonly stmt: Statement
	readonly position: number
	/** Last position inside this statement's subtree (== position for leaves) */
	readonly end: number
	readonly body: readonly IndexedStatement[]
}

export interface IndexedFunction {
	readonly name: string
	readonly statements: readonly IndexedStatement[]
	/** Position of the function's closing boundary (one past the last statement) */
	readonly exitPosition: number
	readonly endLoc?: SourceLocation
}

function indexBody(stmts: readonly Statement[], counter: { next: number }): IndexedStatement[] {
	return stmts.map((stmt) => {
		const position = counter.next++
		const body = indexBody(bodyOf(stmt), counter)
		return { body, end: counter.next - 1, position, stmt }
	})
}

export function indexFunction(fn: FunctionDef): IndexedFunction {
	const counter = { next: 0 }
	const statements = indexBody(fn.body, counter)
	return {
		exitPosition: counter.next,
		name: fn.name,
		statements,
		...(fn.endLoc ? { endLoc: fn.endLoc } : {}),
	}
}

/**
 * Walk indexed statements in pre-order.
 */
export function* walkIndexed(stmts: readonly IndexedStatement[]): Generator<IndexedStatement> {
	for (const node of stmts) {
		yield node
		yield* walkIndexed(node.body)
	}
}
