/**
 * Live-range computation for references and closure/thread handles.
 *
 * A definition is the statement that binds a reference name (a borrow) or a
 * handle name (a spawn). Its live range ends at the last position that uses
 * the name while it is still bound to that definition. A use inside a loop
 * that did not contain the definition keeps the definition alive until the
 * end of that loop, since the next iteration uses it again.
 *
 * A definition made inside a loop whose name is used earlier in the same
 * loop body is loop-carried: the next iteration reads it before rebinding
 * it, so it survives the back edge, and the back edge of every loop nested
 * in that one which also contains the definition.
 */

import { type Expr, namesInExpr, StmtKind } from '../ir/nodes.ts'
import type { IndexedFunction, IndexedStatement } from '../ir/positions.ts'

interface LoopExtent {
	readonly start: number
	readonly end: number
	readonly region: Map<string, number>
	/** Names used in the body before the body defines them */
	readonly exposed: Set<string>
	readonly defined: Set<string>
}

interface WalkState {
	/** Current definition per name, one map per region (function or closure body) */
	readonly regions: Map<string, number>[]
	readonly loops: LoopExtent[]
	readonly lastUse: Map<number, number>
	/** Definition → start positions of the loops carrying it */
	readonly carried: Map<number, Set<number>>
	/** Definition → start positions of the loops around it, in its region */
	readonly enclosing: Map<number, readonly number[]>
}

export class LiveRanges {
	private readonly lastUse: ReadonlyMap<number, number>
	private readonly carried: ReadonlyMap<number, ReadonlySet<number>>

	constructor(
		lastUse: ReadonlyMap<number, number>,
		carried: ReadonlyMap<number, ReadonlySet<number>>
	) {
		this.lastUse = lastUse
		this.carried = carried
	}

	/** Whether the definition stays live across the back edge of the loop at `loop`. */
	isCarriedBy(definition: number, loop: number): boolean {
		return this.carried.get(definition)?.has(loop) ?? false
	}

	/** Last position needing the definition made at `definition`. */
	liveUntil(definition: number): number {
		return this.lastUse.get(definition) ?? definition
	}

	definitions(): number[] {
		return [...this.lastUse.keys()]
	}
}

function currentRegion(state: WalkState): Map<string, number> {
	const region = state.regions.at(-1)
	if (region === undefined) throw new Error('Liveness walk has no open region')
	return region
}

function extend(definition: number, until: number, state: WalkState): void {
	const previous = state.lastUse.get(definition) ?? definition
	state.lastUse.set(definition, Math.max(previous, until))
}

function define(name: string, position: number, state: WalkState): void {
	const region = currentRegion(state)
	region.set(name, position)
	if (!state.lastUse.has(position)) state.lastUse.set(position, position)
	const enclosing: number[] = []
	for (const loop of state.loops) {
		if (loop.region !== region) continue
		loop.defined.add(name)
		enclosing.push(loop.start)
	}
	state.enclosing.set(position, enclosing)
}

function use(name: string, position: number, state: WalkState): void {
	const region = currentRegion(state)
	for (const loop of state.loops) {
		if (loop.region === region && !loop.defined.has(name)) loop.exposed.add(name)
	}

	const definition = region.get(name)
	if (definition === undefined) return

	let until = position
	// Outermost loop entered after the definition decides the extension
	const loop = state.loops.find((extent) => extent.start > definition)
	if (loop !== undefined) until = Math.max(until, loop.end)
	extend(definition, until, state)
}

function closeLoop(loop: LoopExtent, state: WalkState): void {
	for (const name of loop.exposed) {
		const definition = loop.region.get(name)
		if (definition === undefined || definition <= loop.start) continue
		const loops = state.carried.get(definition) ?? new Set<number>()
		for (const start of state.enclosing.get(definition) ?? []) {
			if (start >= loop.start) loops.add(start)
		}
		state.carried.set(definition, loops)
		extend(definition, loop.end, state)
	}
}

function useExpr(expr: Expr, position: number, state: WalkState): void {
	for (const name of namesInExpr(expr)) use(name, position, state)
}

function walk(nodes: readonly IndexedStatement[], state: WalkState): void {
	for (const node of nodes) walkStatement(node, state)
}

function walkStatement(node: IndexedStatement, state: WalkState): void {
	const { stmt, position } = node
	switch (stmt.kind) {
		case StmtKind.Declare:
			if (stmt.init) useExpr(stmt.init, position, state)
			return
		case StmtKind.Assign:
			useExpr(stmt.value, position, state)
			return
		case StmtKind.BorrowShared:
		case StmtKind.BorrowExclusive:
			define(stmt.ref, position, state)
			return
		case StmtKind.Use:
			use(stmt.name, position, state)
			return
		case StmtKind.Call:
			for (const arg of stmt.args) use(arg.name, position, state)
			return
		case StmtKind.Loop: {
			const loop: LoopExtent = {
				defined: new Set(),
				end: node.end,
				exposed: new Set(),
				region: currentRegion(state),
				start: position,
			}
			state.loops.push(loop)
			walk(node.body, state)
			state.loops.pop()
			closeLoop(loop, state)
			return
		}
		case StmtKind.SpawnClosure:
			state.regions.push(new Map())
			walk(node.body, state)
			state.regions.pop()
			if (stmt.handle !== undefined) define(stmt.handle, position, state)
			return
		case StmtKind.Move:
		case StmtKind.EnterScope:
		case StmtKind.ExitScope:
			return
	}
}

export function computeLiveRanges(fn: IndexedFunction): LiveRanges {
	const state: WalkState = {
		carried: new Map(),
		enclosing: new Map(),
		lastUse: new Map(),
		loops: [],
		regions: [new Map()],
	}
	walk(fn.statements, state)
	return new LiveRanges(state.lastUse, state.carried)
}
