/**
 * Checker state: everything one function analysis threads through the
 * traversal. Built per function and discarded afterwards.
 */

import type { TypeFactsTable } from '../facts/type-facts.ts'
import type { SourceLocation } from '../ir/nodes.ts'
import type { IndexedFunction } from '../ir/positions.ts'
import { BorrowTracker } from './borrows.ts'
import type { LiveRanges } from './liveness.ts'
import type { AnalyzerOptions } from './options.ts'
import { type BindingSpec, OwnershipStore } from './ownership.ts'
import type { BindingId, BorrowId, BorrowKind, OwnershipState } from './types.ts'

export type ScopeKind = 'function' | 'block' | 'loop' | 'closure'

export interface ScopeFrame {
	readonly kind: ScopeKind
	/** Bindings in declaration order */
	readonly bindings: BindingId[]
	/** Visible name → latest binding declared under it in this frame */
	readonly names: Map<string, BindingId>
	/** Capture borrows of handle-less closures spawned in this scope */
	readonly heldBorrows: BorrowId[]
}

/**
 * One ownership store and borrow tracker pair. The function body is a
 * region; each closure body is analyzed as a region of its own.
 */
export interface Region {
	readonly ownership: OwnershipStore
	readonly borrows: BorrowTracker
	readonly frames: ScopeFrame[]
	/** Borrows currently bound to each reference or handle name */
	readonly refs: Map<string, readonly BorrowId[]>
}

export interface CheckerState {
	readonly fn: IndexedFunction
	readonly facts: TypeFactsTable
	readonly options: AnalyzerOptions
	readonly liveness: LiveRanges
	readonly region: Region
	/** Source location of each statement that has one, by position */
	readonly locations: ReadonlyMap<number, SourceLocation>
	/** Binding names in the order they were dropped */
	readonly dropped: string[]
}

export function createRegion(facts: TypeFactsTable, options: AnalyzerOptions): Region {
	const borrows = new BorrowTracker()
	return {
		borrows,
		frames: [],
		ownership: new OwnershipStore(facts, options, borrows),
		refs: new Map(),
	}
}

export function pushFrame(state: CheckerState, kind: ScopeKind): ScopeFrame {
	const frame: ScopeFrame = { bindings: [], heldBorrows: [], kind, names: new Map() }
	state.region.frames.push(frame)
	return frame
}

export function currentFrame(state: CheckerState): ScopeFrame {
	const frame = state.region.frames.at(-1)
	if (frame === undefined) throw new Error('No open scope')
	return frame
}

export function declareInFrame(state: CheckerState, spec: BindingSpec): BindingId {
	const id = state.region.ownership.declare(spec)
	const frame = currentFrame(state)
	frame.bindings.push(id)
	frame.names.set(spec.name, id)
	return id
}

export function locationOf(state: CheckerState, position: number): SourceLocation | undefined {
	return state.locations.get(position)
}

/**
 * Rebinding a reference or handle name ends the borrows it held.
 */
export function releaseHolder(state: CheckerState, name: string): void {
	const { borrows, refs } = state.region
	for (const id of refs.get(name) ?? []) borrows.expire(id)
	refs.delete(name)
}

export function bindHolder(state: CheckerState, name: string, borrows: readonly BorrowId[]): void {
	releaseHolder(state, name)
	state.region.refs.set(name, borrows)
}

/**
 * Innermost visible binding with this name, or null.
 */
export function lookupBinding(state: CheckerState, name: string): BindingId | null {
	const frames = state.region.frames
	for (let i = frames.length - 1; i >= 0; i--) {
		const id = frames[i]?.names.get(name)
		if (id !== undefined) return id
	}
	return null
}

export function resolveBinding(state: CheckerState, name: string): BindingId {
	const id = lookupBinding(state, name)
	if (id === null) throw new Error(`Unresolved binding: ${name}`)
	return id
}

export function isReference(state: CheckerState, name: string): boolean {
	return state.region.refs.has(name)
}

// ============================================================================
// Snapshots (loop fixed-point detection)
// ============================================================================

export interface BorrowSignature {
	readonly target: BindingId
	readonly kind: BorrowKind
	readonly origin: number
}

export interface RegionSnapshot {
	readonly states: ReadonlyMap<BindingId, OwnershipState>
	/** Keyed by `target:kind:origin`; borrow identity is not compared */
	readonly borrows: ReadonlyMap<string, BorrowSignature>
}

export function snapshotRegion(region: Region): RegionSnapshot {
	const borrows = new Map<string, BorrowSignature>()
	for (const borrow of region.borrows) {
		const signature = { kind: borrow.kind, origin: borrow.origin, target: borrow.target }
		borrows.set(`${borrow.target}:${borrow.kind}:${borrow.origin}`, signature)
	}
	return { borrows, states: region.ownership.snapshot() }
}

export function sameSnapshot(a: RegionSnapshot, b: RegionSnapshot): boolean {
	if (a.states.size !== b.states.size || a.borrows.size !== b.borrows.size) return false
	for (const [id, state] of a.states) {
		if (b.states.get(id) !== state) return false
	}
	for (const key of a.borrows.keys()) {
		if (!b.borrows.has(key)) return false
	}
	return true
}
