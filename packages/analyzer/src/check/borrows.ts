/**
 * Borrow tracker: the active borrow set of every binding in one region.
 *
 * Invariant: a binding's set is empty, holds only Shared borrows, or holds
 * exactly one Exclusive borrow.
 */

import type { Holder } from './faults.ts'
import { type BindingId, type BorrowId, BorrowKind, borrowId } from './types.ts'

/**
 * What keeps a borrow alive: a named reference, a call in progress, or a
 * closure/thread capture.
 */
export type HolderKind = 'ref' | 'call' | 'closure' | 'thread'

export interface Borrow {
	readonly id: BorrowId
	readonly target: BindingId
	readonly kind: BorrowKind
	/** Position of the statement that created the borrow */
	readonly origin: number
	/** Last position at which the borrow is still needed */
	readonly liveUntil: number
	readonly holderKind: HolderKind
	/** Reference or handle name, or the callee for call temporaries */
	readonly holderName: string
}

export interface BorrowRequest {
	readonly target: BindingId
	readonly at: number
	readonly liveUntil: number
	readonly holderKind: HolderKind
	readonly holderName: string
}

export type BorrowOutcome =
	| { readonly granted: true; readonly borrow: Borrow }
	| { readonly granted: false; readonly existing: Borrow }

/**
 * Read-only view used by the ownership store to refuse moves and writes.
 */
export interface BorrowView {
	firstHolder(target: BindingId): Holder | null
}

export function describeHolder(borrow: Borrow): Holder {
	const name = borrow.holderName
	switch (borrow.holderKind) {
		case 'ref':
			return { label: `\`${name}\``, name }
		case 'call':
			return { label: `the call to \`${name}\``, name }
		case 'closure':
			return { label: name === '' ? 'a closure' : `closure \`${name}\``, name }
		case 'thread':
			return { label: name === '' ? 'a spawned thread' : `thread \`${name}\``, name }
	}
}

export class BorrowTracker implements BorrowView {
	private nextId = 0
	private readonly active: Map<BorrowId, Borrow> = new Map()
	private readonly byTarget: Map<BindingId, BorrowId[]> = new Map()

	borrowShared(request: BorrowRequest): BorrowOutcome {
		const exclusive = this.exclusiveOf(request.target)
		if (exclusive !== undefined) return { existing: exclusive, granted: false }
		return { borrow: this.add(request, BorrowKind.Shared), granted: true }
	}

	borrowExclusive(request: BorrowRequest): BorrowOutcome {
		const [existing] = this.borrowsOf(request.target)
		if (existing !== undefined) return { existing, granted: false }
		return { borrow: this.add(request, BorrowKind.Exclusive), granted: true }
	}

	expire(id: BorrowId): boolean {
		const borrow = this.active.get(id)
		if (borrow === undefined) return false
		this.active.delete(id)
		const ids = this.byTarget.get(borrow.target)
		if (ids !== undefined) {
			const remaining = ids.filter((other) => other !== id)
			if (remaining.length === 0) this.byTarget.delete(borrow.target)
			else this.byTarget.set(borrow.target, remaining)
		}
		return true
	}

	/** Expire every borrow matching the predicate; returns what was removed. */
	expireWhere(predicate: (borrow: Borrow) => boolean): Borrow[] {
		const expired = [...this.active.values()].filter(predicate)
		for (const borrow of expired) this.expire(borrow.id)
		return expired
	}

	/** Expire borrows whose live range ended before `position`. */
	expireBefore(position: number): Borrow[] {
		return this.expireWhere((borrow) => borrow.liveUntil < position)
	}

	has(id: BorrowId): boolean {
		return this.active.has(id)
	}

	get(id: BorrowId): Borrow | undefined {
		return this.active.get(id)
	}

	borrowsOf(target: BindingId): Borrow[] {
		const ids = this.byTarget.get(target) ?? []
		const borrows: Borrow[] = []
		for (const id of ids) {
			const borrow = this.active.get(id)
			if (borrow !== undefined) borrows.push(borrow)
		}
		return borrows
	}

	isBorrowed(target: BindingId): boolean {
		return this.byTarget.has(target)
	}

	exclusiveOf(target: BindingId): Borrow | undefined {
		return this.borrowsOf(target).find((borrow) => borrow.kind === BorrowKind.Exclusive)
	}

	firstHolder(target: BindingId): Holder | null {
		const [first] = this.borrowsOf(target)
		return first === undefined ? null : describeHolder(first)
	}

	count(): number {
		return this.active.size
	}

	*[Symbol.iterator](): Generator<Borrow> {
		yield* this.active.values()
	}

	private add(request: BorrowRequest, kind: BorrowKind): Borrow {
		const borrow: Borrow = {
			holderKind: request.holderKind,
			holderName: request.holderName,
			id: borrowId(this.nextId++),
			kind,
			liveUntil: request.liveUntil,
			origin: request.at,
			target: request.target,
		}
		this.active.set(borrow.id, borrow)
		const ids = this.byTarget.get(request.target)
		if (ids === undefined) this.byTarget.set(request.target, [borrow.id])
		else ids.push(borrow.id)
		return borrow
	}
}
