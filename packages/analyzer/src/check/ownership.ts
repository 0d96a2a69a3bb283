/**
 * Ownership store: the state machine of every binding in one region.
 */

import type { TypeFactsTable } from '../facts/type-facts.ts'
import type { BorrowView } from './borrows.ts'
import {
	borrowWhileMoving,
	type Holder,
	mutabilityViolation,
	mutateWhileBorrowed,
	useAfterMove,
	useOfUninitialized,
} from './faults.ts'
import type { AnalyzerOptions } from './options.ts'
import {
	type BindingAccess,
	type BindingId,
	bindingId,
	type Fault,
	OwnershipState,
} from './types.ts'

export interface BindingRecord {
	readonly id: BindingId
	readonly name: string
	readonly typeName: string
	readonly mutable: boolean
	readonly access: BindingAccess
	readonly declaredAt: number
	state: OwnershipState
	/** Position of the move that invalidated the binding */
	movedAt: number | null
	/** False once the declaring scope has closed */
	inScope: boolean
}

export interface BindingSpec {
	readonly name: string
	readonly typeName: string
	readonly mutable: boolean
	readonly access?: BindingAccess
	readonly at: number
	/** Declare directly as Owned (closure captures) */
	readonly initialized?: boolean
}

const CAPTURE_HOLDER: Holder = { label: "the closure's capture", name: '' }

export class OwnershipStore {
	private readonly records: BindingRecord[] = []
	private readonly facts: TypeFactsTable
	private readonly options: AnalyzerOptions
	private readonly borrows: BorrowView

	constructor(facts: TypeFactsTable, options: AnalyzerOptions, borrows: BorrowView) {
		this.facts = facts
		this.options = options
		this.borrows = borrows
	}

	declare(spec: BindingSpec): BindingId {
		const id = bindingId(this.records.length)
		this.records.push({
			access: spec.access ?? 'owned',
			declaredAt: spec.at,
			id,
			inScope: true,
			movedAt: null,
			mutable: spec.mutable,
			name: spec.name,
			state: spec.initialized ? OwnershipState.Owned : OwnershipState.Uninitialized,
			typeName: spec.typeName,
		})
		return id
	}

	get(id: BindingId): BindingRecord {
		const record = this.records[id]
		if (record === undefined) throw new Error(`Invalid BindingId: ${id}`)
		return record
	}

	/** Whether moves of this binding leave it usable. */
	isCopy(id: BindingId): boolean {
		return this.options.treatCopyTypesAsExempt && this.facts.get(this.get(id).typeName).isCopy
	}

	initialize(id: BindingId): Fault | null {
		const record = this.get(id)
		if (record.state === OwnershipState.Moved) return useAfterMove(record.name)
		if (record.state !== OwnershipState.Uninitialized) {
			throw new Error(`Binding ${record.name} initialized twice`)
		}
		record.state = OwnershipState.Owned
		return null
	}

	read(id: BindingId): Fault | null {
		return this.requireOwned(this.get(id))
	}

	/** Overwrite an initialized binding. */
	write(id: BindingId): Fault | null {
		const record = this.get(id)
		const fault = this.requireOwned(record)
		if (fault) return fault
		if (!this.isWritable(record)) return mutabilityViolation(record.name, 'assign to')
		const holder = this.borrows.firstHolder(id)
		if (holder !== null) return mutateWhileBorrowed(record.name, holder)
		return null
	}

	moveOut(id: BindingId, at: number): Fault | null {
		const record = this.get(id)
		const fault = this.requireOwned(record)
		if (fault) return fault
		if (this.isCopy(id)) return null
		if (record.access !== 'owned') return borrowWhileMoving(record.name, CAPTURE_HOLDER)
		const holder = this.borrows.firstHolder(id)
		if (holder !== null) return borrowWhileMoving(record.name, holder)
		record.state = OwnershipState.Moved
		record.movedAt = at
		return null
	}

	/** Scope exit. Moved bindings stay Moved. */
	drop(id: BindingId): void {
		const record = this.get(id)
		record.inScope = false
		if (record.state === OwnershipState.Moved) return
		record.state = OwnershipState.Dropped
	}

	/** Whether the region may take exclusive access to the binding. */
	isWritable(record: BindingRecord): boolean {
		switch (record.access) {
			case 'owned':
				return record.mutable
			case 'exclusive-capture':
				return true
			case 'shared-capture':
				return false
		}
	}

	/** States of all bindings whose scope is still open. */
	snapshot(): Map<BindingId, OwnershipState> {
		const states = new Map<BindingId, OwnershipState>()
		for (const record of this.records) {
			if (record.inScope) states.set(record.id, record.state)
		}
		return states
	}

	count(): number {
		return this.records.length
	}

	*[Symbol.iterator](): Generator<BindingRecord> {
		yield* this.records
	}

	private requireOwned(record: BindingRecord): Fault | null {
		switch (record.state) {
			case OwnershipState.Owned:
				return null
			case OwnershipState.Uninitialized:
				return useOfUninitialized(record.name)
			case OwnershipState.Moved:
				return useAfterMove(record.name)
			case OwnershipState.Dropped:
				throw new Error(`Binding ${record.name} used after its scope ended`)
		}
	}
}
