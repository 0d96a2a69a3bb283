/**
 * Type-level capability facts supplied by the external type system.
 *
 * The analyzer never infers these. Composite and shared types derive their
 * facts structurally from the types they are built from.
 */

export interface TypeFacts {
	/** Bitwise-copyable: moves leave the source usable */
	readonly isCopy: boolean
	/** May be referenced from another thread (Sync-equivalent) */
	readonly isThreadSafeShared: boolean
	/** May be moved into another thread (Send-equivalent) */
	readonly isThreadSafeMove: boolean
}

/**
 * Reference-counted sharing variants.
 */
export const SharingKind = {
	SharedAtomic: 'SharedAtomic',
	SharedNonAtomic: 'SharedNonAtomic',
} as const

export type SharingKind = (typeof SharingKind)[keyof typeof SharingKind]

export type TypeShape =
	| { readonly kind: 'primitive'; readonly facts: TypeFacts }
	| { readonly kind: 'composite'; readonly fields: readonly string[] }
	| { readonly kind: 'shared'; readonly sharing: SharingKind; readonly inner: string }

/**
 * Facts of a composite: each capability is the AND of its fields'.
 */
export function compositeFacts(fields: readonly TypeFacts[]): TypeFacts {
	return {
		isCopy: fields.every((f) => f.isCopy),
		isThreadSafeMove: fields.every((f) => f.isThreadSafeMove),
		isThreadSafeShared: fields.every((f) => f.isThreadSafeShared),
	}
}

/**
 * Facts of a reference-counted handle around `inner`.
 * Handles are never Copy. Only atomic counting can cross threads, and only
 * when the pointee itself can be both shared and sent.
 */
export function sharedFacts(sharing: SharingKind, inner: TypeFacts): TypeFacts {
	if (sharing === SharingKind.SharedNonAtomic) {
		return { isCopy: false, isThreadSafeMove: false, isThreadSafeShared: false }
	}
	const crossThread = inner.isThreadSafeShared && inner.isThreadSafeMove
	return { isCopy: false, isThreadSafeMove: crossThread, isThreadSafeShared: crossThread }
}

export class UnknownTypeError extends Error {
	readonly typeName: string

	constructor(typeName: string) {
		super(`Unknown type: ${typeName}`)
		this.name = 'UnknownTypeError'
		this.typeName = typeName
	}
}

/**
 * Read-only (once built) table of type facts, keyed by type name.
 */
export class TypeFactsTable {
	private readonly shapes: Map<string, TypeShape> = new Map()
	private readonly facts: Map<string, TypeFacts> = new Map()

	definePrimitive(name: string, facts: TypeFacts): this {
		return this.define(name, { facts, kind: 'primitive' }, facts)
	}

	/** @throws {UnknownTypeError} if a field type is not defined yet */
	defineComposite(name: string, fields: readonly string[]): this {
		const facts = compositeFacts(fields.map((field) => this.get(field)))
		return this.define(name, { fields: [...fields], kind: 'composite' }, facts)
	}

	/** @throws {UnknownTypeError} if the inner type is not defined yet */
	defineShared(name: string, sharing: SharingKind, inner: string): this {
		const facts = sharedFacts(sharing, this.get(inner))
		return this.define(name, { inner, kind: 'shared', sharing }, facts)
	}

	has(name: string): boolean {
		return this.facts.has(name)
	}

	get(name: string): TypeFacts {
		const facts = this.facts.get(name)
		if (facts === undefined) throw new UnknownTypeError(name)
		return facts
	}

	shapeOf(name: string): TypeShape {
		const shape = this.shapes.get(name)
		if (shape === undefined) throw new UnknownTypeError(name)
		return shape
	}

	names(): string[] {
		return [...this.facts.keys()]
	}

	count(): number {
		return this.facts.size
	}

	private define(name: string, shape: TypeShape, facts: TypeFacts): this {
		this.shapes.set(name, shape)
		this.facts.set(name, facts)
		return this
	}
}
