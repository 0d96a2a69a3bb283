import { SharingKind, TypeFactsTable } from '../src/facts/type-facts.ts'

/**
 * Types shared by the analyzer tests:
 * - `i32`: Copy, sendable, shareable
 * - `Vec`, `String`: owned heap values, sendable and shareable
 * - `Cell`: sendable but not shareable
 * - `Rc`: non-atomic shared handle around `Vec`
 * - `Arc`: atomic shared handle around `Vec`
 * - `ArcCell`: atomic shared handle around `Cell`
 * - `Pair`: struct of `i32` and `Vec`
 */
export function testFacts(): TypeFactsTable {
	return new TypeFactsTable()
		.definePrimitive('i32', { isCopy: true, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('Vec', { isCopy: false, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('String', { isCopy: false, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('Cell', { isCopy: false, isThreadSafeMove: true, isThreadSafeShared: false })
		.defineShared('Rc', SharingKind.SharedNonAtomic, 'Vec')
		.defineShared('Arc', SharingKind.SharedAtomic, 'Vec')
		.defineShared('ArcCell', SharingKind.SharedAtomic, 'Cell')
		.defineComposite('Pair', ['i32', 'Vec'])
}
