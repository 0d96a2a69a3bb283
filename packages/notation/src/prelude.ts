import { TypeFactsTable } from '@tether/analyzer'

/**
 * Built-in types every file can use without declaring them.
 */
export function preludeFacts(): TypeFactsTable {
	return new TypeFactsTable()
		.definePrimitive('i32', { isCopy: true, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('bool', { isCopy: true, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('String', { isCopy: false, isThreadSafeMove: true, isThreadSafeShared: true })
		.definePrimitive('Vec', { isCopy: false, isThreadSafeMove: true, isThreadSafeShared: true })
}
