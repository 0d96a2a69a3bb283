import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	checkThreadCaptures,
	THREAD_CAPTURE_RULES,
	type ThreadCapture,
} from '../../src/check/capture.ts'
import { decide } from '../../src/check/dispatch.ts'
import { ErrorKind } from '../../src/check/types.ts'
import { CaptureMode } from '../../src/ir/nodes.ts'
import { testFacts } from '../fixtures.ts'

const facts = testFacts()

function input(typeName: string, overrides: Partial<ThreadCapture> = {}): ThreadCapture {
	return {
		binding: 'x',
		facts: facts.get(typeName),
		mode: CaptureMode.ByReference,
		mutable: false,
		soleBorrow: true,
		typeName,
		...overrides,
	}
}

describe('check/capture', () => {
	describe('THREAD_CAPTURE_RULES', () => {
		it('names the rule that decided', () => {
			const decision = decide(THREAD_CAPTURE_RULES, input('Rc', { mode: CaptureMode.ByMove }))
			assert.deepStrictEqual(decision, {
				outcome: ErrorKind.UnsafeCrossThreadMove,
				rule: 'moved value must be sendable',
			})
		})

		it('accepts sendable moves even when the type is not shareable', () => {
			const decision = decide(THREAD_CAPTURE_RULES, input('Cell', { mode: CaptureMode.ByMove }))
			assert.deepStrictEqual(decision, { outcome: 'accepted', rule: 'moved value' })
		})

		it('refuses shared references to non-shareable types', () => {
			assert.strictEqual(
				decide(THREAD_CAPTURE_RULES, input('Cell')).outcome,
				ErrorKind.UnsafeCrossThreadShare
			)
		})

		it('refuses exclusive references that are not the only borrow', () => {
			const decision = decide(
				THREAD_CAPTURE_RULES,
				input('Vec', { mutable: true, soleBorrow: false })
			)
			assert.strictEqual(decision.rule, 'exclusive reference must be the only borrow')
		})

		it('falls through to the default for shareable references', () => {
			assert.deepStrictEqual(decide(THREAD_CAPTURE_RULES, input('Arc')), {
				outcome: 'accepted',
				rule: null,
			})
		})
	})

	describe('checkThreadCaptures', () => {
		it('reports the first unsafe capture in capture order', () => {
			const fault = checkThreadCaptures([
				input('Vec', { binding: 'a' }),
				input('Cell', { binding: 'b' }),
				input('Rc', { binding: 'c', mode: CaptureMode.ByMove }),
			])
			assert.deepStrictEqual(fault, {
				args: { binding: 'b', type: 'Cell' },
				bindings: ['b'],
				kind: ErrorKind.UnsafeCrossThreadShare,
			})
		})

		it('returns null when every capture is safe', () => {
			assert.strictEqual(checkThreadCaptures([input('i32'), input('Pair')]), null)
		})
	})
})
