import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	type AnalysisDiagnostic,
	type AnalysisResult,
	analyze,
	type BodyBuilder,
	captureMove,
	captureMut,
	captureRef,
	exclusive,
	fresh,
	ProgramBuilder,
} from '../src/index.ts'
import { testFacts } from './fixtures.ts'

function run(build: (body: BodyBuilder) => unknown): AnalysisResult {
	return analyze(new ProgramBuilder().function('main', build).build(), testFacts())
}

function only(result: AnalysisResult): AnalysisDiagnostic {
	assert.strictEqual(result.diagnostics.length, 1)
	const [diagnostic] = result.diagnostics
	assert.ok(diagnostic)
	return diagnostic
}

describe('reference scenarios', () => {
	it('rejects a second exclusive borrow while the first is still used', () => {
		const result = run((b) =>
			b
				.declare('x', 'Vec', { init: fresh(), mutable: true })
				.borrowExclusive('x', 'r1')
				.borrowExclusive('x', 'r2')
				.use('r1')
		)

		const diagnostic = only(result)
		assert.strictEqual(diagnostic.kind, 'ConflictingBorrow')
		assert.strictEqual(diagnostic.def.code, 'TTBRW001')
		assert.strictEqual(diagnostic.position, 2)
		assert.deepStrictEqual(diagnostic.bindings, ['x', 'r2', 'r1'])
		assert.strictEqual(
			diagnostic.message,
			'cannot borrow `x` as mutable because it is also borrowed as mutable'
		)
	})

	it('rejects mutating a container while an element borrow is live', () => {
		const result = run((b) =>
			b
				.declare('v', 'Vec', { init: fresh(), mutable: true })
				.borrowShared('v', 'first')
				.call('push', [exclusive('v')])
				.use('first')
		)

		const diagnostic = only(result)
		assert.strictEqual(diagnostic.kind, 'MutateWhileBorrowed')
		assert.strictEqual(diagnostic.position, 2)
		assert.deepStrictEqual(diagnostic.bindings, ['v', 'first'])
		assert.strictEqual(diagnostic.message, 'cannot mutate `v` because it is borrowed by `first`')
	})

	it('rejects using a binding after moving out of it', () => {
		const result = run((b) =>
			b.declare('word', 'String', { init: fresh() }).move('word', 'tmp').use('word')
		)

		const diagnostic = only(result)
		assert.strictEqual(diagnostic.kind, 'UseAfterMove')
		assert.strictEqual(diagnostic.position, 2)
		assert.deepStrictEqual(diagnostic.bindings, ['word'])
		assert.strictEqual(diagnostic.message, 'use of moved value: `word`')
	})

	it('rejects a shared capture while another closure holds an exclusive one', () => {
		// Cell is not shareable across threads; the borrow conflict is reported first
		const result = run((b) =>
			b
				.declare('x', 'Cell', { init: fresh(), mutable: true })
				.spawn([captureMut('x')], () => {})
				.spawn([captureRef('x')], () => {})
		)

		const diagnostic = only(result)
		assert.strictEqual(diagnostic.kind, 'ConflictingBorrow')
		assert.strictEqual(diagnostic.position, 2)
		assert.deepStrictEqual(diagnostic.bindings, ['x'])
		assert.strictEqual(
			diagnostic.message,
			'cannot borrow `x` as immutable because it is also borrowed as mutable'
		)
	})

	it('rejects moving a non-atomic shared handle into a thread', () => {
		const result = run((b) =>
			b.declare('rc', 'Rc', { init: fresh() }).spawn([captureMove('rc')], () => {})
		)

		const diagnostic = only(result)
		assert.strictEqual(diagnostic.kind, 'UnsafeCrossThreadMove')
		assert.strictEqual(diagnostic.def.code, 'TTTHR001')
		assert.strictEqual(diagnostic.position, 1)
		assert.deepStrictEqual(diagnostic.bindings, ['rc'])
		assert.strictEqual(diagnostic.message, '`Rc` cannot be sent between threads safely')
	})

	it('reports capturing never-initialized bindings as uninitialized uses', () => {
		const shared = only(
			run((b) =>
				b
					.declare('x', 'Cell', { mutable: true })
					.spawn([captureMut('x')], () => {})
					.spawn([captureRef('x')], () => {})
			)
		)
		assert.strictEqual(shared.kind, 'UseOfUninitialized')
		assert.strictEqual(shared.position, 1)
		assert.strictEqual(shared.message, 'used binding `x` is not initialized')

		const moved = only(run((b) => b.declare('rc', 'Rc').spawn([captureMove('rc')], () => {})))
		assert.strictEqual(moved.kind, 'UseOfUninitialized')
		assert.strictEqual(moved.position, 1)
		assert.strictEqual(moved.message, 'used binding `rc` is not initialized')
	})
})
