import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	type BodyBuilder,
	captureRef,
	fresh,
	ProgramBuilder,
	shared,
} from '../../src/ir/builder.ts'
import type { SourceLocation } from '../../src/ir/nodes.ts'
import { InvalidProgramError, validateFunction, validateProgram } from '../../src/ir/validate.ts'
import { testFacts } from '../fixtures.ts'

interface Issue {
	code: string
	message: string
	position: number | undefined
}

function issues(build: (body: BodyBuilder) => unknown, endLoc?: SourceLocation): Issue[] {
	const [fn] = new ProgramBuilder().function('main', build, endLoc).build().functions
	assert.ok(fn)
	return validateFunction(fn, testFacts()).map((d) => ({
		code: d.def.code,
		message: d.message,
		position: d.position,
	}))
}

function declared(b: BodyBuilder): BodyBuilder {
	return b.declare('v', 'Vec', { init: fresh(), mutable: true })
}

describe('ir/validate', () => {
	it('accepts well-formed functions', () => {
		const found = issues((b) =>
			declared(b)
				.borrowShared('v', 'r')
				.scope((inner) => inner.declare('w', 'i32', { init: fresh() }).use('w'))
				.loop((body) => body.use('r'))
				.closure([captureRef('v')], (body) => body.use('v'), { handle: 'h' })
				.use('h')
		)
		assert.deepStrictEqual(found, [])
	})

	it('reports unknown names', () => {
		assert.deepStrictEqual(issues((b) => declared(b).use('w')), [
			{ code: 'TTIR001', message: 'cannot find `w` in this scope', position: 1 },
		])
	})

	it('ends bindings with their scope', () => {
		const found = issues((b) => b.scope((inner) => inner.declare('a', 'Vec')).use('a'))
		assert.deepStrictEqual(found, [
			{ code: 'TTIR001', message: 'cannot find `a` in this scope', position: 3 },
		])
	})

	it('limits closure bodies to their captures', () => {
		const found = issues((b) =>
			declared(b)
				.declare('w', 'Vec', { init: fresh() })
				.closure([captureRef('v')], (body) => body.use('w'))
		)
		assert.deepStrictEqual(found, [
			{ code: 'TTIR001', message: 'cannot find `w` in this scope', position: 3 },
		])
	})

	it('reports scopes exited without being entered', () => {
		assert.deepStrictEqual(issues((b) => b.exitScope()), [
			{ code: 'TTIR002', message: 'unbalanced scope: scope exited but never entered', position: 0 },
		])
	})

	it('does not let a loop body exit a scope opened outside it', () => {
		const found = issues((b) => b.enterScope().loop((body) => body.exitScope()).exitScope())
		assert.deepStrictEqual(found, [
			{ code: 'TTIR002', message: 'unbalanced scope: scope exited but never entered', position: 2 },
		])
	})

	it('reports scopes left open at the function end', () => {
		const [fn] = new ProgramBuilder()
			.function('main', (b) => b.enterScope(), { column: 1, line: 4 })
			.build().functions
		assert.ok(fn)
		const [issue] = validateFunction(fn, testFacts())
		assert.ok(issue)
		assert.strictEqual(issue.message, 'unbalanced scope: scope entered but never exited')
		assert.strictEqual(issue.position, undefined)
		assert.deepStrictEqual(issue.loc, { column: 1, line: 4 })
		assert.strictEqual(issue.functionName, 'main')
	})

	it('reports unknown types', () => {
		assert.deepStrictEqual(issues((b) => b.declare('x', 'Foo')), [
			{ code: 'TTIR003', message: 'unknown type `Foo`', position: 0 },
		])
	})

	it('reports a name used as both binding and reference once', () => {
		const found = issues((b) =>
			declared(b).borrowShared('v', 'r').declare('r', 'Vec').declare('r', 'Vec')
		)
		assert.deepStrictEqual(found, [
			{
				code: 'TTIR004',
				message: '`r` is used both as a binding and as a reference',
				position: 2,
			},
		])
	})

	it('requires bindings where an operation owns or borrows', () => {
		const found = issues((b) =>
			declared(b)
				.borrowShared('v', 'r')
				.call('len', [shared('r')])
				.move('v', 'r')
				.closure([captureRef('r')], (body) => body)
		)
		assert.deepStrictEqual(
			found.map((issue) => issue.message),
			[
				'`r` is a reference; a borrow needs a binding',
				'`r` is a reference; a move needs a binding',
				'`r` is a reference; a capture needs a binding',
			]
		)
	})

	it('throws for invalid programs', () => {
		const program = new ProgramBuilder()
			.function('ok', (b) => declared(b).use('v'))
			.function('broken', (b) => b.use('nope').use('gone'))
			.build()
		assert.throws(
			() => validateProgram(program, testFacts()),
			(error: unknown) => {
				assert.ok(error instanceof InvalidProgramError)
				assert.strictEqual(error.message, 'Invalid program: cannot find `nope` in this scope')
				assert.strictEqual(error.issues.length, 2)
				return true
			}
		)
	})
})
