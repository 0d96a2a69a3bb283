import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	analyze,
	type Diagnostic,
	fresh,
	ProgramBuilder,
	TypeFactsTable,
	validateProgram,
} from '@tether/analyzer'
import { TTSYN001 } from '@tether/diagnostics'
import {
	formatInvalidFormatError,
	formatInvalidProgramError,
	formatIterationsError,
	formatReadError,
	formatSummary,
	getErrorMessage,
	isNodeError,
	isValidFormat,
	isValidIterations,
	resolveAnalyzerOptions,
	toJsonReport,
} from '../src/utils.ts'

function nodeError(message: string, code: string): NodeJS.ErrnoException {
	return Object.assign(new Error(message), { code })
}

const facts = new TypeFactsTable().definePrimitive('Vec', {
	isCopy: false,
	isThreadSafeMove: true,
	isThreadSafeShared: true,
})

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const result = formatReadError('/path/to/file.tt', nodeError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[TTCLI001] file not found: /path/to/file.tt')
	})

	it('should format other errors with the reason', () => {
		const result = formatReadError('/path/to/file.tt', nodeError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[TTCLI002] cannot read file: permission denied')
	})
})

describe('flag validation', () => {
	it('should accept the two report formats', () => {
		assert.strictEqual(isValidFormat('text'), true)
		assert.strictEqual(isValidFormat('json'), true)
		assert.strictEqual(isValidFormat('xml'), false)
		assert.strictEqual(formatInvalidFormatError('xml'), '[TTCLI004] unknown format "xml"')
	})

	it('should require at least two loop passes', () => {
		assert.strictEqual(isValidIterations(2), true)
		assert.strictEqual(isValidIterations(1), false)
		assert.strictEqual(isValidIterations(2.5), false)
		assert.strictEqual(formatIterationsError(1), '[TTCLI003] invalid iteration count "1"')
	})
})

describe('resolveAnalyzerOptions', () => {
	it('should leave unset flags to the analyzer defaults', () => {
		assert.deepStrictEqual(resolveAnalyzerOptions(undefined, false), {})
	})

	it('should map flags onto analyzer options', () => {
		assert.deepStrictEqual(resolveAnalyzerOptions(5, true), {
			loopFixedPointIterations: 5,
			treatCopyTypesAsExempt: false,
		})
	})
})

describe('formatInvalidProgramError', () => {
	it('should name the first problem of an invalid program', () => {
		const program = new ProgramBuilder().function('main', (b) => b.use('w')).build()
		assert.throws(
			() => validateProgram(program, facts),
			(error: unknown) => {
				assert.strictEqual(
					formatInvalidProgramError(error),
					'[TTCLI005] invalid program: cannot find `w` in this scope'
				)
				return true
			}
		)
	})

	it('should wrap other errors', () => {
		assert.strictEqual(
			formatInvalidProgramError(new Error('boom')),
			'[TTCLI005] invalid program: boom'
		)
	})
})

describe('toJsonReport', () => {
	it('should describe analysis and syntax diagnostics', () => {
		const program = new ProgramBuilder()
			.function('main', (b) => b.declare('a', 'Vec').use('a'))
			.function('ok', (b) => b.declare('b', 'Vec', { init: fresh() }))
			.build()
		const syntax: Diagnostic = {
			args: { detail: 'expected "}"' },
			def: TTSYN001,
			loc: { column: 4, line: 2 },
			message: 'syntax error: expected "}"',
		}
		const report = toJsonReport('main.tt', [...analyze(program, facts).diagnostics, syntax])
		assert.deepStrictEqual(report, {
			diagnostics: [
				{
					bindings: ['a'],
					code: 'TTOWN001',
					function: 'main',
					message: 'used binding `a` is not initialized',
					position: 1,
				},
				{ code: 'TTSYN001', column: 4, line: 2, message: 'syntax error: expected "}"' },
			],
			file: 'main.tt',
			succeeded: false,
		})
	})

	it('should succeed without diagnostics', () => {
		assert.deepStrictEqual(toJsonReport('main.tt', []), {
			diagnostics: [],
			file: 'main.tt',
			succeeded: true,
		})
	})
})

describe('formatSummary', () => {
	it('should pluralize the error count', () => {
		assert.strictEqual(formatSummary(1), 'found 1 error')
		assert.strictEqual(formatSummary(3), 'found 3 errors')
	})
})
