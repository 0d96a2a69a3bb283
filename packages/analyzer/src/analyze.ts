/**
 * Analysis entry points.
 */

import { checkFunction } from './check/checker.ts'
import { type AnalyzerOptions, resolveOptions } from './check/options.ts'
import { type AnalysisContext, type AnalysisDiagnostic, createDiagnostic } from './core/context.ts'
import type { TypeFactsTable } from './facts/type-facts.ts'
import type { FunctionDef, Program } from './ir/nodes.ts'
import { validateProgram } from './ir/validate.ts'

/**
 * Result of analyzing one function.
 */
export interface FunctionReport {
	readonly name: string
	/** Empty when the function is sound; otherwise the violation that stopped it */
	readonly diagnostics: readonly AnalysisDiagnostic[]
	/** Bindings dropped at scope exits, in drop order */
	readonly dropped: readonly string[]
}

export interface AnalysisResult {
	readonly succeeded: boolean
	/** All functions' diagnostics, in program order */
	readonly diagnostics: readonly AnalysisDiagnostic[]
	readonly functions: readonly FunctionReport[]
}

/**
 * Analyze one function. Depends only on its arguments, so functions can be
 * analyzed independently and in any order.
 */
export function analyzeFunction(
	fn: FunctionDef,
	facts: TypeFactsTable,
	options: AnalyzerOptions
): FunctionReport {
	const { dropped, name, violation } = checkFunction(fn, facts, options)
	return {
		diagnostics: violation === null ? [] : [createDiagnostic(violation, name)],
		dropped,
		name,
	}
}

/**
 * Validate and analyze a whole program.
 *
 * @param context - Receives every diagnostic, for rendering
 * @throws {InvalidOptionsError} if the options are out of range
 * @throws {InvalidProgramError} if the program is malformed
 */
export function analyze(
	program: Program,
	facts: TypeFactsTable,
	options: Partial<AnalyzerOptions> = {},
	context?: AnalysisContext
): AnalysisResult {
	const resolved = resolveOptions(options)
	validateProgram(program, facts)

	const functions = program.functions.map((fn) => analyzeFunction(fn, facts, resolved))
	const diagnostics = functions.flatMap((report) => report.diagnostics)
	if (context) {
		for (const diagnostic of diagnostics) context.report(diagnostic)
	}
	return { diagnostics, functions, succeeded: diagnostics.length === 0 }
}
