/**
 * tether notation front end
 *
 * Text notation for analyzer programs:
 * - ohm-js grammar and semantics in `grammar/`
 * - type declarations resolved into a type facts table over the prelude
 * - TTSYN diagnostics reported into the analysis context
 */

import type { AnalysisContext, Program, TypeFactsTable } from '@tether/analyzer'
import { parseItems } from './grammar/index.ts'
import { emitNotation, lowerItems } from './lower.ts'
import { preludeFacts } from './prelude.ts'

export interface NotationResult {
	/** False when any declaration failed to parse or resolve */
	readonly succeeded: boolean
	readonly program: Program
	readonly facts: TypeFactsTable
}

/**
 * Parse the source held by `context`.
 *
 * @throws {Error} if the context carries no source text
 */
export function parseNotation(context: AnalysisContext): NotationResult {
	if (context.source === null) throw new Error('parseNotation needs a context with source text')
	const facts = preludeFacts()
	const errorsBefore = context.getErrorCount()

	const syntax = parseItems(context.source)
	if (!syntax.succeeded) {
		emitNotation(context, 'TTSYN001', { detail: syntax.message }, syntax.loc)
		return { facts, program: { functions: [] }, succeeded: false }
	}

	const program = lowerItems(context, syntax.items, facts)
	return { facts, program, succeeded: context.getErrorCount() === errorsBefore }
}

export {
	createSemantics,
	type FnDeclSyntax,
	type ItemSyntax,
	locationAt,
	match,
	type NameSyntax,
	parseItems,
	type SyntaxResult,
	semantics,
	TetherGrammar,
	type TypeBodySyntax,
	type TypeDeclSyntax,
} from './grammar/index.ts'
export { lowerItems } from './lower.ts'
export { preludeFacts } from './prelude.ts'
