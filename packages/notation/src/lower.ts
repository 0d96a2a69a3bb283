/**
 * Lowering: declarations to the analyzer's program and type facts table.
 *
 * Types are resolved in file order, so a declaration can only refer to types
 * declared above it (or in the prelude).
 */

import type {
	AnalysisContext,
	FunctionDef,
	Program,
	SourceLocation,
	TypeFactsTable,
} from '@tether/analyzer'
import {
	type DiagnosticArgs,
	interpolateMessage,
	NOTATION_DIAGNOSTICS,
	type NotationDiagnosticCode,
} from '@tether/diagnostics'
import type { FnDeclSyntax, ItemSyntax, NameSyntax, TypeDeclSyntax } from './grammar/index.ts'

const CAPABILITIES = new Set(['copy', 'send', 'sync'])

export function emitNotation(
	context: AnalysisContext,
	code: NotationDiagnosticCode,
	args: DiagnosticArgs,
	loc: SourceLocation
): void {
	const def = NOTATION_DIAGNOSTICS[code]
	context.report({ args, def, loc, message: interpolateMessage(def.message, args) })
}

function requireKnown(
	context: AnalysisContext,
	facts: TypeFactsTable,
	names: readonly NameSyntax[]
): boolean {
	const missing = names.filter((type) => !facts.has(type.name))
	for (const type of missing) emitNotation(context, 'TTSYN002', { name: type.name }, type.loc)
	return missing.length === 0
}

function declareType(context: AnalysisContext, facts: TypeFactsTable, decl: TypeDeclSyntax): void {
	if (facts.has(decl.name)) {
		emitNotation(context, 'TTSYN003', { name: decl.name }, decl.loc)
		return
	}

	const { body } = decl
	switch (body.kind) {
		case 'capabilities': {
			const unknown = body.flags.filter((flag) => !CAPABILITIES.has(flag.name))
			for (const flag of unknown) emitNotation(context, 'TTSYN004', { flag: flag.name }, flag.loc)
			if (unknown.length > 0) return
			const flags = new Set(body.flags.map((flag) => flag.name))
			facts.definePrimitive(decl.name, {
				isCopy: flags.has('copy'),
				isThreadSafeMove: flags.has('send'),
				isThreadSafeShared: flags.has('sync'),
			})
			return
		}
		case 'struct':
			if (!requireKnown(context, facts, body.fields)) return
			facts.defineComposite(
				decl.name,
				body.fields.map((field) => field.name)
			)
			return
		case 'shared':
			if (!requireKnown(context, facts, [body.inner])) return
			facts.defineShared(decl.name, body.sharing, body.inner.name)
			return
	}
}

function toFunction(decl: FnDeclSyntax): FunctionDef {
	return { body: decl.body, endLoc: decl.endLoc, name: decl.name }
}

/**
 * Resolve the declarations of one file.
 * Declarations with errors are left out; the errors go to `context`.
 */
export function lowerItems(
	context: AnalysisContext,
	items: readonly ItemSyntax[],
	facts: TypeFactsTable
): Program {
	const functions: FunctionDef[] = []
	const names = new Set<string>()

	for (const item of items) {
		if (item.kind === 'type') {
			declareType(context, facts, item)
		} else if (names.has(item.name)) {
			emitNotation(context, 'TTSYN005', { name: item.name }, item.loc)
		} else {
			names.add(item.name)
			functions.push(toFunction(item))
		}
	}

	return { functions }
}
