/**
 * First-match decision tables.
 *
 * Rules are evaluated top to bottom; the first whose predicate holds
 * decides. `otherwise` is required, so every input has an outcome.
 */

export interface DecisionRule<I, O> {
	readonly name: string
	readonly when: (input: I) => boolean
	readonly then: O
}

export interface DecisionTable<I, O> {
	readonly rules: readonly DecisionRule<I, O>[]
	readonly otherwise: O
}

export interface Decision<O> {
	readonly outcome: O
	/** Name of the matching rule, or null when the default arm applied */
	readonly rule: string | null
}

export function decide<I, O>(table: DecisionTable<I, O>, input: I): Decision<O> {
	for (const rule of table.rules) {
		if (rule.when(input)) return { outcome: rule.then, rule: rule.name }
	}
	return { outcome: table.otherwise, rule: null }
}
