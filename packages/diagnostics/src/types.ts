/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Catalog entry for a diagnostic.
 *
 * `message` and `suggestion` are templates: `{name}` placeholders are filled
 * from the arguments attached to the emitted diagnostic.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
