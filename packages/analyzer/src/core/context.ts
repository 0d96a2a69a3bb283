/**
 * Analysis context: diagnostic collection and compiler-style rendering for
 * one analysis run.
 */

import { ERROR_CODES, type ErrorKind, type Violation } from '../check/types.ts'
import type { SourceLocation } from '../ir/nodes.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'

/**
 * A diagnostic message with whatever location information is known.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Template arguments used for message interpolation */
	readonly args: DiagnosticArgs
	/** Source location forwarded by the front end */
	readonly loc?: SourceLocation
	readonly functionName?: string
	/** Pre-order statement position within the function */
	readonly position?: number
}

/**
 * A violation found by the checker.
 */
export interface AnalysisDiagnostic extends Diagnostic {
	readonly kind: ErrorKind
	readonly functionName: string
	readonly position: number
	/** Binding and reference names involved, most relevant first */
	readonly bindings: readonly string[]
}

export interface DiagnosticSite {
	readonly loc?: SourceLocation
	readonly functionName?: string
	readonly position?: number
}

export function createDiagnostic(violation: Violation, functionName: string): AnalysisDiagnostic {
	const def = getDiagnostic(ERROR_CODES[violation.kind])
	return {
		args: violation.args,
		bindings: violation.bindings,
		def,
		functionName,
		kind: violation.kind,
		message: interpolateMessage(def.message, violation.args),
		position: violation.position,
		...(violation.loc ? { loc: violation.loc } : {}),
	}
}

export class AnalysisContext {
	/** Source text of the front end's input, when there is one */
	readonly source: string | null

	/** Source filename for messages */
	readonly filename: string

	private readonly diagnostics: Diagnostic[] = []
	private errorCount = 0

	constructor(source: string | null = null, filename = '<input>') {
		this.source = source
		this.filename = filename
	}

	/**
	 * Emit a diagnostic by code.
	 */
	emit(code: DiagnosticCode, args: DiagnosticArgs = {}, site: DiagnosticSite = {}): void {
		const def = getDiagnostic(code)
		this.report({ args, def, message: interpolateMessage(def.message, args), ...site })
	}

	/**
	 * Add an already built diagnostic, from any catalog.
	 */
	report(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) this.errorCount++
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		if (this.source === null) return undefined
		return this.source.split('\n')[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private formatLocation(diagnostic: Diagnostic): string {
		if (diagnostic.loc) {
			return `  --> ${this.filename}:${diagnostic.loc.line}:${diagnostic.loc.column}`
		}
		if (diagnostic.functionName !== undefined && diagnostic.position !== undefined) {
			return `  --> ${this.filename}: fn \`${diagnostic.functionName}\`, statement ${diagnostic.position}`
		}
		return `  --> ${this.filename}`
	}

	private buildSourceContext(
		loc: SourceLocation,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const pad = ' '.repeat(String(loc.line).length)
		const linePrefix = ` ${loc.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(loc.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[TTBRW002]: cannot mutate `v` because it is borrowed by `first`
	 *   --> main.tt:4:3
	 *    |
	 *  4 |   call push(&mut v)
	 *    |   ^
	 *    |
	 *    = help: Move the last use of `first` before this mutation.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${this.getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const lines = [header, this.formatLocation(diagnostic)]

		let emptyPrefix = '   | '
		const sourceLine = diagnostic.loc ? this.getSourceLine(diagnostic.loc.line) : undefined
		if (diagnostic.loc && sourceLine !== undefined) {
			const context = this.buildSourceContext(diagnostic.loc, sourceLine)
			emptyPrefix = context.emptyPrefix
			lines.push(...context.lines)
		}

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `${' '.repeat(emptyPrefix.length - 2)}= help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
