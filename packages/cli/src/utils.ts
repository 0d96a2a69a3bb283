import {
	type AnalysisDiagnostic,
	type AnalyzerOptions,
	type Diagnostic,
	InvalidProgramError,
} from '@tether/analyzer'
import {
	interpolateMessage,
	TTCLI001,
	TTCLI002,
	TTCLI003,
	TTCLI004,
	TTCLI005,
} from '@tether/diagnostics'

export type ReportFormat = 'text' | 'json'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(TTCLI001.message, { path: filePath })
		return `[${TTCLI001.code}] ${message}`
	}
	const message = interpolateMessage(TTCLI002.message, { reason: getErrorMessage(error) })
	return `[${TTCLI002.code}] ${message}`
}

export function formatIterationsError(value: number): string {
	const message = interpolateMessage(TTCLI003.message, { value: String(value) })
	return `[${TTCLI003.code}] ${message}`
}

export function formatInvalidFormatError(format: string): string {
	const message = interpolateMessage(TTCLI004.message, { format })
	return `[${TTCLI004.code}] ${message}`
}

/**
 * Name the first structural problem of a rejected program.
 */
export function formatInvalidProgramError(error: unknown): string {
	const [first] = error instanceof InvalidProgramError ? error.issues : []
	const reason = first === undefined ? getErrorMessage(error) : first.message
	const message = interpolateMessage(TTCLI005.message, { reason })
	return `[${TTCLI005.code}] ${message}`
}

export function isValidFormat(value: string): value is ReportFormat {
	return value === 'text' || value === 'json'
}

export function isValidIterations(value: number): boolean {
	return Number.isInteger(value) && value >= 2
}

/**
 * Analyzer options from command-line flags; unset flags keep the defaults.
 */
export function resolveAnalyzerOptions(
	iterations: number | undefined,
	strictCopies: boolean
): Partial<AnalyzerOptions> {
	return {
		...(iterations !== undefined ? { loopFixedPointIterations: iterations } : {}),
		...(strictCopies ? { treatCopyTypesAsExempt: false } : {}),
	}
}

export interface JsonDiagnostic {
	code: string
	message: string
	line?: number
	column?: number
	function?: string
	position?: number
	bindings?: readonly string[]
}

export interface JsonReport {
	file: string
	succeeded: boolean
	diagnostics: JsonDiagnostic[]
}

function isAnalysisDiagnostic(diagnostic: Diagnostic): diagnostic is AnalysisDiagnostic {
	return 'bindings' in diagnostic
}

export function toJsonDiagnostic(diagnostic: Diagnostic): JsonDiagnostic {
	return {
		code: diagnostic.def.code,
		message: diagnostic.message,
		...(diagnostic.loc ? { column: diagnostic.loc.column, line: diagnostic.loc.line } : {}),
		...(diagnostic.functionName !== undefined ? { function: diagnostic.functionName } : {}),
		...(diagnostic.position !== undefined ? { position: diagnostic.position } : {}),
		...(isAnalysisDiagnostic(diagnostic) ? { bindings: diagnostic.bindings } : {}),
	}
}

export function toJsonReport(file: string, diagnostics: readonly Diagnostic[]): JsonReport {
	return {
		diagnostics: diagnostics.map(toJsonDiagnostic),
		file,
		succeeded: diagnostics.length === 0,
	}
}

export function formatSummary(errorCount: number): string {
	return errorCount === 1 ? 'found 1 error' : `found ${errorCount} errors`
}
