/**
 * Re-export diagnostic types and analyzer definitions from shared package.
 */

import { ANALYZER_DIAGNOSTICS } from '@tether/diagnostics'

export {
	ANALYZER_DIAGNOSTICS,
	type AnalyzerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@tether/diagnostics'

/**
 * All valid diagnostic codes for the analyzer.
 */
export type DiagnosticCode = keyof typeof ANALYZER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof ANALYZER_DIAGNOSTICS)[typeof code] {
	return ANALYZER_DIAGNOSTICS[code]
}
