/**
 * @tether/diagnostics
 *
 * Shared diagnostic types and definitions for tether packages.
 */

export {
	ANALYZER_DIAGNOSTICS,
	type AnalyzerDiagnosticCode,
	TTBRW001,
	TTBRW002,
	TTBRW003,
	TTBRW004,
	TTIR001,
	TTIR002,
	TTIR003,
	TTIR004,
	TTIR005,
	TTLOOP001,
	TTOWN001,
	TTOWN002,
	TTOWN003,
	TTTHR001,
	TTTHR002,
} from './analyzer.ts'
export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TTCLI001,
	TTCLI002,
	TTCLI003,
	TTCLI004,
	TTCLI005,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	NOTATION_DIAGNOSTICS,
	type NotationDiagnosticCode,
	TTSYN001,
	TTSYN002,
	TTSYN003,
	TTSYN004,
	TTSYN005,
} from './notation.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { ANALYZER_DIAGNOSTICS } from './analyzer.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'
import { NOTATION_DIAGNOSTICS } from './notation.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...ANALYZER_DIAGNOSTICS,
	...NOTATION_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
