/**
 * CLI diagnostic definitions.
 *
 * Error code format: TTCLI<NUMBER>
 * - TTCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TTCLI001-099)
// =============================================================================

export const TTCLI001: DiagnosticDef = {
	code: 'TTCLI001',
	description: "tether couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TTCLI002: DiagnosticDef = {
	code: 'TTCLI002',
	description: "The file exists but tether can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TTCLI003: DiagnosticDef = {
	code: 'TTCLI003',
	description: 'Loops are checked by replaying their body; at least two passes are needed.',
	message: 'invalid iteration count "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass an integer of 2 or more to `--iterations`.',
}

export const TTCLI004: DiagnosticDef = {
	code: 'TTCLI004',
	description: "tether doesn't recognize this report format.",
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format text` or `--format json`.',
}

export const TTCLI005: DiagnosticDef = {
	code: 'TTCLI005',
	description: 'The front end produced a program the analyzer cannot accept.',
	message: 'invalid program: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the names and scopes used in your file.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TTCLI001,
	TTCLI002,
	TTCLI003,
	TTCLI004,
	TTCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
