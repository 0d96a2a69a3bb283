/**
 * Notation front-end diagnostic definitions.
 *
 * Error code format: TTSYN<NUMBER> (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const TTSYN001: DiagnosticDef = {
	code: 'TTSYN001',
	description: "tether couldn't understand this part of the program.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos or missing keywords.',
}

export const TTSYN002: DiagnosticDef = {
	code: 'TTSYN002',
	description: 'A type declaration refers to a type that has not been declared above it.',
	message: 'unknown type `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare `{name}` with `type {name} = …` before using it.',
}

export const TTSYN003: DiagnosticDef = {
	code: 'TTSYN003',
	description: 'Each type name can only be declared once per file.',
	message: 'type `{name}` is already declared',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the declarations.',
}

export const TTSYN004: DiagnosticDef = {
	code: 'TTSYN004',
	description: 'Capability lists accept `copy`, `send` and `sync`.',
	message: 'unknown capability `{flag}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of `copy`, `send`, `sync`.',
}

export const TTSYN005: DiagnosticDef = {
	code: 'TTSYN005',
	description: 'Each function name can only be declared once per file.',
	message: 'function `{name}` is already declared',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the functions.',
}

export const NOTATION_DIAGNOSTICS = {
	TTSYN001,
	TTSYN002,
	TTSYN003,
	TTSYN004,
	TTSYN005,
} as const

export type NotationDiagnosticCode = keyof typeof NOTATION_DIAGNOSTICS
