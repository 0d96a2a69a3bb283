/**
 * Diagnostics and reporting for the analyzer.
 */

export {
	AnalysisContext,
	type AnalysisDiagnostic,
	createDiagnostic,
	type Diagnostic,
	type DiagnosticSite,
} from './context.ts'
export {
	ANALYZER_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
