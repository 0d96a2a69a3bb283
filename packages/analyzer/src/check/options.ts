/**
 * Analyzer configuration.
 */

export interface AnalyzerOptions {
	/** Copy-typed bindings stay usable after a move */
	readonly treatCopyTypesAsExempt: boolean
	/** Maximum loop body replays while looking for a fixed point (>= 2) */
	readonly loopFixedPointIterations: number
}

export const DEFAULT_OPTIONS: AnalyzerOptions = {
	loopFixedPointIterations: 2,
	treatCopyTypesAsExempt: true,
}

export class InvalidOptionsError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InvalidOptionsError'
	}
}

/**
 * Merge caller options over the defaults.
 *
 * @throws {InvalidOptionsError} if the iteration count is not an integer >= 2
 */
export function resolveOptions(options: Partial<AnalyzerOptions> = {}): AnalyzerOptions {
	const resolved: AnalyzerOptions = { ...DEFAULT_OPTIONS, ...options }
	const iterations = resolved.loopFixedPointIterations
	if (!Number.isInteger(iterations) || iterations < 2) {
		throw new InvalidOptionsError(
			`loopFixedPointIterations must be an integer >= 2, got ${String(iterations)}`
		)
	}
	return resolved
}
