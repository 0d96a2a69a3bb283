import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { AnalysisContext, analyze } from '@tether/analyzer'
import { parseNotation } from '@tether/notation'
import {
	formatInvalidFormatError,
	formatInvalidProgramError,
	formatIterationsError,
	formatReadError,
	formatSummary,
	isValidFormat,
	isValidIterations,
	type ReportFormat,
	resolveAnalyzerOptions,
	toJsonReport,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check ownership and borrowing in a tether notation file'

	@args.string({ description: 'Input .tt file to check' })
	declare input: string

	@flags.number({ alias: 'i', description: 'Loop passes before giving up on a fixed point (>= 2)' })
	declare iterations?: number

	@flags.boolean({ description: 'Treat Copy types as movable' })
	declare strictCopies: boolean

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Report format: text or json',
	})
	declare format: string

	private fail(message: string): void {
		this.logger.error(message)
		this.exitCode = 1
	}

	private validateFlags(): ReportFormat | null {
		if (!isValidFormat(this.format)) {
			this.fail(formatInvalidFormatError(this.format))
			return null
		}
		if (this.iterations !== undefined && !isValidIterations(this.iterations)) {
			this.fail(formatIterationsError(this.iterations))
			return null
		}
		return this.format
	}

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.fail(formatReadError(this.input, error))
			return null
		}
	}

	/** Diagnostics from both stages end up in `context`. */
	private analyzeSource(context: AnalysisContext): void {
		const parsed = parseNotation(context)
		if (!parsed.succeeded) return
		const options = resolveAnalyzerOptions(this.iterations, this.strictCopies)
		analyze(parsed.program, parsed.facts, options, context)
	}

	private report(context: AnalysisContext, format: ReportFormat): void {
		const diagnostics = context.getDiagnostics()
		if (format === 'json') {
			this.logger.log(JSON.stringify(toJsonReport(this.input, diagnostics), null, 2))
		} else if (diagnostics.length > 0) {
			this.logger.log(context.formatAllDiagnostics())
		}

		if (context.hasErrors()) {
			if (format === 'text') this.logger.error(formatSummary(context.getErrorCount()))
			this.exitCode = 1
		} else if (format === 'text') {
			this.logger.success(`${this.input}: no ownership errors`)
		}
	}

	override async run(): Promise<void> {
		const format = this.validateFlags()
		if (format === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const context = new AnalysisContext(source, this.input)
		try {
			this.analyzeSource(context)
		} catch (error: unknown) {
			this.fail(formatInvalidProgramError(error))
			return
		}
		this.report(context, format)
	}
}
