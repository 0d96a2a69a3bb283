#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tether')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([CheckCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`tether v${version}`)
		console.log('')
		console.log('Usage: tether [command] [options]')
		console.log('')
		console.log('Run "tether --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
