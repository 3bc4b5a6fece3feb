#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import BlankCommand from './commands/blank.ts'
import KindsCommand from './commands/kinds.ts'
import ShapeCommand from './commands/shape.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'fulltree')
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

	const commands = [KindsCommand, ShapeCommand, BlankCommand]
	kernel.addLoader(new ListLoader([...commands, HelpCommand]))

	// Bare `fulltree` or an unknown command name
	kernel.on('finding:command', async () => {
		const width = Math.max(...commands.map((command) => command.commandName.length))
		console.log(`fulltree v${version}`)
		console.log('')
		console.log('Usage: fulltree <command> [options]')
		console.log('')
		for (const command of commands) {
			console.log(`  ${command.commandName.padEnd(width)}  ${command.description}`)
		}
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
