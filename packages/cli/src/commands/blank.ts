import { args, BaseCommand, flags } from '@adonisjs/ace'
import { formatBlank, formatInternalError, resolveNodeKind } from '../utils.ts'

export default class BlankCommand extends BaseCommand {
	static override commandName = 'blank'
	static override description = 'Dump the blank placeholder tree of a node kind'

	@args.string({ description: 'Node kind name, as in StructDecl' })
	declare kind: string

	@flags.boolean({ description: 'Show token trivia in the dump' })
	declare trivia?: boolean

	override async run(): Promise<void> {
		const resolved = resolveNodeKind(this.kind)
		if (!resolved.ok) {
			this.logger.error(resolved.error)
			this.exitCode = 1
			return
		}
		try {
			this.logger.log(formatBlank(resolved.kind, this.trivia === true))
		} catch (error: unknown) {
			this.logger.error(formatInternalError(error))
			this.exitCode = 1
		}
	}
}
