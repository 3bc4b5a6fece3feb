import { args, BaseCommand } from '@adonisjs/ace'
import { formatShapeOf, resolveNodeKind } from '../utils.ts'

export default class ShapeCommand extends BaseCommand {
	static override commandName = 'shape'
	static override description = 'Print the slots of a node kind'

	@args.string({ description: 'Node kind name, as in StructDecl' })
	declare kind: string

	override async run(): Promise<void> {
		const resolved = resolveNodeKind(this.kind)
		if (!resolved.ok) {
			this.logger.error(resolved.error)
			this.exitCode = 1
			return
		}
		for (const line of formatShapeOf(resolved.kind)) {
			this.logger.log(line)
		}
	}
}
