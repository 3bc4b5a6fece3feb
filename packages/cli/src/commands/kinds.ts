import { BaseCommand, flags } from '@adonisjs/ace'
import { formatKindTable } from '../utils.ts'

export default class KindsCommand extends BaseCommand {
	static override commandName = 'kinds'
	static override description = 'List every node kind and its shape type'

	@flags.boolean({ alias: 't', description: 'Also list token kinds' })
	declare tokens?: boolean

	override async run(): Promise<void> {
		for (const line of formatKindTable(this.tokens === true)) {
			this.logger.log(line)
		}
	}
}
