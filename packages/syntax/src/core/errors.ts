import {
	type ContractDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	formatCodedMessage,
	SYNTAX_DIAGNOSTICS,
} from '@fulltree/diagnostics'

/**
 * Thrown when a node is built against its shape contract.
 * This always means a bug in the calling grammar layer; malformed source is
 * represented by missing nodes instead.
 */
export class SyntaxContractError extends Error {
	readonly code: ContractDiagnosticCode
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs

	constructor(code: ContractDiagnosticCode, args: DiagnosticArgs = {}) {
		const def = SYNTAX_DIAGNOSTICS[code]
		super(formatCodedMessage(def, args))
		this.name = 'SyntaxContractError'
		this.code = code
		this.def = def
		this.args = args
	}
}

export function contractViolation(code: ContractDiagnosticCode, args?: DiagnosticArgs): never {
	throw new SyntaxContractError(code, args)
}
