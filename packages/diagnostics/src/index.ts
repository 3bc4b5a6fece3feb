/**
 * @fulltree/diagnostics
 *
 * Shared diagnostic types and definitions for fulltree packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	FTCLI001,
	FTCLI002,
	FTCLI003,
} from './cli.ts'
export { formatCodedMessage, interpolateMessage } from './interpolate.ts'
export {
	type ContractDiagnosticCode,
	FTCORE001,
	FTCORE002,
	FTCORE003,
	FTCORE004,
	FTCORE005,
	FTCORE006,
	FTCORE007,
	FTCORE008,
	FTCORE009,
	FTCORE010,
	FTCORE011,
	FTCORE012,
	FTCORE013,
	FTSYN001,
	FTSYN002,
	type RecoveryDiagnosticCode,
	SYNTAX_DIAGNOSTICS,
	type SyntaxDiagnosticCode,
} from './syntax.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity, SEVERITY_LABELS } from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { SYNTAX_DIAGNOSTICS } from './syntax.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...SYNTAX_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
