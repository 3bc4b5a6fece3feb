/**
 * CLI diagnostic definitions.
 *
 * Error code format: FTCLI<NUMBER>
 * - FTCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (FTCLI001-099)
// =============================================================================

export const FTCLI001: DiagnosticDef = {
	code: 'FTCLI001',
	description: 'The name does not match any node or token kind.',
	message: 'unknown syntax kind: {name}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run "fulltree kinds" to list the available kinds.',
}

export const FTCLI002: DiagnosticDef = {
	code: 'FTCLI002',
	description: 'Tokens are leaves, so they have no slots to describe.',
	message: '{name} is a token kind and has no shape',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a node kind such as StructDecl.',
}

export const FTCLI003: DiagnosticDef = {
	code: 'FTCLI003',
	description: 'The command crashed while building or printing a tree.',
	message: 'internal error: {reason}',
	severity: DiagnosticSeverity.Error,
}

export const CLI_DIAGNOSTICS = {
	FTCLI001,
	FTCLI002,
	FTCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
