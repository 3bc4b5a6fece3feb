/**
 * Syntax tree diagnostic definitions.
 *
 * Error code format: FT<AREA><NUMBER>
 * - FTCORE: Construction contract violations (001-099), thrown by the core
 * - FTSYN: Recovery points in a finished tree (001-099), reported as values
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CONTRACT VIOLATIONS (FTCORE001-099)
// =============================================================================

export const FTCORE001: DiagnosticDef = {
	code: 'FTCORE001',
	description: 'The kind is not registered in the shape registry or the token table.',
	message: 'unknown syntax kind {kind}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of the values of TokenKind or NodeKind.',
}

export const FTCORE002: DiagnosticDef = {
	code: 'FTCORE002',
	description: 'A layout node must have exactly one child slot per slot in its shape.',
	message: '{kind} expects {expected} children, got {actual}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass null for optional slots instead of leaving them out.',
}

export const FTCORE003: DiagnosticDef = {
	code: 'FTCORE003',
	description: 'The child placed in this slot is not one of the kinds its shape allows.',
	message: 'slot {slot} of {kind} does not accept {child}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Build the child with the factory function for an allowed kind, or use a blank node.',
}

export const FTCORE004: DiagnosticDef = {
	code: 'FTCORE004',
	description: 'Tokens can only be made for terminal lexical kinds.',
	message: '{kind} is not a token kind',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE005: DiagnosticDef = {
	code: 'FTCORE005',
	description: 'Keywords and punctuation always spell the same text.',
	message: "{kind} token must have text '{expected}', got '{actual}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use the canonical token constructor, which only takes trivia.',
}

export const FTCORE006: DiagnosticDef = {
	code: 'FTCORE006',
	description: 'A trivia piece must contain exactly the text its kind describes.',
	message: 'invalid {piece} trivia text: {text}',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE007: DiagnosticDef = {
	code: 'FTCORE007',
	description: 'The element placed in this collection is not one of the kinds its shape allows.',
	message: 'element {index} of {kind} does not accept {child}',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE008: DiagnosticDef = {
	code: 'FTCORE008',
	description: 'The slot name or child index does not exist on this node.',
	message: '{kind} has no child {child}',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE009: DiagnosticDef = {
	code: 'FTCORE009',
	description: 'Layouts, collections and tokens are built by different constructors.',
	message: '{kind} is a {actual} kind, expected a {expected} kind',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE010: DiagnosticDef = {
	code: 'FTCORE010',
	description: 'Only optional slots may be left absent; required slots take a blank node instead.',
	message: 'required slot {slot} of {kind} is absent',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass the matching makeBlank result or a missing token.',
}

export const FTCORE011: DiagnosticDef = {
	code: 'FTCORE011',
	description: 'Trivia repetition counts are whole, non-negative numbers.',
	message: 'trivia count must be a non-negative integer, got {count}',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE012: DiagnosticDef = {
	code: 'FTCORE012',
	description: 'A typed view only wraps nodes of the kind it was written for.',
	message: 'cannot view {actual} as {expected}',
	severity: DiagnosticSeverity.Error,
}

export const FTCORE013: DiagnosticDef = {
	code: 'FTCORE013',
	description: 'Trees and views only take raw nodes made by the core constructors, which check and freeze them.',
	message: '{kind} node was not made by a syntax constructor',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Build the node with its make function instead of writing the object by hand.',
}

// =============================================================================
// RECOVERY POINTS (FTSYN001-099)
// =============================================================================

export const FTSYN001: DiagnosticDef = {
	code: 'FTSYN001',
	description: 'The source ended or went on with something else where this token belongs.',
	message: 'expected {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Insert {expected} here.',
}

export const FTSYN002: DiagnosticDef = {
	code: 'FTSYN002',
	description: 'A whole construct is missing at this position.',
	message: 'expected {expected}',
	severity: DiagnosticSeverity.Error,
}

/**
 * Syntax diagnostics indexed by code.
 */
export const SYNTAX_DIAGNOSTICS = {
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
} as const

export type SyntaxDiagnosticCode = keyof typeof SYNTAX_DIAGNOSTICS

export type ContractDiagnosticCode = Extract<SyntaxDiagnosticCode, `FTCORE${string}`>

export type RecoveryDiagnosticCode = Extract<SyntaxDiagnosticCode, `FTSYN${string}`>
