import { NodeKind } from '../core/kinds.ts'
import { defineCollection, isAnyToken, type Syntax, type SyntaxCollection, type TokenSyntax } from './base.ts'

/**
 * Tokens that fit no production, kept verbatim so the source still prints.
 */
export type UnknownSyntax = SyntaxCollection<typeof NodeKind.UnknownSyntax, TokenSyntax>
export const UnknownTokens = defineCollection(NodeKind.UnknownSyntax, isAnyToken)

export function isUnknownSyntax(syntax: Syntax): syntax is UnknownSyntax {
	return UnknownTokens.is(syntax)
}
