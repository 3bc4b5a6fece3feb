/**
 * Round-trip printer.
 * Concatenates leading trivia, text and trailing trivia of every token in
 * tree order; for a tree built from scanner output this is the exact source.
 */

import { rawTokens, type SyntaxNode } from '../core/nodes.ts'

export type Printable = SyntaxNode | { readonly raw: SyntaxNode }

function rawOf(node: Printable): SyntaxNode {
	return 'raw' in node ? node.raw : node
}

export function printSyntax(node: Printable): string {
	const parts: string[] = []
	for (const token of rawTokens(rawOf(node))) {
		parts.push(token.leadingTrivia.text, token.text, token.trailingTrivia.text)
	}
	return parts.join('')
}

/** Length of {@link printSyntax}'s output, without building the string. */
export function textLength(node: Printable): number {
	let length = 0
	for (const token of rawTokens(rawOf(node))) {
		length += token.leadingTrivia.length + token.text.length + token.trailingTrivia.length
	}
	return length
}
