/**
 * Debug dump of a tree: one line per node, children indented below their
 * parent, layout children prefixed with their slot name.
 *
 * ```
 * TupleType
 *   leftParen: LeftParen '('
 *   elements: TupleTypeElementList
 *   rightParen: RightParen ')'
 * ```
 */

import { kindName } from '../core/kinds.ts'
import type { SyntaxNode } from '../core/nodes.ts'
import { shapeOf } from '../core/shapes.ts'
import type { TokenNode } from '../core/tokens.ts'
import type { Printable } from './printer.ts'

export interface DumpOptions {
	/** Indent per level (default: two spaces) */
	indent?: string
	/** Show non-empty leading and trailing trivia of tokens (default: false) */
	trivia?: boolean
	/** Mark missing nodes and tokens with `<missing>` (default: true) */
	missing?: boolean
}

interface ResolvedDumpOptions {
	readonly indent: string
	readonly trivia: boolean
	readonly missing: boolean
}

function describeToken(token: TokenNode, options: ResolvedDumpOptions): string {
	let line = `${kindName(token.kind)} '${token.text}'`
	if (options.trivia) {
		if (!token.leadingTrivia.isEmpty) line += ` leading=${JSON.stringify(token.leadingTrivia.text)}`
		if (!token.trailingTrivia.isEmpty) line += ` trailing=${JSON.stringify(token.trailingTrivia.text)}`
	}
	return line
}

function describe(node: SyntaxNode, options: ResolvedDumpOptions): string {
	const head = node.type === 'token' ? describeToken(node, options) : kindName(node.kind)
	return options.missing && node.isMissing ? `${head} <missing>` : head
}

function dumpInto(
	lines: string[],
	node: SyntaxNode,
	prefix: string,
	depth: number,
	options: ResolvedDumpOptions
): void {
	lines.push(`${options.indent.repeat(depth)}${prefix}${describe(node, options)}`)
	if (node.type === 'token') return

	const shape = shapeOf(node.kind)
	node.children.forEach((child, index) => {
		const slotName = shape.type === 'layout' ? shape.slots[index]?.name : undefined
		const childPrefix = slotName === undefined ? '' : `${slotName}: `
		if (child === null) {
			lines.push(`${options.indent.repeat(depth + 1)}${childPrefix}<absent>`)
			return
		}
		dumpInto(lines, child, childPrefix, depth + 1, options)
	})
}

export function dumpSyntax(node: Printable, options: DumpOptions = {}): string {
	const resolved: ResolvedDumpOptions = {
		indent: options.indent ?? '  ',
		missing: options.missing ?? true,
		trivia: options.trivia ?? false,
	}
	const lines: string[] = []
	dumpInto(lines, 'raw' in node ? node.raw : node, '', 0, resolved)
	return lines.join('\n')
}
