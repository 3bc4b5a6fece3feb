/**
 * Recovery points of a finished tree.
 *
 * A parser that hits malformed source fills the gap with missing tokens and
 * blank nodes instead of failing. This walks a tree, finds the outermost
 * missing nodes and turns them into located diagnostics.
 */

import { canonicalText, isTokenKind, kindName, type SyntaxKind } from '../core/kinds.ts'
import { rawTokens } from '../core/nodes.ts'
import { printSyntax } from '../print/printer.ts'
import { NodeSyntax, type Syntax } from '../syntax/base.ts'
import { DiagnosticReport, type SourceLocation } from './report.ts'

export interface MissingRecord extends SourceLocation {
	/** The missing node, wrapped with its parent context */
	readonly syntax: Syntax
	readonly kind: SyntaxKind
	/** Child indices from the root down to the node */
	readonly path: readonly number[]
}

export interface DiagnoseOptions {
	/** Name shown in `-->` location lines (default: `<input>`) */
	filename?: string
}

/** Offset of the leading trivia of a subtree's first token. */
function leadingWidth(syntax: Syntax): number {
	for (const token of rawTokens(syntax.raw)) {
		return token.leadingTrivia.length
	}
	return 0
}

/**
 * Every outermost missing node under `root`, in source order. Missing nodes
 * inside a missing node are not reported separately. The location is where
 * the node's text would start.
 */
export function collectMissing(root: Syntax): MissingRecord[] {
	const report = new DiagnosticReport(printSyntax(root))
	const records: MissingRecord[] = []

	const visit = (syntax: Syntax, path: readonly number[], start: number): void => {
		if (syntax.isMissing) {
			records.push({ kind: syntax.kind, path, syntax, ...report.locate(start + leadingWidth(syntax)) })
			return
		}
		if (!(syntax instanceof NodeSyntax)) return
		let offset = start
		let index = 0
		for (const child of syntax.children()) {
			if (child !== null) {
				visit(child, [...path, index], offset)
				offset += child.textLength
			}
			index++
		}
	}

	visit(root, [], 0)
	return records
}

/** How a missing kind is named in messages: quoted text for fixed tokens. */
export function describeExpected(kind: SyntaxKind): string {
	if (isTokenKind(kind)) {
		const text = canonicalText(kind)
		if (text !== undefined && text !== '') return `'${text}'`
	}
	return kindName(kind)
}

/**
 * One diagnostic per outermost missing node: `FTSYN001` for a missing token,
 * `FTSYN002` for a missing node.
 */
export function diagnoseMissing(root: Syntax, options: DiagnoseOptions = {}): DiagnosticReport {
	const report = new DiagnosticReport(printSyntax(root), options.filename)
	for (const record of collectMissing(root)) {
		const code = isTokenKind(record.kind) ? 'FTSYN001' : 'FTSYN002'
		report.emit(code, record.offset, record.path, { expected: describeExpected(record.kind) })
	}
	return report
}
