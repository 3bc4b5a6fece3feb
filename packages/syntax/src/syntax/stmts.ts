/**
 * Statement views.
 */

import { NodeKind, TokenKind } from '../core/kinds.ts'
import {
	defineCollection,
	defineLayout,
	isIdentifier,
	isLeftBrace,
	isRightBrace,
	isTokenOf,
	LayoutSyntax,
	type Syntax,
	type SyntaxCollection,
	type TokenOf,
} from './base.ts'
import { type DeclSyntax, isDeclSyntax } from './decls.ts'
import { isUnknownSyntax, type UnknownSyntax } from './unknown.ts'

const isFallthrough = isTokenOf(TokenKind.Fallthrough)
const isBreak = isTokenOf(TokenKind.Break)

/** `{ statements }` */
export class CodeBlockStmtSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.CodeBlockStmt {
		return NodeKind.CodeBlockStmt
	}

	get leftBrace(): TokenOf<'LeftBrace'> {
		return this.required('leftBrace', isLeftBrace)
	}

	get statements(): StmtListSyntax {
		return this.required('statements', StmtList.is)
	}

	get rightBrace(): TokenOf<'RightBrace'> {
		return this.required('rightBrace', isRightBrace)
	}

	withLeftBrace(leftBrace: TokenOf<'LeftBrace'>): CodeBlockStmtSyntax {
		return this.replacing('leftBrace', leftBrace, CodeBlockStmtSyntax)
	}

	withStatements(statements: StmtListSyntax): CodeBlockStmtSyntax {
		return this.replacing('statements', statements, CodeBlockStmtSyntax)
	}

	withRightBrace(rightBrace: TokenOf<'RightBrace'>): CodeBlockStmtSyntax {
		return this.replacing('rightBrace', rightBrace, CodeBlockStmtSyntax)
	}

	addingStatement(statement: BlockItemSyntax): CodeBlockStmtSyntax {
		return this.withStatements(this.statements.appending(statement))
	}
}

export class FallthroughStmtSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.FallthroughStmt {
		return NodeKind.FallthroughStmt
	}

	get fallthroughKeyword(): TokenOf<'Fallthrough'> {
		return this.required('fallthroughKeyword', isFallthrough)
	}

	withFallthroughKeyword(keyword: TokenOf<'Fallthrough'>): FallthroughStmtSyntax {
		return this.replacing('fallthroughKeyword', keyword, FallthroughStmtSyntax)
	}
}

/** `break` with an optional label */
export class BreakStmtSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.BreakStmt {
		return NodeKind.BreakStmt
	}

	get breakKeyword(): TokenOf<'Break'> {
		return this.required('breakKeyword', isBreak)
	}

	get label(): TokenOf<'Identifier'> | null {
		return this.optional('label', isIdentifier)
	}

	withBreakKeyword(keyword: TokenOf<'Break'>): BreakStmtSyntax {
		return this.replacing('breakKeyword', keyword, BreakStmtSyntax)
	}

	withLabel(label: TokenOf<'Identifier'> | null): BreakStmtSyntax {
		return this.replacing('label', label, BreakStmtSyntax)
	}
}

export type StmtSyntax = CodeBlockStmtSyntax | FallthroughStmtSyntax | BreakStmtSyntax

export function isStmtSyntax(syntax: Syntax): syntax is StmtSyntax {
	return (
		syntax instanceof CodeBlockStmtSyntax ||
		syntax instanceof FallthroughStmtSyntax ||
		syntax instanceof BreakStmtSyntax
	)
}

/** Anything that may appear in a statement list or at the top level. */
export type BlockItemSyntax = StmtSyntax | DeclSyntax | UnknownSyntax

export function isBlockItemSyntax(syntax: Syntax): syntax is BlockItemSyntax {
	return isStmtSyntax(syntax) || isDeclSyntax(syntax) || isUnknownSyntax(syntax)
}

export type StmtListSyntax = SyntaxCollection<typeof NodeKind.StmtList, BlockItemSyntax>
export const StmtList = defineCollection(NodeKind.StmtList, isBlockItemSyntax)

defineLayout(NodeKind.CodeBlockStmt, CodeBlockStmtSyntax)
defineLayout(NodeKind.FallthroughStmt, FallthroughStmtSyntax)
defineLayout(NodeKind.BreakStmt, BreakStmtSyntax)
