import { NodeKind } from '../core/kinds.ts'
import type { TokenOf, TokenSyntax } from '../syntax/base.ts'
import { SourceFileSyntax, TopLevelItemList, type TopLevelItemListSyntax } from '../syntax/source.ts'
import {
	type BlockItemSyntax,
	BreakStmtSyntax,
	CodeBlockStmtSyntax,
	FallthroughStmtSyntax,
	StmtList,
	type StmtListSyntax,
} from '../syntax/stmts.ts'
import { type UnknownSyntax, UnknownTokens } from '../syntax/unknown.ts'
import { blankCollectionOf, blankLayoutOf, collectionOf, layoutOf } from './build.ts'

// =============================================================================
// STATEMENTS
// =============================================================================

export function makeCodeBlockStmt(
	leftBrace: TokenOf<'LeftBrace'>,
	statements: StmtListSyntax,
	rightBrace: TokenOf<'RightBrace'>
): CodeBlockStmtSyntax {
	return layoutOf(NodeKind.CodeBlockStmt, CodeBlockStmtSyntax, [leftBrace, statements, rightBrace])
}

export function makeBlankCodeBlockStmt(): CodeBlockStmtSyntax {
	return blankLayoutOf(NodeKind.CodeBlockStmt, CodeBlockStmtSyntax)
}

export function makeStmtList(statements: Iterable<BlockItemSyntax>): StmtListSyntax {
	return collectionOf(StmtList, statements)
}

export function makeBlankStmtList(): StmtListSyntax {
	return blankCollectionOf(StmtList)
}

export function makeFallthroughStmt(fallthroughKeyword: TokenOf<'Fallthrough'>): FallthroughStmtSyntax {
	return layoutOf(NodeKind.FallthroughStmt, FallthroughStmtSyntax, [fallthroughKeyword])
}

export function makeBlankFallthroughStmt(): FallthroughStmtSyntax {
	return blankLayoutOf(NodeKind.FallthroughStmt, FallthroughStmtSyntax)
}

export function makeBreakStmt(
	breakKeyword: TokenOf<'Break'>,
	label: TokenOf<'Identifier'> | null
): BreakStmtSyntax {
	return layoutOf(NodeKind.BreakStmt, BreakStmtSyntax, [breakKeyword, label])
}

export function makeBlankBreakStmt(): BreakStmtSyntax {
	return blankLayoutOf(NodeKind.BreakStmt, BreakStmtSyntax)
}

// =============================================================================
// SOURCE FILES
// =============================================================================

export function makeSourceFile(items: TopLevelItemListSyntax, eof: TokenOf<'Eof'>): SourceFileSyntax {
	return layoutOf(NodeKind.SourceFile, SourceFileSyntax, [items, eof])
}

export function makeBlankSourceFile(): SourceFileSyntax {
	return blankLayoutOf(NodeKind.SourceFile, SourceFileSyntax)
}

export function makeTopLevelItemList(items: Iterable<BlockItemSyntax>): TopLevelItemListSyntax {
	return collectionOf(TopLevelItemList, items)
}

export function makeBlankTopLevelItemList(): TopLevelItemListSyntax {
	return blankCollectionOf(TopLevelItemList)
}

// =============================================================================
// UNKNOWN
// =============================================================================

/** Wrap tokens that fit no production so they still print. */
export function makeUnknownSyntax(tokens: Iterable<TokenSyntax>): UnknownSyntax {
	return collectionOf(UnknownTokens, tokens)
}

export function makeBlankUnknownSyntax(): UnknownSyntax {
	return blankCollectionOf(UnknownTokens)
}
