import { NodeKind, TokenKind } from '../core/kinds.ts'
import {
	defineCollection,
	defineLayout,
	isTokenOf,
	LayoutSyntax,
	type SyntaxCollection,
	type TokenOf,
} from './base.ts'
import { type BlockItemSyntax, isBlockItemSyntax } from './stmts.ts'

const isEof = isTokenOf(TokenKind.Eof)

export type TopLevelItemListSyntax = SyntaxCollection<
	typeof NodeKind.TopLevelItemList,
	BlockItemSyntax
>
export const TopLevelItemList = defineCollection(NodeKind.TopLevelItemList, isBlockItemSyntax)

/**
 * Root of a tree. Trivia after the last item hangs on the Eof token as
 * leading trivia, so an empty file still prints back exactly.
 */
export class SourceFileSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.SourceFile {
		return NodeKind.SourceFile
	}

	get items(): TopLevelItemListSyntax {
		return this.required('items', TopLevelItemList.is)
	}

	get eof(): TokenOf<'Eof'> {
		return this.required('eof', isEof)
	}

	withItems(items: TopLevelItemListSyntax): SourceFileSyntax {
		return this.replacing('items', items, SourceFileSyntax)
	}

	withEof(eof: TokenOf<'Eof'>): SourceFileSyntax {
		return this.replacing('eof', eof, SourceFileSyntax)
	}

	addingItem(item: BlockItemSyntax): SourceFileSyntax {
		return this.withItems(this.items.appending(item))
	}
}

defineLayout(NodeKind.SourceFile, SourceFileSyntax)
