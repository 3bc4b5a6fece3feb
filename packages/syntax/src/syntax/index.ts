/**
 * Typed views. Importing this module registers a view for every node kind.
 */

export {
	type CollectionView,
	isAnyToken,
	isTokenOf,
	LayoutSyntax,
	NodeSyntax,
	type ParentContext,
	Syntax,
	SyntaxCollection,
	type SyntaxGuard,
	type TokenOf,
	TokenSyntax,
	wrapNode,
	wrapSyntax,
} from './base.ts'
export * from './decls.ts'
export * from './generics.ts'
export * from './source.ts'
export * from './stmts.ts'
export * from './types.ts'
export * from './unknown.ts'
