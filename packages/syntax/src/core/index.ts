/**
 * Core data structures: kinds, trivia, raw token and layout nodes, and the
 * shape registry that governs them.
 */

export { contractViolation, SyntaxContractError } from './errors.ts'
export {
	ALL_NODE_KINDS,
	ALL_TOKEN_KINDS,
	canonicalText,
	isNodeKind,
	isTokenKind,
	kindByName,
	kindName,
	NodeKind,
	type SyntaxKind,
	TokenKind,
} from './kinds.ts'
export {
	assertBuiltNode,
	isBuiltNode,
	type LayoutNode,
	makeBlank,
	makeBlankLayout,
	makeCollection,
	makeLayout,
	rawEquals,
	rawTokens,
	rebuildWith,
	replaceChildAt,
	type SyntaxNode,
	verifySyntax,
} from './nodes.ts'
export {
	type CollectionShape,
	type LayoutShape,
	layoutShapeOf,
	registeredKinds,
	type Shape,
	type SlotShape,
	shapeOf,
	slotCountOf,
	slotIndexOf,
	TYPE_KINDS,
} from './shapes.ts'
export {
	makeCanonicalToken,
	makeMissingToken,
	makeToken,
	type TokenNode,
	withTokenTrivia,
} from './tokens.ts'
export { Trivia, TriviaKind, type TriviaPiece, triviaKindName, triviaPiece } from './trivia.ts'
