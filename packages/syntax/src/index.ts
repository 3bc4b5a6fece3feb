/**
 * fulltree syntax public API
 *
 * Immutable, lossless syntax trees:
 * - Tokens own their trivia, so printing a tree gives back its exact source
 * - Every node kind has a fixed shape, checked on construction
 * - Missing tokens and blank nodes stand in for what malformed source lacks
 * - Edits rebuild the path to the root and share everything else
 *
 * Nodes are built through the factory (`make*`, `makeBlank*`) and read
 * through typed views.
 */

export {
	ALL_NODE_KINDS,
	ALL_TOKEN_KINDS,
	canonicalText,
	type CollectionShape,
	isBuiltNode,
	isNodeKind,
	isTokenKind,
	kindByName,
	kindName,
	type LayoutNode,
	type LayoutShape,
	NodeKind,
	rawEquals,
	registeredKinds,
	type Shape,
	type SlotShape,
	shapeOf,
	SyntaxContractError,
	type SyntaxKind,
	type SyntaxNode,
	TokenKind,
	type TokenNode,
	Trivia,
	TriviaKind,
	type TriviaPiece,
	triviaKindName,
	triviaPiece,
	TYPE_KINDS,
	verifySyntax,
} from './core/index.ts'
export {
	collectMissing,
	type DiagnoseOptions,
	describeExpected,
	diagnoseMissing,
	type MissingRecord,
} from './diagnose/missing.ts'
export { type Diagnostic, DiagnosticReport, type SourceLocation } from './diagnose/report.ts'
export * from './factory/index.ts'
export { type DumpOptions, dumpSyntax } from './print/dump.ts'
export { type Printable, printSyntax, textLength } from './print/printer.ts'
export * from './syntax/index.ts'
