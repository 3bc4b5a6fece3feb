/**
 * Kind discriminants for every syntax element.
 * Token kinds and node kinds share one numeric space so a slot can allow either.
 */

/** Terminal lexical kinds. */
export const TokenKind = {
	Any: 59,
	Arrow: 12,
	AtSign: 13,

	// Operators and free-text terminals (100-149)
	BinaryOperator: 100,
	Break: 53,
	Colon: 9,
	Comma: 8,

	// Special (199)
	Eof: 199,
	Equal: 11,
	Exclaim: 15,
	Fallthrough: 52,
	Identifier: 101,
	Inout: 55,
	IntegerLiteral: 102,
	LeftAngle: 6,
	LeftBrace: 4,

	// Punctuation (0-49)
	LeftParen: 0,
	LeftSquare: 2,
	Period: 10,
	PostfixQuestion: 14,
	Rethrows: 57,
	RightAngle: 7,
	RightBrace: 5,
	RightParen: 1,
	RightSquare: 3,
	SelfType: 58,
	StringLiteral: 103,

	// Keywords (50-99)
	Struct: 50,
	Throws: 56,
	Typealias: 51,
	Unknown: 149,
	Where: 54,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Non-terminal kinds - one per grammar production or list. */
export const NodeKind = {
	ArrayType: 225,
	BalancedTokens: 222,
	BreakStmt: 213,

	// Statements (210-219)
	CodeBlockStmt: 210,
	ConformanceRequirement: 259,
	DeclMembers: 204,
	DictionaryType: 226,
	FallthroughStmt: 212,
	FunctionType: 229,
	FunctionTypeArgument: 227,
	GenericArgument: 255,
	GenericArgumentClause: 253,
	GenericArgumentList: 254,
	GenericParameter: 252,

	// Generics (250-269)
	GenericParameterClause: 250,
	GenericParameterList: 251,
	GenericRequirementList: 257,
	GenericWhereClause: 256,
	ImplicitlyUnwrappedOptionalType: 232,
	MetatypeType: 233,
	OptionalType: 231,
	SameTypeRequirement: 258,

	// Source file and declarations (200-209)
	SourceFile: 200,
	StmtList: 211,
	StructDecl: 202,
	TopLevelItemList: 201,
	TupleType: 234,
	TupleTypeElement: 235,
	TupleTypeElementList: 236,
	TypealiasDecl: 203,
	TypeArgumentList: 228,

	// Types (220-249)
	TypeAttribute: 220,
	TypeAttributes: 221,
	TypeIdentifier: 224,

	// Error recovery (290)
	UnknownSyntax: 290,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

export type SyntaxKind = TokenKind | NodeKind

const TOKEN_KINDS: ReadonlySet<number> = new Set(Object.values(TokenKind))
const NODE_KINDS: ReadonlySet<number> = new Set(Object.values(NodeKind))

const KIND_NAMES: ReadonlyMap<number, string> = new Map([
	...Object.entries(TokenKind).map(([name, kind]): [number, string] => [kind, name]),
	...Object.entries(NodeKind).map(([name, kind]): [number, string] => [kind, name]),
])

const KINDS_BY_NAME: ReadonlyMap<string, SyntaxKind> = new Map<string, SyntaxKind>([
	...Object.entries(TokenKind),
	...Object.entries(NodeKind),
])

/** Every token kind, in ascending numeric order. */
export const ALL_TOKEN_KINDS: readonly TokenKind[] = Object.freeze(
	Object.values(TokenKind).sort((a, b) => a - b)
)

/** Every node kind, in ascending numeric order. */
export const ALL_NODE_KINDS: readonly NodeKind[] = Object.freeze(
	Object.values(NodeKind).sort((a, b) => a - b)
)

export function isTokenKind(kind: number): kind is TokenKind {
	return TOKEN_KINDS.has(kind)
}

export function isNodeKind(kind: number): kind is NodeKind {
	return NODE_KINDS.has(kind)
}

/** Name of a kind as written in TokenKind/NodeKind, or `#<n>` for unknown values. */
export function kindName(kind: number): string {
	return KIND_NAMES.get(kind) ?? `#${kind}`
}

export function kindByName(name: string): SyntaxKind | undefined {
	return KINDS_BY_NAME.get(name)
}

/**
 * Fixed spelling of keyword and punctuation kinds.
 * Free-text kinds (identifiers, literals, operators, unknown) have none.
 */
const CANONICAL_TEXT: ReadonlyMap<TokenKind, string> = new Map<TokenKind, string>([
	[TokenKind.LeftParen, '('],
	[TokenKind.RightParen, ')'],
	[TokenKind.LeftSquare, '['],
	[TokenKind.RightSquare, ']'],
	[TokenKind.LeftBrace, '{'],
	[TokenKind.RightBrace, '}'],
	[TokenKind.LeftAngle, '<'],
	[TokenKind.RightAngle, '>'],
	[TokenKind.Comma, ','],
	[TokenKind.Colon, ':'],
	[TokenKind.Period, '.'],
	[TokenKind.Equal, '='],
	[TokenKind.Arrow, '->'],
	[TokenKind.AtSign, '@'],
	[TokenKind.PostfixQuestion, '?'],
	[TokenKind.Exclaim, '!'],
	[TokenKind.Struct, 'struct'],
	[TokenKind.Typealias, 'typealias'],
	[TokenKind.Fallthrough, 'fallthrough'],
	[TokenKind.Break, 'break'],
	[TokenKind.Where, 'where'],
	[TokenKind.Inout, 'inout'],
	[TokenKind.Throws, 'throws'],
	[TokenKind.Rethrows, 'rethrows'],
	[TokenKind.SelfType, 'Self'],
	[TokenKind.Any, 'Any'],
	[TokenKind.Eof, ''],
])

export function canonicalText(kind: TokenKind): string | undefined {
	return CANONICAL_TEXT.get(kind)
}
