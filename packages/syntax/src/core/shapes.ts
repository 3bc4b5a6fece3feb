/**
 * The shape registry: for every node kind, the slots it has and the kinds
 * each slot accepts. Compiled in, frozen at load and never changed.
 *
 * Layout shapes have a fixed, named slot list. Collection shapes have any
 * number of elements, each of an allowed kind.
 */

import { contractViolation } from './errors.ts'
import {
	ALL_TOKEN_KINDS,
	isNodeKind,
	isTokenKind,
	kindName,
	NodeKind,
	type SyntaxKind,
	TokenKind,
} from './kinds.ts'

export interface SlotShape {
	readonly name: string
	/** Allowed kinds; the first one is used to fill the slot of a blank node. */
	readonly kinds: readonly SyntaxKind[]
	readonly optional: boolean
}

export interface LayoutShape {
	readonly type: 'layout'
	readonly kind: NodeKind
	readonly slots: readonly SlotShape[]
	/** Slot name to index. */
	readonly slotIndex: ReadonlyMap<string, number>
}

export interface CollectionShape {
	readonly type: 'collection'
	readonly kind: NodeKind
	readonly elementKinds: readonly SyntaxKind[]
}

export type Shape = LayoutShape | CollectionShape

/** The kinds a type position accepts. TypeIdentifier is the blank form. */
export const TYPE_KINDS: readonly NodeKind[] = Object.freeze([
	NodeKind.TypeIdentifier,
	NodeKind.TupleType,
	NodeKind.OptionalType,
	NodeKind.ImplicitlyUnwrappedOptionalType,
	NodeKind.MetatypeType,
	NodeKind.ArrayType,
	NodeKind.DictionaryType,
	NodeKind.FunctionType,
])

const DECL_KINDS = [NodeKind.StructDecl, NodeKind.TypealiasDecl] as const
const STMT_KINDS = [NodeKind.CodeBlockStmt, NodeKind.FallthroughStmt, NodeKind.BreakStmt] as const

function required(name: string, ...kinds: SyntaxKind[]): SlotShape {
	return Object.freeze({ kinds: Object.freeze(kinds), name, optional: false })
}

function optional(name: string, ...kinds: SyntaxKind[]): SlotShape {
	return Object.freeze({ kinds: Object.freeze(kinds), name, optional: true })
}

function layout(kind: NodeKind, ...slots: SlotShape[]): LayoutShape {
	const slotIndex = new Map(slots.map((slot, index): [string, number] => [slot.name, index]))
	return Object.freeze({ kind, slotIndex, slots: Object.freeze(slots), type: 'layout' as const })
}

function collection(kind: NodeKind, ...elementKinds: SyntaxKind[]): CollectionShape {
	return Object.freeze({ elementKinds: Object.freeze(elementKinds), kind, type: 'collection' as const })
}

const SHAPE_LIST: readonly Shape[] = [
	// Source file and declarations
	layout(
		NodeKind.SourceFile,
		required('items', NodeKind.TopLevelItemList),
		required('eof', TokenKind.Eof)
	),
	collection(NodeKind.TopLevelItemList, ...DECL_KINDS, ...STMT_KINDS, NodeKind.UnknownSyntax),
	layout(
		NodeKind.StructDecl,
		required('structKeyword', TokenKind.Struct),
		required('identifier', TokenKind.Identifier),
		optional('genericParameterClause', NodeKind.GenericParameterClause),
		optional('genericWhereClause', NodeKind.GenericWhereClause),
		required('leftBrace', TokenKind.LeftBrace),
		required('members', NodeKind.DeclMembers),
		required('rightBrace', TokenKind.RightBrace)
	),
	layout(
		NodeKind.TypealiasDecl,
		required('typealiasKeyword', TokenKind.Typealias),
		required('identifier', TokenKind.Identifier),
		optional('genericParameterClause', NodeKind.GenericParameterClause),
		required('equal', TokenKind.Equal),
		required('type', ...TYPE_KINDS)
	),
	collection(NodeKind.DeclMembers, ...DECL_KINDS, NodeKind.UnknownSyntax),

	// Statements
	layout(
		NodeKind.CodeBlockStmt,
		required('leftBrace', TokenKind.LeftBrace),
		required('statements', NodeKind.StmtList),
		required('rightBrace', TokenKind.RightBrace)
	),
	collection(NodeKind.StmtList, ...STMT_KINDS, ...DECL_KINDS, NodeKind.UnknownSyntax),
	layout(NodeKind.FallthroughStmt, required('fallthroughKeyword', TokenKind.Fallthrough)),
	layout(
		NodeKind.BreakStmt,
		required('breakKeyword', TokenKind.Break),
		optional('label', TokenKind.Identifier)
	),

	// Types
	layout(
		NodeKind.TypeAttribute,
		required('atSign', TokenKind.AtSign),
		required('name', TokenKind.Identifier),
		optional('leftParen', TokenKind.LeftParen),
		optional('balancedTokens', NodeKind.BalancedTokens),
		optional('rightParen', TokenKind.RightParen)
	),
	collection(NodeKind.TypeAttributes, NodeKind.TypeAttribute),
	collection(NodeKind.BalancedTokens, ...ALL_TOKEN_KINDS),
	layout(
		NodeKind.TypeIdentifier,
		required('name', TokenKind.Identifier, TokenKind.SelfType, TokenKind.Any),
		optional('genericArgumentClause', NodeKind.GenericArgumentClause)
	),
	layout(
		NodeKind.TupleType,
		required('leftParen', TokenKind.LeftParen),
		required('elements', NodeKind.TupleTypeElementList),
		required('rightParen', TokenKind.RightParen)
	),
	collection(NodeKind.TupleTypeElementList, NodeKind.TupleTypeElement),
	layout(
		NodeKind.TupleTypeElement,
		optional('label', TokenKind.Identifier),
		optional('colon', TokenKind.Colon),
		required('type', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),
	layout(
		NodeKind.OptionalType,
		required('baseType', ...TYPE_KINDS),
		required('questionMark', TokenKind.PostfixQuestion)
	),
	layout(
		NodeKind.ImplicitlyUnwrappedOptionalType,
		required('baseType', ...TYPE_KINDS),
		required('exclaimMark', TokenKind.Exclaim)
	),
	layout(
		NodeKind.MetatypeType,
		required('baseType', ...TYPE_KINDS),
		required('period', TokenKind.Period),
		required('typeOrProtocol', TokenKind.Identifier)
	),
	layout(
		NodeKind.ArrayType,
		required('leftSquare', TokenKind.LeftSquare),
		required('elementType', ...TYPE_KINDS),
		required('rightSquare', TokenKind.RightSquare)
	),
	layout(
		NodeKind.DictionaryType,
		required('leftSquare', TokenKind.LeftSquare),
		required('keyType', ...TYPE_KINDS),
		required('colon', TokenKind.Colon),
		required('valueType', ...TYPE_KINDS),
		required('rightSquare', TokenKind.RightSquare)
	),
	layout(
		NodeKind.FunctionTypeArgument,
		optional('externalName', TokenKind.Identifier),
		optional('localName', TokenKind.Identifier),
		optional('attributes', NodeKind.TypeAttributes),
		optional('inoutKeyword', TokenKind.Inout),
		optional('colon', TokenKind.Colon),
		required('type', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),
	collection(NodeKind.TypeArgumentList, NodeKind.FunctionTypeArgument),
	layout(
		NodeKind.FunctionType,
		optional('attributes', NodeKind.TypeAttributes),
		required('leftParen', TokenKind.LeftParen),
		required('arguments', NodeKind.TypeArgumentList),
		required('rightParen', TokenKind.RightParen),
		optional('throwsOrRethrows', TokenKind.Throws, TokenKind.Rethrows),
		required('arrow', TokenKind.Arrow),
		required('returnType', ...TYPE_KINDS)
	),

	// Generics
	layout(
		NodeKind.GenericParameterClause,
		required('leftAngle', TokenKind.LeftAngle),
		required('parameters', NodeKind.GenericParameterList),
		required('rightAngle', TokenKind.RightAngle)
	),
	collection(NodeKind.GenericParameterList, NodeKind.GenericParameter),
	layout(
		NodeKind.GenericParameter,
		required('name', TokenKind.Identifier),
		optional('colon', TokenKind.Colon),
		optional('inheritedType', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),
	layout(
		NodeKind.GenericArgumentClause,
		required('leftAngle', TokenKind.LeftAngle),
		required('arguments', NodeKind.GenericArgumentList),
		required('rightAngle', TokenKind.RightAngle)
	),
	collection(NodeKind.GenericArgumentList, NodeKind.GenericArgument),
	layout(
		NodeKind.GenericArgument,
		required('type', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),
	layout(
		NodeKind.GenericWhereClause,
		required('whereKeyword', TokenKind.Where),
		required('requirements', NodeKind.GenericRequirementList)
	),
	collection(
		NodeKind.GenericRequirementList,
		NodeKind.SameTypeRequirement,
		NodeKind.ConformanceRequirement
	),
	layout(
		NodeKind.SameTypeRequirement,
		required('leftType', NodeKind.TypeIdentifier),
		required('equalityToken', TokenKind.BinaryOperator),
		required('rightType', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),
	layout(
		NodeKind.ConformanceRequirement,
		required('leftType', NodeKind.TypeIdentifier),
		required('colon', TokenKind.Colon),
		required('rightType', ...TYPE_KINDS),
		optional('trailingComma', TokenKind.Comma)
	),

	// Error recovery
	collection(NodeKind.UnknownSyntax, ...ALL_TOKEN_KINDS),
]

const SHAPES: ReadonlyMap<NodeKind, Shape> = new Map(
	SHAPE_LIST.map((shape): [NodeKind, Shape] => [shape.kind, shape])
)

/**
 * Shape of a node kind.
 * Throws for token kinds and for numbers that are not kinds at all.
 */
export function shapeOf(kind: SyntaxKind): Shape {
	if (isTokenKind(kind)) {
		return contractViolation('FTCORE009', {
			actual: 'token',
			expected: 'node',
			kind: kindName(kind),
		})
	}
	const shape = isNodeKind(kind) ? SHAPES.get(kind) : undefined
	if (shape === undefined) {
		return contractViolation('FTCORE001', { kind: kindName(kind) })
	}
	return shape
}

export function layoutShapeOf(kind: NodeKind): LayoutShape {
	const shape = shapeOf(kind)
	if (shape.type !== 'layout') {
		return contractViolation('FTCORE009', {
			actual: shape.type,
			expected: 'layout',
			kind: kindName(kind),
		})
	}
	return shape
}

export function collectionShapeOf(kind: NodeKind): CollectionShape {
	const shape = shapeOf(kind)
	if (shape.type !== 'collection') {
		return contractViolation('FTCORE009', {
			actual: shape.type,
			expected: 'collection',
			kind: kindName(kind),
		})
	}
	return shape
}

/** Index of a named slot of a layout kind. */
export function slotIndexOf(kind: NodeKind, name: string): number {
	const index = layoutShapeOf(kind).slotIndex.get(name)
	if (index === undefined) {
		return contractViolation('FTCORE008', { child: name, kind: kindName(kind) })
	}
	return index
}

/** Number of slots of a layout kind, or null for collections. */
export function slotCountOf(kind: NodeKind): number | null {
	const shape = shapeOf(kind)
	return shape.type === 'layout' ? shape.slots.length : null
}

/** Node kinds in registry order. */
export function registeredKinds(): NodeKind[] {
	return SHAPE_LIST.map((shape) => shape.kind)
}
