/**
 * Views for type syntax: identifiers, tuples, optionals, metatypes,
 * collections, function types and the attributes that decorate them.
 */

import { NodeKind, TokenKind } from '../core/kinds.ts'
import {
	defineCollection,
	defineLayout,
	isAnyToken,
	isColon,
	isComma,
	isIdentifier,
	isLeftParen,
	isRightParen,
	isTokenOf,
	LayoutSyntax,
	type Syntax,
	type SyntaxCollection,
	type TokenOf,
	type TokenSyntax,
} from './base.ts'
import { type GenericArgumentClauseSyntax, isGenericArgumentClauseSyntax } from './generics.ts'

const isAtSign = isTokenOf(TokenKind.AtSign)
const isTypeName = isTokenOf(TokenKind.Identifier, TokenKind.SelfType, TokenKind.Any)
const isPostfixQuestion = isTokenOf(TokenKind.PostfixQuestion)
const isExclaim = isTokenOf(TokenKind.Exclaim)
const isPeriod = isTokenOf(TokenKind.Period)
const isLeftSquare = isTokenOf(TokenKind.LeftSquare)
const isRightSquare = isTokenOf(TokenKind.RightSquare)
const isInout = isTokenOf(TokenKind.Inout)
const isThrowsOrRethrows = isTokenOf(TokenKind.Throws, TokenKind.Rethrows)
const isArrow = isTokenOf(TokenKind.Arrow)

/** Any node that can stand in a type position. */
export type TypeSyntax =
	| TypeIdentifierSyntax
	| TupleTypeSyntax
	| OptionalTypeSyntax
	| ImplicitlyUnwrappedOptionalTypeSyntax
	| MetatypeTypeSyntax
	| ArrayTypeSyntax
	| DictionaryTypeSyntax
	| FunctionTypeSyntax

export function isTypeSyntax(syntax: Syntax): syntax is TypeSyntax {
	return (
		syntax instanceof TypeIdentifierSyntax ||
		syntax instanceof TupleTypeSyntax ||
		syntax instanceof OptionalTypeSyntax ||
		syntax instanceof ImplicitlyUnwrappedOptionalTypeSyntax ||
		syntax instanceof MetatypeTypeSyntax ||
		syntax instanceof ArrayTypeSyntax ||
		syntax instanceof DictionaryTypeSyntax ||
		syntax instanceof FunctionTypeSyntax
	)
}

// =============================================================================
// ATTRIBUTES
// =============================================================================

/** `@name` or `@name(balanced tokens)` */
export class TypeAttributeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.TypeAttribute {
		return NodeKind.TypeAttribute
	}

	get atSign(): TokenOf<'AtSign'> {
		return this.required('atSign', isAtSign)
	}

	get name(): TokenOf<'Identifier'> {
		return this.required('name', isIdentifier)
	}

	get leftParen(): TokenOf<'LeftParen'> | null {
		return this.optional('leftParen', isLeftParen)
	}

	get balancedTokens(): BalancedTokensSyntax | null {
		return this.optional('balancedTokens', BalancedTokens.is)
	}

	get rightParen(): TokenOf<'RightParen'> | null {
		return this.optional('rightParen', isRightParen)
	}

	withAtSign(atSign: TokenOf<'AtSign'>): TypeAttributeSyntax {
		return this.replacing('atSign', atSign, TypeAttributeSyntax)
	}

	withName(name: TokenOf<'Identifier'>): TypeAttributeSyntax {
		return this.replacing('name', name, TypeAttributeSyntax)
	}

	withLeftParen(leftParen: TokenOf<'LeftParen'> | null): TypeAttributeSyntax {
		return this.replacing('leftParen', leftParen, TypeAttributeSyntax)
	}

	withBalancedTokens(tokens: BalancedTokensSyntax | null): TypeAttributeSyntax {
		return this.replacing('balancedTokens', tokens, TypeAttributeSyntax)
	}

	withRightParen(rightParen: TokenOf<'RightParen'> | null): TypeAttributeSyntax {
		return this.replacing('rightParen', rightParen, TypeAttributeSyntax)
	}
}

export function isTypeAttributeSyntax(syntax: Syntax): syntax is TypeAttributeSyntax {
	return syntax instanceof TypeAttributeSyntax
}

export type TypeAttributesSyntax = SyntaxCollection<typeof NodeKind.TypeAttributes, TypeAttributeSyntax>
export const TypeAttributes = defineCollection(NodeKind.TypeAttributes, isTypeAttributeSyntax)

/** Raw tokens between an attribute's parentheses; any token kind is accepted. */
export type BalancedTokensSyntax = SyntaxCollection<typeof NodeKind.BalancedTokens, TokenSyntax>
export const BalancedTokens = defineCollection(NodeKind.BalancedTokens, isAnyToken)

// =============================================================================
// NAMED AND TUPLE TYPES
// =============================================================================

/** `Name`, `Name<Args>`, `Self` or `Any` */
export class TypeIdentifierSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.TypeIdentifier {
		return NodeKind.TypeIdentifier
	}

	get name(): TokenOf<'Identifier' | 'SelfType' | 'Any'> {
		return this.required('name', isTypeName)
	}

	get genericArgumentClause(): GenericArgumentClauseSyntax | null {
		return this.optional('genericArgumentClause', isGenericArgumentClauseSyntax)
	}

	withName(name: TokenOf<'Identifier' | 'SelfType' | 'Any'>): TypeIdentifierSyntax {
		return this.replacing('name', name, TypeIdentifierSyntax)
	}

	withGenericArgumentClause(clause: GenericArgumentClauseSyntax | null): TypeIdentifierSyntax {
		return this.replacing('genericArgumentClause', clause, TypeIdentifierSyntax)
	}
}

export function isTypeIdentifierSyntax(syntax: Syntax): syntax is TypeIdentifierSyntax {
	return syntax instanceof TypeIdentifierSyntax
}

export class TupleTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.TupleType {
		return NodeKind.TupleType
	}

	get leftParen(): TokenOf<'LeftParen'> {
		return this.required('leftParen', isLeftParen)
	}

	get elements(): TupleTypeElementListSyntax {
		return this.required('elements', TupleTypeElementList.is)
	}

	get rightParen(): TokenOf<'RightParen'> {
		return this.required('rightParen', isRightParen)
	}

	withLeftParen(leftParen: TokenOf<'LeftParen'>): TupleTypeSyntax {
		return this.replacing('leftParen', leftParen, TupleTypeSyntax)
	}

	withElements(elements: TupleTypeElementListSyntax): TupleTypeSyntax {
		return this.replacing('elements', elements, TupleTypeSyntax)
	}

	withRightParen(rightParen: TokenOf<'RightParen'>): TupleTypeSyntax {
		return this.replacing('rightParen', rightParen, TupleTypeSyntax)
	}

	addingElement(element: TupleTypeElementSyntax): TupleTypeSyntax {
		return this.withElements(this.elements.appending(element))
	}
}

/** `label: Type,` with every part but the type optional */
export class TupleTypeElementSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.TupleTypeElement {
		return NodeKind.TupleTypeElement
	}

	get label(): TokenOf<'Identifier'> | null {
		return this.optional('label', isIdentifier)
	}

	get colon(): TokenOf<'Colon'> | null {
		return this.optional('colon', isColon)
	}

	get type(): TypeSyntax {
		return this.required('type', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withLabel(label: TokenOf<'Identifier'> | null): TupleTypeElementSyntax {
		return this.replacing('label', label, TupleTypeElementSyntax)
	}

	withColon(colon: TokenOf<'Colon'> | null): TupleTypeElementSyntax {
		return this.replacing('colon', colon, TupleTypeElementSyntax)
	}

	withType(type: TypeSyntax): TupleTypeElementSyntax {
		return this.replacing('type', type, TupleTypeElementSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): TupleTypeElementSyntax {
		return this.replacing('trailingComma', comma, TupleTypeElementSyntax)
	}
}

export function isTupleTypeElementSyntax(syntax: Syntax): syntax is TupleTypeElementSyntax {
	return syntax instanceof TupleTypeElementSyntax
}

export type TupleTypeElementListSyntax = SyntaxCollection<
	typeof NodeKind.TupleTypeElementList,
	TupleTypeElementSyntax
>
export const TupleTypeElementList = defineCollection(
	NodeKind.TupleTypeElementList,
	isTupleTypeElementSyntax
)

// =============================================================================
// POSTFIX TYPES
// =============================================================================

/** `Base?` */
export class OptionalTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.OptionalType {
		return NodeKind.OptionalType
	}

	get baseType(): TypeSyntax {
		return this.required('baseType', isTypeSyntax)
	}

	get questionMark(): TokenOf<'PostfixQuestion'> {
		return this.required('questionMark', isPostfixQuestion)
	}

	withBaseType(baseType: TypeSyntax): OptionalTypeSyntax {
		return this.replacing('baseType', baseType, OptionalTypeSyntax)
	}

	withQuestionMark(questionMark: TokenOf<'PostfixQuestion'>): OptionalTypeSyntax {
		return this.replacing('questionMark', questionMark, OptionalTypeSyntax)
	}
}

/** `Base!` */
export class ImplicitlyUnwrappedOptionalTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.ImplicitlyUnwrappedOptionalType {
		return NodeKind.ImplicitlyUnwrappedOptionalType
	}

	get baseType(): TypeSyntax {
		return this.required('baseType', isTypeSyntax)
	}

	get exclaimMark(): TokenOf<'Exclaim'> {
		return this.required('exclaimMark', isExclaim)
	}

	withBaseType(baseType: TypeSyntax): ImplicitlyUnwrappedOptionalTypeSyntax {
		return this.replacing('baseType', baseType, ImplicitlyUnwrappedOptionalTypeSyntax)
	}

	withExclaimMark(exclaimMark: TokenOf<'Exclaim'>): ImplicitlyUnwrappedOptionalTypeSyntax {
		return this.replacing('exclaimMark', exclaimMark, ImplicitlyUnwrappedOptionalTypeSyntax)
	}
}

/**
 * `Base.Type` or `Base.Protocol`.
 * The trailing name is an identifier token spelled `Type` or `Protocol`.
 */
export class MetatypeTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.MetatypeType {
		return NodeKind.MetatypeType
	}

	get baseType(): TypeSyntax {
		return this.required('baseType', isTypeSyntax)
	}

	get period(): TokenOf<'Period'> {
		return this.required('period', isPeriod)
	}

	get typeOrProtocol(): TokenOf<'Identifier'> {
		return this.required('typeOrProtocol', isIdentifier)
	}

	withBaseType(baseType: TypeSyntax): MetatypeTypeSyntax {
		return this.replacing('baseType', baseType, MetatypeTypeSyntax)
	}

	withPeriod(period: TokenOf<'Period'>): MetatypeTypeSyntax {
		return this.replacing('period', period, MetatypeTypeSyntax)
	}

	withTypeOrProtocol(name: TokenOf<'Identifier'>): MetatypeTypeSyntax {
		return this.replacing('typeOrProtocol', name, MetatypeTypeSyntax)
	}
}

// =============================================================================
// COLLECTION TYPES
// =============================================================================

/** `[Element]` */
export class ArrayTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.ArrayType {
		return NodeKind.ArrayType
	}

	get leftSquare(): TokenOf<'LeftSquare'> {
		return this.required('leftSquare', isLeftSquare)
	}

	get elementType(): TypeSyntax {
		return this.required('elementType', isTypeSyntax)
	}

	get rightSquare(): TokenOf<'RightSquare'> {
		return this.required('rightSquare', isRightSquare)
	}

	withLeftSquare(leftSquare: TokenOf<'LeftSquare'>): ArrayTypeSyntax {
		return this.replacing('leftSquare', leftSquare, ArrayTypeSyntax)
	}

	withElementType(elementType: TypeSyntax): ArrayTypeSyntax {
		return this.replacing('elementType', elementType, ArrayTypeSyntax)
	}

	withRightSquare(rightSquare: TokenOf<'RightSquare'>): ArrayTypeSyntax {
		return this.replacing('rightSquare', rightSquare, ArrayTypeSyntax)
	}
}

/** `[Key : Value]` */
export class DictionaryTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.DictionaryType {
		return NodeKind.DictionaryType
	}

	get leftSquare(): TokenOf<'LeftSquare'> {
		return this.required('leftSquare', isLeftSquare)
	}

	get keyType(): TypeSyntax {
		return this.required('keyType', isTypeSyntax)
	}

	get colon(): TokenOf<'Colon'> {
		return this.required('colon', isColon)
	}

	get valueType(): TypeSyntax {
		return this.required('valueType', isTypeSyntax)
	}

	get rightSquare(): TokenOf<'RightSquare'> {
		return this.required('rightSquare', isRightSquare)
	}

	withLeftSquare(leftSquare: TokenOf<'LeftSquare'>): DictionaryTypeSyntax {
		return this.replacing('leftSquare', leftSquare, DictionaryTypeSyntax)
	}

	withKeyType(keyType: TypeSyntax): DictionaryTypeSyntax {
		return this.replacing('keyType', keyType, DictionaryTypeSyntax)
	}

	withColon(colon: TokenOf<'Colon'>): DictionaryTypeSyntax {
		return this.replacing('colon', colon, DictionaryTypeSyntax)
	}

	withValueType(valueType: TypeSyntax): DictionaryTypeSyntax {
		return this.replacing('valueType', valueType, DictionaryTypeSyntax)
	}

	withRightSquare(rightSquare: TokenOf<'RightSquare'>): DictionaryTypeSyntax {
		return this.replacing('rightSquare', rightSquare, DictionaryTypeSyntax)
	}
}

// =============================================================================
// FUNCTION TYPES
// =============================================================================

/** One argument of a function type: `external local: @attr inout Type,` */
export class FunctionTypeArgumentSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.FunctionTypeArgument {
		return NodeKind.FunctionTypeArgument
	}

	get externalName(): TokenOf<'Identifier'> | null {
		return this.optional('externalName', isIdentifier)
	}

	get localName(): TokenOf<'Identifier'> | null {
		return this.optional('localName', isIdentifier)
	}

	get attributes(): TypeAttributesSyntax | null {
		return this.optional('attributes', TypeAttributes.is)
	}

	get inoutKeyword(): TokenOf<'Inout'> | null {
		return this.optional('inoutKeyword', isInout)
	}

	get colon(): TokenOf<'Colon'> | null {
		return this.optional('colon', isColon)
	}

	get type(): TypeSyntax {
		return this.required('type', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withExternalName(name: TokenOf<'Identifier'> | null): FunctionTypeArgumentSyntax {
		return this.replacing('externalName', name, FunctionTypeArgumentSyntax)
	}

	withLocalName(name: TokenOf<'Identifier'> | null): FunctionTypeArgumentSyntax {
		return this.replacing('localName', name, FunctionTypeArgumentSyntax)
	}

	withAttributes(attributes: TypeAttributesSyntax | null): FunctionTypeArgumentSyntax {
		return this.replacing('attributes', attributes, FunctionTypeArgumentSyntax)
	}

	withInoutKeyword(inout: TokenOf<'Inout'> | null): FunctionTypeArgumentSyntax {
		return this.replacing('inoutKeyword', inout, FunctionTypeArgumentSyntax)
	}

	withColon(colon: TokenOf<'Colon'> | null): FunctionTypeArgumentSyntax {
		return this.replacing('colon', colon, FunctionTypeArgumentSyntax)
	}

	withType(type: TypeSyntax): FunctionTypeArgumentSyntax {
		return this.replacing('type', type, FunctionTypeArgumentSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): FunctionTypeArgumentSyntax {
		return this.replacing('trailingComma', comma, FunctionTypeArgumentSyntax)
	}
}

export function isFunctionTypeArgumentSyntax(syntax: Syntax): syntax is FunctionTypeArgumentSyntax {
	return syntax instanceof FunctionTypeArgumentSyntax
}

export type TypeArgumentListSyntax = SyntaxCollection<
	typeof NodeKind.TypeArgumentList,
	FunctionTypeArgumentSyntax
>
export const TypeArgumentList = defineCollection(
	NodeKind.TypeArgumentList,
	isFunctionTypeArgumentSyntax
)

/** `@attrs (Args) throws -> Result` */
export class FunctionTypeSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.FunctionType {
		return NodeKind.FunctionType
	}

	get attributes(): TypeAttributesSyntax | null {
		return this.optional('attributes', TypeAttributes.is)
	}

	get leftParen(): TokenOf<'LeftParen'> {
		return this.required('leftParen', isLeftParen)
	}

	get arguments(): TypeArgumentListSyntax {
		return this.required('arguments', TypeArgumentList.is)
	}

	get rightParen(): TokenOf<'RightParen'> {
		return this.required('rightParen', isRightParen)
	}

	get throwsOrRethrows(): TokenOf<'Throws' | 'Rethrows'> | null {
		return this.optional('throwsOrRethrows', isThrowsOrRethrows)
	}

	get arrow(): TokenOf<'Arrow'> {
		return this.required('arrow', isArrow)
	}

	get returnType(): TypeSyntax {
		return this.required('returnType', isTypeSyntax)
	}

	withAttributes(attributes: TypeAttributesSyntax | null): FunctionTypeSyntax {
		return this.replacing('attributes', attributes, FunctionTypeSyntax)
	}

	withLeftParen(leftParen: TokenOf<'LeftParen'>): FunctionTypeSyntax {
		return this.replacing('leftParen', leftParen, FunctionTypeSyntax)
	}

	withArguments(args: TypeArgumentListSyntax): FunctionTypeSyntax {
		return this.replacing('arguments', args, FunctionTypeSyntax)
	}

	withRightParen(rightParen: TokenOf<'RightParen'>): FunctionTypeSyntax {
		return this.replacing('rightParen', rightParen, FunctionTypeSyntax)
	}

	withThrowsOrRethrows(keyword: TokenOf<'Throws' | 'Rethrows'> | null): FunctionTypeSyntax {
		return this.replacing('throwsOrRethrows', keyword, FunctionTypeSyntax)
	}

	withArrow(arrow: TokenOf<'Arrow'>): FunctionTypeSyntax {
		return this.replacing('arrow', arrow, FunctionTypeSyntax)
	}

	withReturnType(returnType: TypeSyntax): FunctionTypeSyntax {
		return this.replacing('returnType', returnType, FunctionTypeSyntax)
	}

	addingArgument(argument: FunctionTypeArgumentSyntax): FunctionTypeSyntax {
		return this.withArguments(this.arguments.appending(argument))
	}
}

defineLayout(NodeKind.TypeAttribute, TypeAttributeSyntax)
defineLayout(NodeKind.TypeIdentifier, TypeIdentifierSyntax)
defineLayout(NodeKind.TupleType, TupleTypeSyntax)
defineLayout(NodeKind.TupleTypeElement, TupleTypeElementSyntax)
defineLayout(NodeKind.OptionalType, OptionalTypeSyntax)
defineLayout(NodeKind.ImplicitlyUnwrappedOptionalType, ImplicitlyUnwrappedOptionalTypeSyntax)
defineLayout(NodeKind.MetatypeType, MetatypeTypeSyntax)
defineLayout(NodeKind.ArrayType, ArrayTypeSyntax)
defineLayout(NodeKind.DictionaryType, DictionaryTypeSyntax)
defineLayout(NodeKind.FunctionTypeArgument, FunctionTypeArgumentSyntax)
defineLayout(NodeKind.FunctionType, FunctionTypeSyntax)
