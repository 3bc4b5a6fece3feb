/**
 * Constructors for type syntax.
 */

import { NodeKind } from '../core/kinds.ts'
import { Trivia } from '../core/trivia.ts'
import type { TokenOf, TokenSyntax } from '../syntax/base.ts'
import type { GenericArgumentClauseSyntax } from '../syntax/generics.ts'
import {
	ArrayTypeSyntax,
	BalancedTokens,
	type BalancedTokensSyntax,
	DictionaryTypeSyntax,
	FunctionTypeArgumentSyntax,
	FunctionTypeSyntax,
	ImplicitlyUnwrappedOptionalTypeSyntax,
	MetatypeTypeSyntax,
	OptionalTypeSyntax,
	TupleTypeElementList,
	type TupleTypeElementListSyntax,
	TupleTypeElementSyntax,
	TupleTypeSyntax,
	TypeArgumentList,
	type TypeArgumentListSyntax,
	TypeAttributes,
	type TypeAttributesSyntax,
	TypeAttributeSyntax,
	TypeIdentifierSyntax,
	type TypeSyntax,
} from '../syntax/types.ts'
import { blankCollectionOf, blankLayoutOf, collectionOf, layoutOf } from './build.ts'
import {
	makeAnyKeyword,
	makeColonToken,
	makeExclaimPostfixToken,
	makeIdentifier,
	makeLeftParenToken,
	makeQuestionPostfixToken,
	makeRightParenToken,
	makeSelfKeyword,
} from './tokens.ts'

// =============================================================================
// ATTRIBUTES
// =============================================================================

export function makeTypeAttribute(
	atSign: TokenOf<'AtSign'>,
	name: TokenOf<'Identifier'>,
	leftParen: TokenOf<'LeftParen'> | null,
	balancedTokens: BalancedTokensSyntax | null,
	rightParen: TokenOf<'RightParen'> | null
): TypeAttributeSyntax {
	return layoutOf(NodeKind.TypeAttribute, TypeAttributeSyntax, [
		atSign,
		name,
		leftParen,
		balancedTokens,
		rightParen,
	])
}

export function makeBlankTypeAttribute(): TypeAttributeSyntax {
	return blankLayoutOf(NodeKind.TypeAttribute, TypeAttributeSyntax)
}

export function makeTypeAttributes(attributes: Iterable<TypeAttributeSyntax>): TypeAttributesSyntax {
	return collectionOf(TypeAttributes, attributes)
}

export function makeBlankTypeAttributes(): TypeAttributesSyntax {
	return blankCollectionOf(TypeAttributes)
}

export function makeBalancedTokens(tokens: Iterable<TokenSyntax>): BalancedTokensSyntax {
	return collectionOf(BalancedTokens, tokens)
}

export function makeBlankBalancedTokens(): BalancedTokensSyntax {
	return blankCollectionOf(BalancedTokens)
}

// =============================================================================
// TYPE IDENTIFIERS
// =============================================================================

export function makeTypeIdentifier(
	name: TokenOf<'Identifier' | 'SelfType' | 'Any'>,
	genericArgumentClause: GenericArgumentClauseSyntax | null
): TypeIdentifierSyntax {
	return layoutOf(NodeKind.TypeIdentifier, TypeIdentifierSyntax, [name, genericArgumentClause])
}

export function makeBlankTypeIdentifier(): TypeIdentifierSyntax {
	return blankLayoutOf(NodeKind.TypeIdentifier, TypeIdentifierSyntax)
}

/** Non-generic type identifier from a plain name. */
export function makeTypeIdentifierNamed(
	name: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TypeIdentifierSyntax {
	return makeTypeIdentifier(makeIdentifier(name, leading, trailing), null)
}

export function makeGenericTypeIdentifier(
	name: TokenOf<'Identifier'>,
	args: GenericArgumentClauseSyntax
): TypeIdentifierSyntax {
	return makeTypeIdentifier(name, args)
}

export function makeAnyTypeIdentifier(): TypeIdentifierSyntax {
	return makeTypeIdentifier(makeAnyKeyword(), null)
}

export function makeSelfTypeIdentifier(): TypeIdentifierSyntax {
	return makeTypeIdentifier(makeSelfKeyword(), null)
}

// =============================================================================
// TUPLES
// =============================================================================

export function makeTupleType(
	leftParen: TokenOf<'LeftParen'>,
	elements: TupleTypeElementListSyntax,
	rightParen: TokenOf<'RightParen'>
): TupleTypeSyntax {
	return layoutOf(NodeKind.TupleType, TupleTypeSyntax, [leftParen, elements, rightParen])
}

export function makeBlankTupleType(): TupleTypeSyntax {
	return blankLayoutOf(NodeKind.TupleType, TupleTypeSyntax)
}

/** `()` */
export function makeVoidTupleType(): TupleTypeSyntax {
	return makeTupleType(makeLeftParenToken(), makeTupleTypeElementList([]), makeRightParenToken())
}

export function makeTupleTypeElementList(
	elements: Iterable<TupleTypeElementSyntax>
): TupleTypeElementListSyntax {
	return collectionOf(TupleTypeElementList, elements)
}

export function makeBlankTupleTypeElementList(): TupleTypeElementListSyntax {
	return blankCollectionOf(TupleTypeElementList)
}

export function makeTupleTypeElement(
	label: TokenOf<'Identifier'> | null,
	colon: TokenOf<'Colon'> | null,
	type: TypeSyntax,
	trailingComma: TokenOf<'Comma'> | null
): TupleTypeElementSyntax {
	return layoutOf(NodeKind.TupleTypeElement, TupleTypeElementSyntax, [
		label,
		colon,
		type,
		trailingComma,
	])
}

export function makeBlankTupleTypeElement(): TupleTypeElementSyntax {
	return blankLayoutOf(NodeKind.TupleTypeElement, TupleTypeElementSyntax)
}

export function makeUnlabeledTupleTypeElement(type: TypeSyntax): TupleTypeElementSyntax {
	return makeTupleTypeElement(null, null, type, null)
}

/** `label: Type`. The colon has one space of trailing trivia. */
export function makeLabeledTupleTypeElement(
	label: TokenOf<'Identifier'>,
	type: TypeSyntax
): TupleTypeElementSyntax {
	return makeTupleTypeElement(label, makeColonToken(Trivia.empty, Trivia.spaces(1)), type, null)
}

// =============================================================================
// POSTFIX TYPES
// =============================================================================

export function makeOptionalType(
	baseType: TypeSyntax,
	questionMark: TokenOf<'PostfixQuestion'>
): OptionalTypeSyntax {
	return layoutOf(NodeKind.OptionalType, OptionalTypeSyntax, [baseType, questionMark])
}

export function makeBlankOptionalType(): OptionalTypeSyntax {
	return blankLayoutOf(NodeKind.OptionalType, OptionalTypeSyntax)
}

/** `Base?` with the given trivia after the `?`. */
export function makeOptionalTypeOf(
	baseType: TypeSyntax,
	trailing: Trivia = Trivia.empty
): OptionalTypeSyntax {
	return makeOptionalType(baseType, makeQuestionPostfixToken(trailing))
}

export function makeImplicitlyUnwrappedOptionalType(
	baseType: TypeSyntax,
	exclaimMark: TokenOf<'Exclaim'>
): ImplicitlyUnwrappedOptionalTypeSyntax {
	return layoutOf(NodeKind.ImplicitlyUnwrappedOptionalType, ImplicitlyUnwrappedOptionalTypeSyntax, [
		baseType,
		exclaimMark,
	])
}

export function makeBlankImplicitlyUnwrappedOptionalType(): ImplicitlyUnwrappedOptionalTypeSyntax {
	return blankLayoutOf(NodeKind.ImplicitlyUnwrappedOptionalType, ImplicitlyUnwrappedOptionalTypeSyntax)
}

/** `Base!` with the given trivia after the `!`. */
export function makeImplicitlyUnwrappedOptionalTypeOf(
	baseType: TypeSyntax,
	trailing: Trivia = Trivia.empty
): ImplicitlyUnwrappedOptionalTypeSyntax {
	return makeImplicitlyUnwrappedOptionalType(baseType, makeExclaimPostfixToken(trailing))
}

export function makeMetatypeType(
	baseType: TypeSyntax,
	period: TokenOf<'Period'>,
	typeOrProtocol: TokenOf<'Identifier'>
): MetatypeTypeSyntax {
	return layoutOf(NodeKind.MetatypeType, MetatypeTypeSyntax, [baseType, period, typeOrProtocol])
}

export function makeBlankMetatypeType(): MetatypeTypeSyntax {
	return blankLayoutOf(NodeKind.MetatypeType, MetatypeTypeSyntax)
}

// =============================================================================
// ARRAYS AND DICTIONARIES
// =============================================================================

export function makeArrayType(
	leftSquare: TokenOf<'LeftSquare'>,
	elementType: TypeSyntax,
	rightSquare: TokenOf<'RightSquare'>
): ArrayTypeSyntax {
	return layoutOf(NodeKind.ArrayType, ArrayTypeSyntax, [leftSquare, elementType, rightSquare])
}

export function makeBlankArrayType(): ArrayTypeSyntax {
	return blankLayoutOf(NodeKind.ArrayType, ArrayTypeSyntax)
}

export function makeDictionaryType(
	leftSquare: TokenOf<'LeftSquare'>,
	keyType: TypeSyntax,
	colon: TokenOf<'Colon'>,
	valueType: TypeSyntax,
	rightSquare: TokenOf<'RightSquare'>
): DictionaryTypeSyntax {
	return layoutOf(NodeKind.DictionaryType, DictionaryTypeSyntax, [
		leftSquare,
		keyType,
		colon,
		valueType,
		rightSquare,
	])
}

export function makeBlankDictionaryType(): DictionaryTypeSyntax {
	return blankLayoutOf(NodeKind.DictionaryType, DictionaryTypeSyntax)
}

// =============================================================================
// FUNCTION TYPES
// =============================================================================

export function makeFunctionTypeArgument(
	externalName: TokenOf<'Identifier'> | null,
	localName: TokenOf<'Identifier'> | null,
	attributes: TypeAttributesSyntax | null,
	inoutKeyword: TokenOf<'Inout'> | null,
	colon: TokenOf<'Colon'> | null,
	type: TypeSyntax,
	trailingComma: TokenOf<'Comma'> | null
): FunctionTypeArgumentSyntax {
	return layoutOf(NodeKind.FunctionTypeArgument, FunctionTypeArgumentSyntax, [
		externalName,
		localName,
		attributes,
		inoutKeyword,
		colon,
		type,
		trailingComma,
	])
}

export function makeBlankFunctionTypeArgument(): FunctionTypeArgumentSyntax {
	return blankLayoutOf(NodeKind.FunctionTypeArgument, FunctionTypeArgumentSyntax)
}

/** An argument that is only a type, as in `(Int) -> Void`. */
export function makeSimpleFunctionTypeArgument(type: TypeSyntax): FunctionTypeArgumentSyntax {
	return makeFunctionTypeArgument(null, null, null, null, null, type, null)
}

/** `name: Type` */
export function makeLabeledFunctionTypeArgument(
	localName: TokenOf<'Identifier'>,
	colon: TokenOf<'Colon'>,
	type: TypeSyntax
): FunctionTypeArgumentSyntax {
	return makeFunctionTypeArgument(null, localName, null, null, colon, type, null)
}

export function makeTypeArgumentList(
	args: Iterable<FunctionTypeArgumentSyntax>
): TypeArgumentListSyntax {
	return collectionOf(TypeArgumentList, args)
}

export function makeBlankTypeArgumentList(): TypeArgumentListSyntax {
	return blankCollectionOf(TypeArgumentList)
}

export function makeFunctionType(
	attributes: TypeAttributesSyntax | null,
	leftParen: TokenOf<'LeftParen'>,
	args: TypeArgumentListSyntax,
	rightParen: TokenOf<'RightParen'>,
	throwsOrRethrows: TokenOf<'Throws' | 'Rethrows'> | null,
	arrow: TokenOf<'Arrow'>,
	returnType: TypeSyntax
): FunctionTypeSyntax {
	return layoutOf(NodeKind.FunctionType, FunctionTypeSyntax, [
		attributes,
		leftParen,
		args,
		rightParen,
		throwsOrRethrows,
		arrow,
		returnType,
	])
}

export function makeBlankFunctionType(): FunctionTypeSyntax {
	return blankLayoutOf(NodeKind.FunctionType, FunctionTypeSyntax)
}
