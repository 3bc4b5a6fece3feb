import { NodeKind } from '../core/kinds.ts'
import { Trivia } from '../core/trivia.ts'
import type { TokenOf } from '../syntax/base.ts'
import {
	ConformanceRequirementSyntax,
	GenericArgumentClauseSyntax,
	GenericArgumentList,
	type GenericArgumentListSyntax,
	GenericArgumentSyntax,
	GenericParameterClauseSyntax,
	GenericParameterList,
	type GenericParameterListSyntax,
	GenericParameterSyntax,
	GenericRequirementList,
	type GenericRequirementListSyntax,
	type GenericRequirementSyntax,
	GenericWhereClauseSyntax,
	SameTypeRequirementSyntax,
} from '../syntax/generics.ts'
import type { TypeIdentifierSyntax, TypeSyntax } from '../syntax/types.ts'
import { blankCollectionOf, blankLayoutOf, collectionOf, layoutOf } from './build.ts'
import { makeIdentifier } from './tokens.ts'

// =============================================================================
// PARAMETERS
// =============================================================================

export function makeGenericParameterClause(
	leftAngle: TokenOf<'LeftAngle'>,
	parameters: GenericParameterListSyntax,
	rightAngle: TokenOf<'RightAngle'>
): GenericParameterClauseSyntax {
	return layoutOf(NodeKind.GenericParameterClause, GenericParameterClauseSyntax, [
		leftAngle,
		parameters,
		rightAngle,
	])
}

export function makeBlankGenericParameterClause(): GenericParameterClauseSyntax {
	return blankLayoutOf(NodeKind.GenericParameterClause, GenericParameterClauseSyntax)
}

export function makeGenericParameterList(
	parameters: Iterable<GenericParameterSyntax>
): GenericParameterListSyntax {
	return collectionOf(GenericParameterList, parameters)
}

export function makeBlankGenericParameterList(): GenericParameterListSyntax {
	return blankCollectionOf(GenericParameterList)
}

export function makeGenericParameter(
	name: TokenOf<'Identifier'>,
	colon: TokenOf<'Colon'> | null,
	inheritedType: TypeSyntax | null,
	trailingComma: TokenOf<'Comma'> | null
): GenericParameterSyntax {
	return layoutOf(NodeKind.GenericParameter, GenericParameterSyntax, [
		name,
		colon,
		inheritedType,
		trailingComma,
	])
}

export function makeBlankGenericParameter(): GenericParameterSyntax {
	return blankLayoutOf(NodeKind.GenericParameter, GenericParameterSyntax)
}

/** Unconstrained parameter from a plain name. */
export function makeGenericParameterNamed(
	name: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): GenericParameterSyntax {
	return makeGenericParameter(makeIdentifier(name, leading, trailing), null, null, null)
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export function makeGenericArgumentClause(
	leftAngle: TokenOf<'LeftAngle'>,
	args: GenericArgumentListSyntax,
	rightAngle: TokenOf<'RightAngle'>
): GenericArgumentClauseSyntax {
	return layoutOf(NodeKind.GenericArgumentClause, GenericArgumentClauseSyntax, [
		leftAngle,
		args,
		rightAngle,
	])
}

export function makeBlankGenericArgumentClause(): GenericArgumentClauseSyntax {
	return blankLayoutOf(NodeKind.GenericArgumentClause, GenericArgumentClauseSyntax)
}

export function makeGenericArgumentList(
	args: Iterable<GenericArgumentSyntax>
): GenericArgumentListSyntax {
	return collectionOf(GenericArgumentList, args)
}

export function makeBlankGenericArgumentList(): GenericArgumentListSyntax {
	return blankCollectionOf(GenericArgumentList)
}

export function makeGenericArgument(
	type: TypeSyntax,
	trailingComma: TokenOf<'Comma'> | null
): GenericArgumentSyntax {
	return layoutOf(NodeKind.GenericArgument, GenericArgumentSyntax, [type, trailingComma])
}

export function makeBlankGenericArgument(): GenericArgumentSyntax {
	return blankLayoutOf(NodeKind.GenericArgument, GenericArgumentSyntax)
}

// =============================================================================
// WHERE CLAUSES
// =============================================================================

export function makeGenericWhereClause(
	whereKeyword: TokenOf<'Where'>,
	requirements: GenericRequirementListSyntax
): GenericWhereClauseSyntax {
	return layoutOf(NodeKind.GenericWhereClause, GenericWhereClauseSyntax, [whereKeyword, requirements])
}

export function makeBlankGenericWhereClause(): GenericWhereClauseSyntax {
	return blankLayoutOf(NodeKind.GenericWhereClause, GenericWhereClauseSyntax)
}

export function makeGenericRequirementList(
	requirements: Iterable<GenericRequirementSyntax>
): GenericRequirementListSyntax {
	return collectionOf(GenericRequirementList, requirements)
}

export function makeBlankGenericRequirementList(): GenericRequirementListSyntax {
	return blankCollectionOf(GenericRequirementList)
}

export function makeSameTypeRequirement(
	leftType: TypeIdentifierSyntax,
	equalityToken: TokenOf<'BinaryOperator'>,
	rightType: TypeSyntax,
	trailingComma: TokenOf<'Comma'> | null
): SameTypeRequirementSyntax {
	return layoutOf(NodeKind.SameTypeRequirement, SameTypeRequirementSyntax, [
		leftType,
		equalityToken,
		rightType,
		trailingComma,
	])
}

export function makeBlankSameTypeRequirement(): SameTypeRequirementSyntax {
	return blankLayoutOf(NodeKind.SameTypeRequirement, SameTypeRequirementSyntax)
}

export function makeConformanceRequirement(
	leftType: TypeIdentifierSyntax,
	colon: TokenOf<'Colon'>,
	rightType: TypeSyntax,
	trailingComma: TokenOf<'Comma'> | null
): ConformanceRequirementSyntax {
	return layoutOf(NodeKind.ConformanceRequirement, ConformanceRequirementSyntax, [
		leftType,
		colon,
		rightType,
		trailingComma,
	])
}

export function makeBlankConformanceRequirement(): ConformanceRequirementSyntax {
	return blankLayoutOf(NodeKind.ConformanceRequirement, ConformanceRequirementSyntax)
}
