/**
 * Views for generic parameter clauses, generic argument clauses and where
 * clauses with their requirements.
 */

import { NodeKind, TokenKind } from '../core/kinds.ts'
import {
	defineCollection,
	defineLayout,
	isColon,
	isComma,
	isIdentifier,
	isLeftAngle,
	isRightAngle,
	isTokenOf,
	LayoutSyntax,
	type Syntax,
	type SyntaxCollection,
	type TokenOf,
} from './base.ts'
import { isTypeIdentifierSyntax, isTypeSyntax, type TypeIdentifierSyntax, type TypeSyntax } from './types.ts'

const isWhere = isTokenOf(TokenKind.Where)
const isBinaryOperator = isTokenOf(TokenKind.BinaryOperator)

// =============================================================================
// PARAMETERS
// =============================================================================

/** `<T, U: Base>` */
export class GenericParameterClauseSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.GenericParameterClause {
		return NodeKind.GenericParameterClause
	}

	get leftAngle(): TokenOf<'LeftAngle'> {
		return this.required('leftAngle', isLeftAngle)
	}

	get parameters(): GenericParameterListSyntax {
		return this.required('parameters', GenericParameterList.is)
	}

	get rightAngle(): TokenOf<'RightAngle'> {
		return this.required('rightAngle', isRightAngle)
	}

	withLeftAngle(leftAngle: TokenOf<'LeftAngle'>): GenericParameterClauseSyntax {
		return this.replacing('leftAngle', leftAngle, GenericParameterClauseSyntax)
	}

	withParameters(parameters: GenericParameterListSyntax): GenericParameterClauseSyntax {
		return this.replacing('parameters', parameters, GenericParameterClauseSyntax)
	}

	withRightAngle(rightAngle: TokenOf<'RightAngle'>): GenericParameterClauseSyntax {
		return this.replacing('rightAngle', rightAngle, GenericParameterClauseSyntax)
	}

	addingParameter(parameter: GenericParameterSyntax): GenericParameterClauseSyntax {
		return this.withParameters(this.parameters.appending(parameter))
	}
}

export function isGenericParameterClauseSyntax(
	syntax: Syntax
): syntax is GenericParameterClauseSyntax {
	return syntax instanceof GenericParameterClauseSyntax
}

export class GenericParameterSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.GenericParameter {
		return NodeKind.GenericParameter
	}

	get name(): TokenOf<'Identifier'> {
		return this.required('name', isIdentifier)
	}

	get colon(): TokenOf<'Colon'> | null {
		return this.optional('colon', isColon)
	}

	get inheritedType(): TypeSyntax | null {
		return this.optional('inheritedType', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withName(name: TokenOf<'Identifier'>): GenericParameterSyntax {
		return this.replacing('name', name, GenericParameterSyntax)
	}

	withColon(colon: TokenOf<'Colon'> | null): GenericParameterSyntax {
		return this.replacing('colon', colon, GenericParameterSyntax)
	}

	withInheritedType(type: TypeSyntax | null): GenericParameterSyntax {
		return this.replacing('inheritedType', type, GenericParameterSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): GenericParameterSyntax {
		return this.replacing('trailingComma', comma, GenericParameterSyntax)
	}
}

export function isGenericParameterSyntax(syntax: Syntax): syntax is GenericParameterSyntax {
	return syntax instanceof GenericParameterSyntax
}

export type GenericParameterListSyntax = SyntaxCollection<
	typeof NodeKind.GenericParameterList,
	GenericParameterSyntax
>
export const GenericParameterList = defineCollection(
	NodeKind.GenericParameterList,
	isGenericParameterSyntax
)

// =============================================================================
// ARGUMENTS
// =============================================================================

/** `<Int, String>` after a type name */
export class GenericArgumentClauseSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.GenericArgumentClause {
		return NodeKind.GenericArgumentClause
	}

	get leftAngle(): TokenOf<'LeftAngle'> {
		return this.required('leftAngle', isLeftAngle)
	}

	get arguments(): GenericArgumentListSyntax {
		return this.required('arguments', GenericArgumentList.is)
	}

	get rightAngle(): TokenOf<'RightAngle'> {
		return this.required('rightAngle', isRightAngle)
	}

	withLeftAngle(leftAngle: TokenOf<'LeftAngle'>): GenericArgumentClauseSyntax {
		return this.replacing('leftAngle', leftAngle, GenericArgumentClauseSyntax)
	}

	withArguments(args: GenericArgumentListSyntax): GenericArgumentClauseSyntax {
		return this.replacing('arguments', args, GenericArgumentClauseSyntax)
	}

	withRightAngle(rightAngle: TokenOf<'RightAngle'>): GenericArgumentClauseSyntax {
		return this.replacing('rightAngle', rightAngle, GenericArgumentClauseSyntax)
	}

	addingArgument(argument: GenericArgumentSyntax): GenericArgumentClauseSyntax {
		return this.withArguments(this.arguments.appending(argument))
	}
}

export function isGenericArgumentClauseSyntax(syntax: Syntax): syntax is GenericArgumentClauseSyntax {
	return syntax instanceof GenericArgumentClauseSyntax
}

export class GenericArgumentSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.GenericArgument {
		return NodeKind.GenericArgument
	}

	get type(): TypeSyntax {
		return this.required('type', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withType(type: TypeSyntax): GenericArgumentSyntax {
		return this.replacing('type', type, GenericArgumentSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): GenericArgumentSyntax {
		return this.replacing('trailingComma', comma, GenericArgumentSyntax)
	}
}

export function isGenericArgumentSyntax(syntax: Syntax): syntax is GenericArgumentSyntax {
	return syntax instanceof GenericArgumentSyntax
}

export type GenericArgumentListSyntax = SyntaxCollection<
	typeof NodeKind.GenericArgumentList,
	GenericArgumentSyntax
>
export const GenericArgumentList = defineCollection(
	NodeKind.GenericArgumentList,
	isGenericArgumentSyntax
)

// =============================================================================
// WHERE CLAUSES
// =============================================================================

/** `where T == U, V: P` */
export class GenericWhereClauseSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.GenericWhereClause {
		return NodeKind.GenericWhereClause
	}

	get whereKeyword(): TokenOf<'Where'> {
		return this.required('whereKeyword', isWhere)
	}

	get requirements(): GenericRequirementListSyntax {
		return this.required('requirements', GenericRequirementList.is)
	}

	withWhereKeyword(keyword: TokenOf<'Where'>): GenericWhereClauseSyntax {
		return this.replacing('whereKeyword', keyword, GenericWhereClauseSyntax)
	}

	withRequirements(requirements: GenericRequirementListSyntax): GenericWhereClauseSyntax {
		return this.replacing('requirements', requirements, GenericWhereClauseSyntax)
	}

	addingRequirement(requirement: GenericRequirementSyntax): GenericWhereClauseSyntax {
		return this.withRequirements(this.requirements.appending(requirement))
	}
}

export function isGenericWhereClauseSyntax(syntax: Syntax): syntax is GenericWhereClauseSyntax {
	return syntax instanceof GenericWhereClauseSyntax
}

/**
 * `Left == Right`. The equality token is a binary operator token whose text
 * is normally `==`.
 */
export class SameTypeRequirementSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.SameTypeRequirement {
		return NodeKind.SameTypeRequirement
	}

	get leftType(): TypeIdentifierSyntax {
		return this.required('leftType', isTypeIdentifierSyntax)
	}

	get equalityToken(): TokenOf<'BinaryOperator'> {
		return this.required('equalityToken', isBinaryOperator)
	}

	get rightType(): TypeSyntax {
		return this.required('rightType', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withLeftType(leftType: TypeIdentifierSyntax): SameTypeRequirementSyntax {
		return this.replacing('leftType', leftType, SameTypeRequirementSyntax)
	}

	withEqualityToken(token: TokenOf<'BinaryOperator'>): SameTypeRequirementSyntax {
		return this.replacing('equalityToken', token, SameTypeRequirementSyntax)
	}

	withRightType(rightType: TypeSyntax): SameTypeRequirementSyntax {
		return this.replacing('rightType', rightType, SameTypeRequirementSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): SameTypeRequirementSyntax {
		return this.replacing('trailingComma', comma, SameTypeRequirementSyntax)
	}
}

/** `Left: Protocol` */
export class ConformanceRequirementSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.ConformanceRequirement {
		return NodeKind.ConformanceRequirement
	}

	get leftType(): TypeIdentifierSyntax {
		return this.required('leftType', isTypeIdentifierSyntax)
	}

	get colon(): TokenOf<'Colon'> {
		return this.required('colon', isColon)
	}

	get rightType(): TypeSyntax {
		return this.required('rightType', isTypeSyntax)
	}

	get trailingComma(): TokenOf<'Comma'> | null {
		return this.optional('trailingComma', isComma)
	}

	withLeftType(leftType: TypeIdentifierSyntax): ConformanceRequirementSyntax {
		return this.replacing('leftType', leftType, ConformanceRequirementSyntax)
	}

	withColon(colon: TokenOf<'Colon'>): ConformanceRequirementSyntax {
		return this.replacing('colon', colon, ConformanceRequirementSyntax)
	}

	withRightType(rightType: TypeSyntax): ConformanceRequirementSyntax {
		return this.replacing('rightType', rightType, ConformanceRequirementSyntax)
	}

	withTrailingComma(comma: TokenOf<'Comma'> | null): ConformanceRequirementSyntax {
		return this.replacing('trailingComma', comma, ConformanceRequirementSyntax)
	}
}

export type GenericRequirementSyntax = SameTypeRequirementSyntax | ConformanceRequirementSyntax

export function isGenericRequirementSyntax(syntax: Syntax): syntax is GenericRequirementSyntax {
	return (
		syntax instanceof SameTypeRequirementSyntax || syntax instanceof ConformanceRequirementSyntax
	)
}

export type GenericRequirementListSyntax = SyntaxCollection<
	typeof NodeKind.GenericRequirementList,
	GenericRequirementSyntax
>
export const GenericRequirementList = defineCollection(
	NodeKind.GenericRequirementList,
	isGenericRequirementSyntax
)

defineLayout(NodeKind.GenericParameterClause, GenericParameterClauseSyntax)
defineLayout(NodeKind.GenericParameter, GenericParameterSyntax)
defineLayout(NodeKind.GenericArgumentClause, GenericArgumentClauseSyntax)
defineLayout(NodeKind.GenericArgument, GenericArgumentSyntax)
defineLayout(NodeKind.GenericWhereClause, GenericWhereClauseSyntax)
defineLayout(NodeKind.SameTypeRequirement, SameTypeRequirementSyntax)
defineLayout(NodeKind.ConformanceRequirement, ConformanceRequirementSyntax)
