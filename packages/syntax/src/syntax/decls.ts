/**
 * Declaration views: structs, typealiases and member lists.
 */

import { NodeKind, TokenKind } from '../core/kinds.ts'
import {
	defineCollection,
	defineLayout,
	isIdentifier,
	isLeftBrace,
	isRightBrace,
	isTokenOf,
	LayoutSyntax,
	type Syntax,
	type SyntaxCollection,
	type TokenOf,
} from './base.ts'
import {
	type GenericParameterClauseSyntax,
	type GenericWhereClauseSyntax,
	isGenericParameterClauseSyntax,
	isGenericWhereClauseSyntax,
} from './generics.ts'
import { isTypeSyntax, type TypeSyntax } from './types.ts'
import { isUnknownSyntax, type UnknownSyntax } from './unknown.ts'

const isStruct = isTokenOf(TokenKind.Struct)
const isTypealias = isTokenOf(TokenKind.Typealias)
const isEqual = isTokenOf(TokenKind.Equal)

/** `struct Name<T> where T: P { members }` */
export class StructDeclSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.StructDecl {
		return NodeKind.StructDecl
	}

	get structKeyword(): TokenOf<'Struct'> {
		return this.required('structKeyword', isStruct)
	}

	get identifier(): TokenOf<'Identifier'> {
		return this.required('identifier', isIdentifier)
	}

	get genericParameterClause(): GenericParameterClauseSyntax | null {
		return this.optional('genericParameterClause', isGenericParameterClauseSyntax)
	}

	get genericWhereClause(): GenericWhereClauseSyntax | null {
		return this.optional('genericWhereClause', isGenericWhereClauseSyntax)
	}

	get leftBrace(): TokenOf<'LeftBrace'> {
		return this.required('leftBrace', isLeftBrace)
	}

	get members(): DeclMembersSyntax {
		return this.required('members', DeclMembers.is)
	}

	get rightBrace(): TokenOf<'RightBrace'> {
		return this.required('rightBrace', isRightBrace)
	}

	withStructKeyword(keyword: TokenOf<'Struct'>): StructDeclSyntax {
		return this.replacing('structKeyword', keyword, StructDeclSyntax)
	}

	withIdentifier(identifier: TokenOf<'Identifier'>): StructDeclSyntax {
		return this.replacing('identifier', identifier, StructDeclSyntax)
	}

	withGenericParameterClause(clause: GenericParameterClauseSyntax | null): StructDeclSyntax {
		return this.replacing('genericParameterClause', clause, StructDeclSyntax)
	}

	withGenericWhereClause(clause: GenericWhereClauseSyntax | null): StructDeclSyntax {
		return this.replacing('genericWhereClause', clause, StructDeclSyntax)
	}

	withLeftBrace(leftBrace: TokenOf<'LeftBrace'>): StructDeclSyntax {
		return this.replacing('leftBrace', leftBrace, StructDeclSyntax)
	}

	withMembers(members: DeclMembersSyntax): StructDeclSyntax {
		return this.replacing('members', members, StructDeclSyntax)
	}

	withRightBrace(rightBrace: TokenOf<'RightBrace'>): StructDeclSyntax {
		return this.replacing('rightBrace', rightBrace, StructDeclSyntax)
	}

	addingMember(member: MemberSyntax): StructDeclSyntax {
		return this.withMembers(this.members.appending(member))
	}
}

/** `typealias Name<T> = Type` */
export class TypealiasDeclSyntax extends LayoutSyntax {
	get kind(): typeof NodeKind.TypealiasDecl {
		return NodeKind.TypealiasDecl
	}

	get typealiasKeyword(): TokenOf<'Typealias'> {
		return this.required('typealiasKeyword', isTypealias)
	}

	get identifier(): TokenOf<'Identifier'> {
		return this.required('identifier', isIdentifier)
	}

	get genericParameterClause(): GenericParameterClauseSyntax | null {
		return this.optional('genericParameterClause', isGenericParameterClauseSyntax)
	}

	get equal(): TokenOf<'Equal'> {
		return this.required('equal', isEqual)
	}

	get type(): TypeSyntax {
		return this.required('type', isTypeSyntax)
	}

	withTypealiasKeyword(keyword: TokenOf<'Typealias'>): TypealiasDeclSyntax {
		return this.replacing('typealiasKeyword', keyword, TypealiasDeclSyntax)
	}

	withIdentifier(identifier: TokenOf<'Identifier'>): TypealiasDeclSyntax {
		return this.replacing('identifier', identifier, TypealiasDeclSyntax)
	}

	withGenericParameterClause(clause: GenericParameterClauseSyntax | null): TypealiasDeclSyntax {
		return this.replacing('genericParameterClause', clause, TypealiasDeclSyntax)
	}

	withEqual(equal: TokenOf<'Equal'>): TypealiasDeclSyntax {
		return this.replacing('equal', equal, TypealiasDeclSyntax)
	}

	withType(type: TypeSyntax): TypealiasDeclSyntax {
		return this.replacing('type', type, TypealiasDeclSyntax)
	}
}

export type DeclSyntax = StructDeclSyntax | TypealiasDeclSyntax

export function isDeclSyntax(syntax: Syntax): syntax is DeclSyntax {
	return syntax instanceof StructDeclSyntax || syntax instanceof TypealiasDeclSyntax
}

export type MemberSyntax = DeclSyntax | UnknownSyntax

export function isMemberSyntax(syntax: Syntax): syntax is MemberSyntax {
	return isDeclSyntax(syntax) || isUnknownSyntax(syntax)
}

export type DeclMembersSyntax = SyntaxCollection<typeof NodeKind.DeclMembers, MemberSyntax>
export const DeclMembers = defineCollection(NodeKind.DeclMembers, isMemberSyntax)

defineLayout(NodeKind.StructDecl, StructDeclSyntax)
defineLayout(NodeKind.TypealiasDecl, TypealiasDeclSyntax)
