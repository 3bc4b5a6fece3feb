import { NodeKind } from '../core/kinds.ts'
import type { TokenOf } from '../syntax/base.ts'
import {
	DeclMembers,
	type DeclMembersSyntax,
	type MemberSyntax,
	StructDeclSyntax,
	TypealiasDeclSyntax,
} from '../syntax/decls.ts'
import type { GenericParameterClauseSyntax, GenericWhereClauseSyntax } from '../syntax/generics.ts'
import type { TypeSyntax } from '../syntax/types.ts'
import { blankCollectionOf, blankLayoutOf, collectionOf, layoutOf } from './build.ts'

export function makeStructDecl(
	structKeyword: TokenOf<'Struct'>,
	identifier: TokenOf<'Identifier'>,
	genericParameterClause: GenericParameterClauseSyntax | null,
	genericWhereClause: GenericWhereClauseSyntax | null,
	leftBrace: TokenOf<'LeftBrace'>,
	members: DeclMembersSyntax,
	rightBrace: TokenOf<'RightBrace'>
): StructDeclSyntax {
	return layoutOf(NodeKind.StructDecl, StructDeclSyntax, [
		structKeyword,
		identifier,
		genericParameterClause,
		genericWhereClause,
		leftBrace,
		members,
		rightBrace,
	])
}

export function makeBlankStructDecl(): StructDeclSyntax {
	return blankLayoutOf(NodeKind.StructDecl, StructDeclSyntax)
}

export function makeTypealiasDecl(
	typealiasKeyword: TokenOf<'Typealias'>,
	identifier: TokenOf<'Identifier'>,
	genericParameterClause: GenericParameterClauseSyntax | null,
	equal: TokenOf<'Equal'>,
	type: TypeSyntax
): TypealiasDeclSyntax {
	return layoutOf(NodeKind.TypealiasDecl, TypealiasDeclSyntax, [
		typealiasKeyword,
		identifier,
		genericParameterClause,
		equal,
		type,
	])
}

export function makeBlankTypealiasDecl(): TypealiasDeclSyntax {
	return blankLayoutOf(NodeKind.TypealiasDecl, TypealiasDeclSyntax)
}

export function makeDeclMembers(members: Iterable<MemberSyntax>): DeclMembersSyntax {
	return collectionOf(DeclMembers, members)
}

export function makeBlankDeclMembers(): DeclMembersSyntax {
	return blankCollectionOf(DeclMembers)
}
