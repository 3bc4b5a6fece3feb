/**
 * Token constructors.
 *
 * Keywords and punctuation have one constructor each that takes only trivia;
 * free-text kinds take their text. All return root token views.
 */

import { TokenKind } from '../core/kinds.ts'
import { makeCanonicalToken, makeMissingToken, makeToken } from '../core/tokens.ts'
import { Trivia } from '../core/trivia.ts'
import { type TokenOf, TokenSyntax } from '../syntax/base.ts'

type CanonicalConstructor<K extends TokenKind> = (leading?: Trivia, trailing?: Trivia) => TokenSyntax<K>

function canonical<K extends TokenKind>(kind: K): CanonicalConstructor<K> {
	return (leading = Trivia.empty, trailing = Trivia.empty) =>
		new TokenSyntax(makeCanonicalToken(kind, leading, trailing))
}

// Punctuation
export const makeLeftParenToken = canonical(TokenKind.LeftParen)
export const makeRightParenToken = canonical(TokenKind.RightParen)
export const makeLeftSquareToken = canonical(TokenKind.LeftSquare)
export const makeRightSquareToken = canonical(TokenKind.RightSquare)
export const makeLeftBraceToken = canonical(TokenKind.LeftBrace)
export const makeRightBraceToken = canonical(TokenKind.RightBrace)
export const makeLeftAngleToken = canonical(TokenKind.LeftAngle)
export const makeRightAngleToken = canonical(TokenKind.RightAngle)
export const makeCommaToken = canonical(TokenKind.Comma)
export const makeColonToken = canonical(TokenKind.Colon)
export const makePeriodToken = canonical(TokenKind.Period)
export const makeEqualToken = canonical(TokenKind.Equal)
export const makeArrowToken = canonical(TokenKind.Arrow)
export const makeAtSignToken = canonical(TokenKind.AtSign)

// Keywords
export const makeStructKeyword = canonical(TokenKind.Struct)
export const makeTypealiasKeyword = canonical(TokenKind.Typealias)
export const makeFallthroughKeyword = canonical(TokenKind.Fallthrough)
export const makeBreakKeyword = canonical(TokenKind.Break)
export const makeWhereKeyword = canonical(TokenKind.Where)
export const makeInoutKeyword = canonical(TokenKind.Inout)
export const makeThrowsKeyword = canonical(TokenKind.Throws)
export const makeRethrowsKeyword = canonical(TokenKind.Rethrows)
export const makeSelfKeyword = canonical(TokenKind.SelfType)
export const makeAnyKeyword = canonical(TokenKind.Any)

/** Postfix `?`. Nothing may sit between it and the type it follows. */
export function makeQuestionPostfixToken(trailing: Trivia = Trivia.empty): TokenOf<'PostfixQuestion'> {
	return new TokenSyntax(makeCanonicalToken(TokenKind.PostfixQuestion, Trivia.empty, trailing))
}

/** Postfix `!`. Nothing may sit between it and the type it follows. */
export function makeExclaimPostfixToken(trailing: Trivia = Trivia.empty): TokenOf<'Exclaim'> {
	return new TokenSyntax(makeCanonicalToken(TokenKind.Exclaim, Trivia.empty, trailing))
}

/** End of file, carrying the trivia after the last token. */
export function makeEofToken(leading: Trivia = Trivia.empty): TokenOf<'Eof'> {
	return new TokenSyntax(makeCanonicalToken(TokenKind.Eof, leading))
}

export function makeIdentifier(
	name: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'Identifier'> {
	return new TokenSyntax(makeToken(TokenKind.Identifier, name, leading, trailing))
}

/** The contextual `Type` in `T.Type`. */
export function makeTypeToken(
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'Identifier'> {
	return makeIdentifier('Type', leading, trailing)
}

/** The contextual `Protocol` in `P.Protocol`. */
export function makeProtocolToken(
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'Identifier'> {
	return makeIdentifier('Protocol', leading, trailing)
}

export function makeBinaryOperator(
	text: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'BinaryOperator'> {
	return new TokenSyntax(makeToken(TokenKind.BinaryOperator, text, leading, trailing))
}

/** `==` as used in same-type requirements. */
export function makeEqualityOperator(
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'BinaryOperator'> {
	return makeBinaryOperator('==', leading, trailing)
}

export function makeIntegerLiteral(
	text: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'IntegerLiteral'> {
	return new TokenSyntax(makeToken(TokenKind.IntegerLiteral, text, leading, trailing))
}

export function makeStringLiteral(
	text: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'StringLiteral'> {
	return new TokenSyntax(makeToken(TokenKind.StringLiteral, text, leading, trailing))
}

/** A token the scanner could not classify. */
export function makeUnknownToken(
	text: string,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenOf<'Unknown'> {
	return new TokenSyntax(makeToken(TokenKind.Unknown, text, leading, trailing))
}

/** Placeholder for a token the source should have had. */
export function makeMissing<K extends TokenKind>(
	kind: K,
	leading: Trivia = Trivia.empty,
	trailing: Trivia = Trivia.empty
): TokenSyntax<K> {
	return new TokenSyntax(makeMissingToken(kind, leading, trailing))
}
