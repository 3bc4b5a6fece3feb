import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	makeAnyTypeIdentifier,
	makeArrowToken,
	makeAtSignToken,
	makeBalancedTokens,
	makeBinaryOperator,
	makeColonToken,
	makeCommaToken,
	makeConformanceRequirement,
	makeDeclMembers,
	makeDictionaryType,
	makeEofToken,
	makeEqualityOperator,
	makeFunctionType,
	makeFunctionTypeArgument,
	makeGenericArgument,
	makeGenericArgumentClause,
	makeGenericArgumentList,
	makeGenericParameter,
	makeGenericParameterClause,
	makeGenericParameterList,
	makeGenericParameterNamed,
	makeGenericRequirementList,
	makeGenericTypeIdentifier,
	makeGenericWhereClause,
	makeIdentifier,
	makeImplicitlyUnwrappedOptionalTypeOf,
	makeIntegerLiteral,
	makeLabeledFunctionTypeArgument,
	makeLabeledTupleTypeElement,
	makeLeftAngleToken,
	makeLeftBraceToken,
	makeLeftParenToken,
	makeLeftSquareToken,
	makeMetatypeType,
	makeOptionalTypeOf,
	makePeriodToken,
	makeProtocolToken,
	makeQuestionPostfixToken,
	makeRightAngleToken,
	makeRightBraceToken,
	makeRightParenToken,
	makeRightSquareToken,
	makeSelfTypeIdentifier,
	makeSimpleFunctionTypeArgument,
	makeStructDecl,
	makeStringLiteral,
	makeStructKeyword,
	makeThrowsKeyword,
	makeTupleType,
	makeTupleTypeElement,
	makeTupleTypeElementList,
	makeTypeArgumentList,
	makeTypeAttribute,
	makeTypeAttributes,
	makeTypeIdentifier,
	makeTypeIdentifierNamed,
	makeTypeToken,
	makeUnlabeledTupleTypeElement,
	makeVoidTupleType,
	makeWhereKeyword,
	SyntaxContractError,
	TokenKind,
	Trivia,
	TypeIdentifierSyntax,
} from '../../src/index.ts'

function int(): TypeIdentifierSyntax {
	return makeTypeIdentifierNamed('Int')
}

describe('factory', () => {
	describe('tokens', () => {
		it('should spell keywords and punctuation canonically', () => {
			assert.strictEqual(makeStructKeyword().text, 'struct')
			assert.strictEqual(makeWhereKeyword().text, 'where')
			assert.strictEqual(makeArrowToken().kind, TokenKind.Arrow)
			assert.strictEqual(makeArrowToken(Trivia.spaces(1), Trivia.spaces(1)).toString(), ' -> ')
		})

		it('should build contextual identifiers', () => {
			assert.strictEqual(makeTypeToken().text, 'Type')
			assert.strictEqual(makeProtocolToken().kind, TokenKind.Identifier)
			assert.strictEqual(makeEqualityOperator(Trivia.spaces(1), Trivia.spaces(1)).toString(), ' == ')
		})

		it('should give postfix tokens trailing trivia only', () => {
			const question = makeQuestionPostfixToken(Trivia.spaces(1))
			assert.ok(question.leadingTrivia.isEmpty)
			assert.strictEqual(question.toString(), '? ')
		})

		it('should build literal and operator tokens from their text', () => {
			assert.strictEqual(makeIntegerLiteral('42').kind, TokenKind.IntegerLiteral)
			assert.strictEqual(makeIntegerLiteral('42', Trivia.spaces(1)).toString(), ' 42')
			assert.strictEqual(makeStringLiteral('"s"').kind, TokenKind.StringLiteral)
			assert.strictEqual(makeStringLiteral('"s"').text, '"s"')
			assert.strictEqual(makeBinaryOperator('+').kind, TokenKind.BinaryOperator)
			assert.strictEqual(makeBinaryOperator('+', Trivia.spaces(1), Trivia.spaces(1)).toString(), ' + ')
		})

		it('should give Eof empty text and its leading trivia', () => {
			const eof = makeEofToken(Trivia.newlines(2))
			assert.strictEqual(eof.text, '')
			assert.strictEqual(eof.toString(), '\n\n')
			assert.strictEqual(eof.isMissing, false)
		})
	})

	describe('shorthand constructors', () => {
		it('should match the full constructor calls', () => {
			assert.ok(makeTypeIdentifierNamed('Int').equals(makeTypeIdentifier(makeIdentifier('Int'), null)))
			assert.ok(makeUnlabeledTupleTypeElement(int()).equals(makeTupleTypeElement(null, null, int(), null)))
			assert.ok(
				makeSimpleFunctionTypeArgument(int()).equals(
					makeFunctionTypeArgument(null, null, null, null, null, int(), null)
				)
			)
			assert.ok(
				makeGenericParameterNamed('T').equals(makeGenericParameter(makeIdentifier('T'), null, null, null))
			)
			assert.ok(
				makeVoidTupleType().equals(
					makeTupleType(makeLeftParenToken(), makeTupleTypeElementList([]), makeRightParenToken())
				)
			)
		})

		it('should print the usual spelling', () => {
			assert.strictEqual(makeAnyTypeIdentifier().toString(), 'Any')
			assert.strictEqual(makeSelfTypeIdentifier().toString(), 'Self')
			assert.strictEqual(makeVoidTupleType().toString(), '()')
			assert.strictEqual(makeOptionalTypeOf(int(), Trivia.spaces(1)).toString(), 'Int? ')
			assert.strictEqual(makeImplicitlyUnwrappedOptionalTypeOf(int()).toString(), 'Int!')
			assert.strictEqual(makeLabeledTupleTypeElement(makeIdentifier('x'), int()).toString(), 'x: Int')
			assert.strictEqual(
				makeLabeledFunctionTypeArgument(makeIdentifier('x'), makeColonToken(Trivia.empty, Trivia.spaces(1)), int())
					.toString(),
				'x: Int'
			)
		})
	})

	describe('types', () => {
		it('should build generic type identifiers', () => {
			const args = makeGenericArgumentClause(
				makeLeftAngleToken(),
				makeGenericArgumentList([
					makeGenericArgument(makeTypeIdentifierNamed('String'), makeCommaToken(Trivia.empty, Trivia.spaces(1))),
					makeGenericArgument(int(), null),
				]),
				makeRightAngleToken()
			)
			const dict = makeGenericTypeIdentifier(makeIdentifier('Dictionary'), args)
			assert.strictEqual(dict.toString(), 'Dictionary<String, Int>')
			assert.strictEqual(dict.genericArgumentClause?.arguments.count, 2)
		})

		it('should build dictionary and metatype types', () => {
			const dict = makeDictionaryType(
				makeLeftSquareToken(),
				makeTypeIdentifierNamed('String'),
				makeColonToken(Trivia.empty, Trivia.spaces(1)),
				int(),
				makeRightSquareToken()
			)
			assert.strictEqual(dict.toString(), '[String: Int]')
			const meta = makeMetatypeType(makeTypeIdentifierNamed('T'), makePeriodToken(), makeTypeToken())
			assert.strictEqual(meta.toString(), 'T.Type')
		})

		it('should build function types with attributes', () => {
			const escaping = makeTypeAttribute(
				makeAtSignToken(),
				makeIdentifier('escaping', Trivia.empty, Trivia.spaces(1)),
				null,
				null,
				null
			)
			const fn = makeFunctionType(
				makeTypeAttributes([escaping]),
				makeLeftParenToken(),
				makeTypeArgumentList([makeSimpleFunctionTypeArgument(int())]),
				makeRightParenToken(Trivia.empty, Trivia.spaces(1)),
				makeThrowsKeyword(Trivia.empty, Trivia.spaces(1)),
				makeArrowToken(Trivia.empty, Trivia.spaces(1)),
				makeSelfTypeIdentifier()
			)
			assert.strictEqual(fn.toString(), '@escaping (Int) throws -> Self')
			assert.strictEqual(fn.throwsOrRethrows?.kind, TokenKind.Throws)
		})

		it('should keep balanced tokens of attribute arguments', () => {
			const convention = makeTypeAttribute(
				makeAtSignToken(),
				makeIdentifier('convention'),
				makeLeftParenToken(),
				makeBalancedTokens([makeIdentifier('c')]),
				makeRightParenToken()
			)
			assert.strictEqual(convention.toString(), '@convention(c)')
			assert.strictEqual(convention.balancedTokens?.count, 1)
		})
	})

	describe('declarations', () => {
		it('should build a generic struct with a where clause', () => {
			const where = makeGenericWhereClause(
				makeWhereKeyword(Trivia.empty, Trivia.spaces(1)),
				makeGenericRequirementList([
					makeConformanceRequirement(
						makeTypeIdentifierNamed('T'),
						makeColonToken(Trivia.empty, Trivia.spaces(1)),
						makeTypeIdentifierNamed('Equatable', Trivia.empty, Trivia.spaces(1)),
						null
					),
				])
			)
			const struct = makeStructDecl(
				makeStructKeyword(Trivia.empty, Trivia.spaces(1)),
				makeIdentifier('Box'),
				makeGenericParameterClause(
					makeLeftAngleToken(),
					makeGenericParameterList([makeGenericParameterNamed('T')]),
					makeRightAngleToken(Trivia.empty, Trivia.spaces(1))
				),
				where,
				makeLeftBraceToken(),
				makeDeclMembers([]),
				makeRightBraceToken()
			)
			assert.strictEqual(struct.toString(), 'struct Box<T> where T: Equatable {}')
			assert.strictEqual(struct.genericWhereClause?.requirements.count, 1)
		})
	})

	describe('shape checks', () => {
		it('should reject a type where only a type identifier fits', () => {
			const tuple = makeVoidTupleType()
			assert.throws(
				() =>
					Reflect.apply(makeConformanceRequirement, undefined, [
						tuple,
						makeColonToken(),
						int(),
						null,
					]),
				(error: unknown) =>
					error instanceof SyntaxContractError &&
					error.message === '[FTCORE003] slot leftType of ConformanceRequirement does not accept TupleType'
			)
		})
	})
})
