/**
 * Property-based tests for the printer.
 *
 * Whatever trivia a tree is built with, printing gives back exactly the
 * tokens' leading trivia, text and trailing trivia in order.
 */

import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import {
	makeColonToken,
	makeDictionaryType,
	makeEqualToken,
	makeIdentifier,
	makeLeftSquareToken,
	makeMissing,
	makeOptionalTypeOf,
	makeRightSquareToken,
	makeTypealiasDecl,
	makeTypealiasKeyword,
	makeTypeIdentifierNamed,
	printSyntax,
	textLength,
	TokenKind,
	Trivia,
} from '../../src/index.ts'

const piece = fc.constantFrom(
	Trivia.spaces(1),
	Trivia.spaces(3),
	Trivia.tabs(1),
	Trivia.newlines(1),
	Trivia.lineComment('// note'),
	Trivia.blockComment('/* a\nb */'),
	Trivia.garbageText('#!')
)

const trivia = fc
	.array(piece, { maxLength: 3 })
	.map((pieces) => pieces.reduce((acc, next) => acc.concat(next), Trivia.empty))

const name = fc.stringMatching(/^[A-Za-z_][A-Za-z0-9_]{0,8}$/)

/** Leading and trailing trivia for each token of `typealias N = [K: V]?` */
const triviaPairs = fc.array(fc.tuple(trivia, trivia), { maxLength: 9, minLength: 9 })

function at(pairs: readonly (readonly [Trivia, Trivia])[], index: number): readonly [Trivia, Trivia] {
	return pairs[index] ?? [Trivia.empty, Trivia.empty]
}

describe('print/printer (property)', () => {
	it('printing concatenates trivia and text in token order', () => {
		fc.assert(
			fc.property(triviaPairs, name, name, name, (pairs, alias, key, value) => {
				const [l0, t0] = at(pairs, 0)
				const [l1, t1] = at(pairs, 1)
				const [l2, t2] = at(pairs, 2)
				const [l3, t3] = at(pairs, 3)
				const [l4, t4] = at(pairs, 4)
				const [l5, t5] = at(pairs, 5)
				const [l6, t6] = at(pairs, 6)
				const [l7, t7] = at(pairs, 7)
				const [, t8] = at(pairs, 8)

				const decl = makeTypealiasDecl(
					makeTypealiasKeyword(l0, t0),
					makeIdentifier(alias, l1, t1),
					null,
					makeEqualToken(l2, t2),
					makeOptionalTypeOf(
						makeDictionaryType(
							makeLeftSquareToken(l3, t3),
							makeTypeIdentifierNamed(key, l4, t4),
							makeColonToken(l5, t5),
							makeTypeIdentifierNamed(value, l6, t6),
							makeRightSquareToken(l7, t7)
						),
						t8
					)
				)

				const expected = [
					l0.text, 'typealias', t0.text,
					l1.text, alias, t1.text,
					l2.text, '=', t2.text,
					l3.text, '[', t3.text,
					l4.text, key, t4.text,
					l5.text, ':', t5.text,
					l6.text, value, t6.text,
					l7.text, ']', t7.text,
					'?', t8.text,
				].join('')

				return printSyntax(decl) === expected && decl.toString() === expected && textLength(decl) === expected.length
			})
		)
	})

	it('missing tokens print only their trivia', () => {
		fc.assert(
			fc.property(trivia, trivia, (leading, trailing) => {
				const token = makeMissing(TokenKind.RightBrace, leading, trailing)
				return printSyntax(token) === leading.text + trailing.text
			})
		)
	})

	it('views and raw nodes print the same', () => {
		fc.assert(
			fc.property(name, trivia, (text, leading) => {
				const identifier = makeIdentifier(text, leading)
				assert.strictEqual(printSyntax(identifier.raw), printSyntax(identifier))
				return textLength(identifier.raw) === leading.length + text.length
			})
		)
	})
})
