import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SyntaxContractError } from '../../src/core/errors.ts'
import { ALL_NODE_KINDS, NodeKind, TokenKind } from '../../src/core/kinds.ts'
import {
	isBuiltNode,
	type LayoutNode,
	makeBlankLayout,
	makeCollection,
	makeLayout,
	rawEquals,
	rawTokens,
	rebuildWith,
	replaceChildAt,
	verifySyntax,
} from '../../src/core/nodes.ts'
import { makeCanonicalToken, makeMissingToken, makeToken, type TokenNode } from '../../src/core/tokens.ts'
import { Trivia } from '../../src/core/trivia.ts'

function throwsWithMessage(message: string): (error: unknown) => boolean {
	return (error: unknown) => error instanceof SyntaxContractError && error.message === message
}

const handMadeTypeIdentifier: LayoutNode = {
	children: [],
	isMissing: false,
	kind: NodeKind.TypeIdentifier,
	type: 'layout',
}

const handMadeComma: TokenNode = {
	isMissing: false,
	kind: TokenKind.Comma,
	leadingTrivia: Trivia.empty,
	text: ',',
	trailingTrivia: Trivia.empty,
	type: 'token',
}

function breakStmt(label: string | null) {
	return makeLayout(NodeKind.BreakStmt, [
		makeCanonicalToken(TokenKind.Break),
		label === null ? null : makeToken(TokenKind.Identifier, label, Trivia.spaces(1)),
	])
}

describe('core/nodes', () => {
	describe('makeLayout', () => {
		it('should build a frozen node with one child per slot', () => {
			const node = breakStmt('outer')
			assert.strictEqual(node.type, 'layout')
			assert.strictEqual(node.kind, NodeKind.BreakStmt)
			assert.strictEqual(node.children.length, 2)
			assert.strictEqual(node.isMissing, false)
			assert.ok(Object.isFrozen(node))
			assert.ok(Object.isFrozen(node.children))
		})

		it('should accept null in an optional slot', () => {
			assert.strictEqual(breakStmt(null).children[1], null)
		})

		it('should reject the wrong number of children', () => {
			assert.throws(
				() => makeLayout(NodeKind.BreakStmt, [makeCanonicalToken(TokenKind.Break)]),
				throwsWithMessage('[FTCORE002] BreakStmt expects 2 children, got 1')
			)
		})

		it('should reject null in a required slot', () => {
			assert.throws(
				() => makeLayout(NodeKind.BreakStmt, [null, null]),
				throwsWithMessage('[FTCORE010] required slot breakKeyword of BreakStmt is absent')
			)
		})

		it('should reject a child of a kind the slot does not allow', () => {
			assert.throws(
				() => makeLayout(NodeKind.FallthroughStmt, [makeCanonicalToken(TokenKind.Break)]),
				throwsWithMessage('[FTCORE003] slot fallthroughKeyword of FallthroughStmt does not accept Break')
			)
		})

		it('should reject collection kinds', () => {
			assert.throws(
				() => makeLayout(NodeKind.StmtList, []),
				throwsWithMessage('[FTCORE009] StmtList is a collection kind, expected a layout kind')
			)
		})

		it('should be missing when every slot is absent or missing', () => {
			const node = makeLayout(NodeKind.BreakStmt, [makeMissingToken(TokenKind.Break), null])
			assert.strictEqual(node.isMissing, true)
		})
	})

	describe('makeCollection', () => {
		it('should accept elements of allowed kinds', () => {
			const list = makeCollection(NodeKind.StmtList, [breakStmt(null), breakStmt('a')])
			assert.strictEqual(list.children.length, 2)
			assert.strictEqual(list.isMissing, false)
		})

		it('should treat an empty collection as present', () => {
			assert.strictEqual(makeCollection(NodeKind.DeclMembers, []).isMissing, false)
		})

		it('should reject elements of other kinds', () => {
			assert.throws(
				() => makeCollection(NodeKind.GenericArgumentList, [makeCanonicalToken(TokenKind.Comma)]),
				throwsWithMessage('[FTCORE007] element 0 of GenericArgumentList does not accept Comma')
			)
		})

		it('should accept any token in token collections', () => {
			const tokens = [makeToken(TokenKind.Unknown, '$'), makeCanonicalToken(TokenKind.Arrow)]
			assert.strictEqual(makeCollection(NodeKind.UnknownSyntax, tokens).children.length, 2)
		})
	})

	describe('makeBlankLayout', () => {
		it('should fill required slots with blanks of the first allowed kind', () => {
			const node = makeBlankLayout(NodeKind.TypealiasDecl)
			assert.strictEqual(node.isMissing, true)
			assert.deepStrictEqual(
				node.children.map((child) => (child === null ? null : child.kind)),
				[TokenKind.Typealias, TokenKind.Identifier, null, TokenKind.Equal, NodeKind.TypeIdentifier]
			)
			assert.ok(node.children.every((child) => child === null || child.isMissing))
		})

		it('should make blank collections empty and missing', () => {
			const node = makeBlankLayout(NodeKind.DeclMembers)
			assert.strictEqual(node.children.length, 0)
			assert.strictEqual(node.isMissing, true)
		})

		it('should print nothing', () => {
			for (const kind of ALL_NODE_KINDS) {
				const texts = [...rawTokens(makeBlankLayout(kind))].map((token) => token.text)
				assert.ok(texts.every((text) => text === ''), `blank ${kind} has text`)
			}
		})

		it('should satisfy the shape of every kind', () => {
			for (const kind of ALL_NODE_KINDS) {
				verifySyntax(makeBlankLayout(kind))
			}
		})
	})

	describe('replaceChildAt', () => {
		it('should reuse untouched children by reference', () => {
			const node = breakStmt('a')
			const label = makeToken(TokenKind.Identifier, 'b', Trivia.spaces(1))
			const edited = replaceChildAt(node, 1, label)
			assert.notStrictEqual(edited, node)
			assert.strictEqual(edited.children[0], node.children[0])
			assert.strictEqual(edited.children[1], label)
		})

		it('should re-check the shape', () => {
			assert.throws(() => replaceChildAt(breakStmt('a'), 0, null), SyntaxContractError)
		})

		it('should reject indexes outside the node', () => {
			assert.throws(
				() => replaceChildAt(breakStmt(null), 2, null),
				throwsWithMessage('[FTCORE008] BreakStmt has no child 2')
			)
		})
	})

	describe('rebuildWith', () => {
		it('should build collections and layouts by shape', () => {
			assert.strictEqual(rebuildWith(NodeKind.StmtList, []).isMissing, false)
			assert.strictEqual(rebuildWith(NodeKind.BreakStmt, breakStmt(null).children).kind, NodeKind.BreakStmt)
		})
	})

	describe('rawEquals', () => {
		it('should equate identical constructions', () => {
			assert.ok(rawEquals(breakStmt('a'), breakStmt('a')))
		})

		it('should tell apart different text or trivia', () => {
			assert.ok(!rawEquals(breakStmt('a'), breakStmt('b')))
			assert.ok(!rawEquals(breakStmt('a'), breakStmt(null)))
			assert.ok(
				!rawEquals(
					makeToken(TokenKind.Identifier, 'a'),
					makeToken(TokenKind.Identifier, 'a', Trivia.spaces(1))
				)
			)
		})

		it('should tell apart present and missing tokens', () => {
			assert.ok(!rawEquals(makeMissingToken(TokenKind.Eof), makeCanonicalToken(TokenKind.Eof)))
		})
	})

	describe('hand-made nodes', () => {
		it('should only count constructor results as built', () => {
			assert.ok(isBuiltNode(breakStmt(null)))
			assert.ok(isBuiltNode(makeCanonicalToken(TokenKind.Comma)))
			assert.ok(!isBuiltNode(handMadeTypeIdentifier))
			assert.ok(!isBuiltNode(handMadeComma))
		})

		it('should be refused as layout children', () => {
			assert.throws(
				() =>
					makeLayout(NodeKind.OptionalType, [
						handMadeTypeIdentifier,
						makeCanonicalToken(TokenKind.PostfixQuestion),
					]),
				throwsWithMessage('[FTCORE013] TypeIdentifier node was not made by a syntax constructor')
			)
		})

		it('should be refused as collection elements', () => {
			assert.throws(
				() => makeCollection(NodeKind.GenericArgumentList, [handMadeComma]),
				throwsWithMessage('[FTCORE013] Comma node was not made by a syntax constructor')
			)
		})

		it('should fail verification', () => {
			assert.throws(
				() => verifySyntax(handMadeTypeIdentifier),
				throwsWithMessage('[FTCORE013] TypeIdentifier node was not made by a syntax constructor')
			)
		})
	})
})
