import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	dumpSyntax,
	makeBlankBreakStmt,
	makeBreakKeyword,
	makeBreakStmt,
	makeIdentifier,
	makeOptionalTypeOf,
	makeTypeIdentifierNamed,
	makeUnknownSyntax,
	makeUnknownToken,
	makeVoidTupleType,
	Trivia,
} from '../../src/index.ts'

describe('print/dump', () => {
	it('should prefix layout children with their slot name', () => {
		assert.strictEqual(
			dumpSyntax(makeVoidTupleType()),
			[
				'TupleType',
				"  leftParen: LeftParen '('",
				'  elements: TupleTypeElementList',
				"  rightParen: RightParen ')'",
			].join('\n')
		)
	})

	it('should accept raw nodes', () => {
		const tuple = makeVoidTupleType()
		assert.strictEqual(dumpSyntax(tuple.raw), dumpSyntax(tuple))
	})

	it('should nest children and show absent slots', () => {
		assert.strictEqual(
			dumpSyntax(makeOptionalTypeOf(makeTypeIdentifierNamed('Int'))),
			[
				'OptionalType',
				'  baseType: TypeIdentifier',
				"    name: Identifier 'Int'",
				'    genericArgumentClause: <absent>',
				"  questionMark: PostfixQuestion '?'",
			].join('\n')
		)
	})

	it('should list collection elements without a prefix and show trivia on request', () => {
		const unknown = makeUnknownSyntax([
			makeUnknownToken('$'),
			makeIdentifier('x', Trivia.spaces(1), Trivia.newlines(1)),
		])
		assert.strictEqual(
			dumpSyntax(unknown, { trivia: true }),
			['UnknownSyntax', "  Unknown '$'", `  Identifier 'x' leading=" " trailing="\\n"`].join('\n')
		)
	})

	it('should mark missing nodes unless asked not to', () => {
		const blank = makeBlankBreakStmt()
		assert.strictEqual(
			dumpSyntax(blank),
			['BreakStmt <missing>', "  breakKeyword: Break '' <missing>", '  label: <absent>'].join('\n')
		)
		assert.strictEqual(
			dumpSyntax(blank, { missing: false }),
			['BreakStmt', "  breakKeyword: Break ''", '  label: <absent>'].join('\n')
		)
	})

	it('should use the given indent', () => {
		const stmt = makeBreakStmt(makeBreakKeyword(), makeIdentifier('out', Trivia.spaces(1)))
		assert.strictEqual(
			dumpSyntax(stmt, { indent: '\t' }),
			['BreakStmt', "\tbreakKeyword: Break 'break'", "\tlabel: Identifier 'out'"].join('\n')
		)
	})
})
