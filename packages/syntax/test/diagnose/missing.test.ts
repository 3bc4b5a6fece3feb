import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	collectMissing,
	DiagnosticReport,
	describeExpected,
	diagnoseMissing,
	makeBlankSourceFile,
	makeBlankTypeIdentifier,
	makeBreakKeyword,
	makeBreakStmt,
	makeDeclMembers,
	makeEofToken,
	makeEqualToken,
	makeIdentifier,
	makeLeftBraceToken,
	makeMissing,
	makeRightBraceToken,
	makeSourceFile,
	makeStructDecl,
	makeStructKeyword,
	makeTopLevelItemList,
	makeTypealiasDecl,
	makeTypealiasKeyword,
	NodeKind,
	type SourceFileSyntax,
	StructDeclSyntax,
	TokenKind,
	Trivia,
} from '../../src/index.ts'

/** `struct S {` with the closing brace missing */
function unclosedStruct(): SourceFileSyntax {
	const struct = makeStructDecl(
		makeStructKeyword(Trivia.empty, Trivia.spaces(1)),
		makeIdentifier('S', Trivia.empty, Trivia.spaces(1)),
		null,
		null,
		makeLeftBraceToken(),
		makeDeclMembers([]),
		makeMissing(TokenKind.RightBrace)
	)
	return makeSourceFile(makeTopLevelItemList([struct]), makeEofToken())
}

/** `struct A {}` then `typealias T = ` with no type */
function aliasWithoutType(): SourceFileSyntax {
	const struct = makeStructDecl(
		makeStructKeyword(Trivia.empty, Trivia.spaces(1)),
		makeIdentifier('A', Trivia.empty, Trivia.spaces(1)),
		null,
		null,
		makeLeftBraceToken(),
		makeDeclMembers([]),
		makeRightBraceToken(Trivia.empty, Trivia.newlines(1))
	)
	const alias = makeTypealiasDecl(
		makeTypealiasKeyword(Trivia.empty, Trivia.spaces(1)),
		makeIdentifier('T', Trivia.empty, Trivia.spaces(1)),
		null,
		makeEqualToken(Trivia.empty, Trivia.spaces(1)),
		makeBlankTypeIdentifier()
	)
	return makeSourceFile(makeTopLevelItemList([struct, alias]), makeEofToken())
}

describe('diagnose/missing', () => {
	describe('collectMissing', () => {
		it('should locate a missing token where its text would start', () => {
			const records = collectMissing(unclosedStruct())
			assert.strictEqual(records.length, 1)
			const [record] = records
			assert.ok(record !== undefined)
			assert.strictEqual(record.kind, TokenKind.RightBrace)
			assert.deepStrictEqual(record.path, [0, 0, 6])
			assert.strictEqual(record.offset, 10)
			assert.strictEqual(record.line, 1)
			assert.strictEqual(record.column, 11)
			assert.ok(record.syntax.parent?.node instanceof StructDeclSyntax)
		})

		it('should report only the outermost missing node', () => {
			const records = collectMissing(aliasWithoutType())
			assert.deepStrictEqual(
				records.map((record) => [record.kind, record.path, record.line, record.column]),
				[[NodeKind.TypeIdentifier, [0, 1, 4], 2, 15]]
			)
		})

		it('should skip the leading trivia of a missing token', () => {
			const stmt = makeBreakStmt(makeBreakKeyword(), makeMissing(TokenKind.Identifier, Trivia.spaces(1)))
			const records = collectMissing(stmt)
			assert.strictEqual(records.length, 1)
			assert.strictEqual(records[0]?.offset, 6)
			assert.deepStrictEqual(records[0]?.path, [1])
		})

		it('should report a blank root once', () => {
			const records = collectMissing(makeBlankSourceFile())
			assert.deepStrictEqual(
				records.map((record) => [record.kind, record.path, record.offset]),
				[[NodeKind.SourceFile, [], 0]]
			)
		})

		it('should find nothing in a complete tree', () => {
			const file = aliasWithoutType()
			assert.strictEqual(collectMissing(file.items.at(0)).length, 0)
		})
	})

	describe('describeExpected', () => {
		it('should quote fixed token text and name everything else', () => {
			assert.strictEqual(describeExpected(TokenKind.Arrow), "'->'")
			assert.strictEqual(describeExpected(TokenKind.Identifier), 'Identifier')
			assert.strictEqual(describeExpected(TokenKind.Eof), 'Eof')
			assert.strictEqual(describeExpected(NodeKind.TupleType), 'TupleType')
		})
	})

	describe('diagnoseMissing', () => {
		it('should emit FTSYN001 with a help line for tokens', () => {
			const report = diagnoseMissing(unclosedStruct(), { filename: 'shapes.src' })
			assert.ok(report.hasErrors())
			assert.strictEqual(report.getErrorCount(), 1)
			const [diagnostic] = report.getDiagnostics()
			assert.ok(diagnostic !== undefined)
			assert.strictEqual(diagnostic.def.code, 'FTSYN001')
			assert.strictEqual(diagnostic.message, "expected '}'")
			assert.strictEqual(
				report.formatDiagnostic(diagnostic),
				[
					"error[FTSYN001]: expected '}'",
					'  --> shapes.src:1:11',
					'   | ',
					' 1 | struct S {',
					`   | ${' '.repeat(10)}^`,
					'   | ',
					"   = help: Insert '}' here.",
				].join('\n')
			)
		})

		it('should emit FTSYN002 for nodes', () => {
			const report = diagnoseMissing(aliasWithoutType())
			assert.strictEqual(
				report.formatAllDiagnostics(),
				[
					'error[FTSYN002]: expected TypeIdentifier',
					'  --> <input>:2:15',
					'   | ',
					' 2 | typealias T = ',
					`   | ${' '.repeat(14)}^`,
				].join('\n')
			)
		})

		it('should be empty for a complete tree', () => {
			const file = makeSourceFile(makeTopLevelItemList([]), makeEofToken(Trivia.newlines(1)))
			const report = diagnoseMissing(file)
			assert.strictEqual(report.hasErrors(), false)
			assert.strictEqual(report.formatAllDiagnostics(), '')
		})
	})

	describe('DiagnosticReport', () => {
		it('should map offsets to lines and columns', () => {
			const report = new DiagnosticReport('ab\ncd\n')
			assert.deepStrictEqual(report.locate(0), { column: 1, line: 1, offset: 0 })
			assert.deepStrictEqual(report.locate(3), { column: 1, line: 2, offset: 3 })
			assert.deepStrictEqual(report.locate(6), { column: 1, line: 3, offset: 6 })
		})

		it('should return source lines without line breaks', () => {
			const report = new DiagnosticReport('a\r\nb')
			assert.strictEqual(report.getSourceLine(1), 'a')
			assert.strictEqual(report.getSourceLine(2), 'b')
			assert.strictEqual(report.getSourceLine(3), undefined)
		})

		it('should treat a lone carriage return as a line break', () => {
			const report = new DiagnosticReport('ab\rcd\r\nef')
			assert.deepStrictEqual(report.locate(3), { column: 1, line: 2, offset: 3 })
			assert.deepStrictEqual(report.locate(4), { column: 2, line: 2, offset: 4 })
			assert.deepStrictEqual(report.locate(7), { column: 1, line: 3, offset: 7 })
			assert.strictEqual(report.getSourceLine(1), 'ab')
			assert.strictEqual(report.getSourceLine(2), 'cd')
			assert.strictEqual(report.getSourceLine(3), 'ef')
		})
	})
})
