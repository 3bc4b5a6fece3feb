import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SyntaxContractError } from '../../src/core/errors.ts'
import { ALL_NODE_KINDS, isNodeKind, isTokenKind, NodeKind, TokenKind } from '../../src/core/kinds.ts'
import {
	layoutShapeOf,
	registeredKinds,
	shapeOf,
	slotCountOf,
	slotIndexOf,
	TYPE_KINDS,
} from '../../src/core/shapes.ts'

describe('core/shapes', () => {
	it('should register exactly the node kinds', () => {
		assert.deepStrictEqual(
			[...registeredKinds()].sort((a, b) => a - b),
			[...ALL_NODE_KINDS]
		)
	})

	it('should only allow known kinds in slots and elements', () => {
		for (const kind of registeredKinds()) {
			const shape = shapeOf(kind)
			const allowed = shape.type === 'layout' ? shape.slots.flatMap((slot) => slot.kinds) : shape.elementKinds
			for (const child of allowed) {
				assert.ok(isTokenKind(child) || isNodeKind(child), `${kind} allows unknown kind ${child}`)
			}
		}
	})

	it('should give every layout slot at least one kind and a unique name', () => {
		for (const kind of registeredKinds()) {
			const shape = shapeOf(kind)
			if (shape.type !== 'layout') continue
			const names = shape.slots.map((slot) => slot.name)
			assert.strictEqual(new Set(names).size, names.length)
			assert.ok(shape.slots.every((slot) => slot.kinds.length > 0))
		}
	})

	it('should describe slots in order', () => {
		const shape = layoutShapeOf(NodeKind.SameTypeRequirement)
		assert.deepStrictEqual(
			shape.slots.map((slot) => [slot.name, slot.optional]),
			[
				['leftType', false],
				['equalityToken', false],
				['rightType', false],
				['trailingComma', true],
			]
		)
		assert.deepStrictEqual(shape.slots[1]?.kinds, [TokenKind.BinaryOperator])
	})

	it('should put TypeIdentifier first among type kinds', () => {
		assert.strictEqual(TYPE_KINDS[0], NodeKind.TypeIdentifier)
		assert.deepStrictEqual(layoutShapeOf(NodeKind.ArrayType).slots[1]?.kinds, TYPE_KINDS)
	})

	it('should look up slots by name', () => {
		assert.strictEqual(slotIndexOf(NodeKind.StructDecl, 'members'), 5)
		assert.throws(
			() => slotIndexOf(NodeKind.StructDecl, 'body'),
			(error: unknown) =>
				error instanceof SyntaxContractError && error.message === '[FTCORE008] StructDecl has no child body'
		)
	})

	it('should count slots of layouts only', () => {
		assert.strictEqual(slotCountOf(NodeKind.DictionaryType), 5)
		assert.strictEqual(slotCountOf(NodeKind.TupleTypeElementList), null)
	})

	it('should reject token kinds and unknown numbers', () => {
		assert.throws(
			() => shapeOf(TokenKind.Comma),
			(error: unknown) =>
				error instanceof SyntaxContractError &&
				error.message === '[FTCORE009] Comma is a token kind, expected a node kind'
		)
		assert.throws(
			() => Reflect.apply(shapeOf, undefined, [9999]),
			(error: unknown) =>
				error instanceof SyntaxContractError && error.message === '[FTCORE001] unknown syntax kind #9999'
		)
	})

	it('should freeze the registry', () => {
		const shape = layoutShapeOf(NodeKind.TupleType)
		assert.ok(Object.isFrozen(shape))
		assert.ok(Object.isFrozen(shape.slots))
	})
})
