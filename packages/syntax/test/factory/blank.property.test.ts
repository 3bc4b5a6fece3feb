/**
 * Property-based tests for blank nodes.
 *
 * Every kind's blank must be readable through every accessor, print as
 * nothing and satisfy its own shape.
 */

import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import {
	ALL_NODE_KINDS,
	LayoutSyntax,
	makeBlank,
	shapeOf,
	Syntax,
	SyntaxCollection,
	verifySyntax,
} from '../../src/index.ts'

const nodeKind = fc.constantFrom(...ALL_NODE_KINDS)

describe('factory/blank (property)', () => {
	it('blank of any kind has that kind and is missing', () => {
		fc.assert(
			fc.property(nodeKind, (kind) => {
				const blank = makeBlank(kind)
				return blank.kind === kind && blank.isMissing && blank.toString() === '' && blank.textLength === 0
			})
		)
	})

	it('every named accessor of a blank is safe to read', () => {
		fc.assert(
			fc.property(nodeKind, (kind) => {
				const blank = makeBlank(kind)
				const shape = shapeOf(kind)
				if (shape.type === 'collection') {
					return blank instanceof SyntaxCollection && blank.count === 0
				}
				assert.ok(blank instanceof LayoutSyntax)
				for (const slot of shape.slots) {
					const value: unknown = Reflect.get(blank, slot.name)
					if (slot.optional) {
						assert.strictEqual(value, null, `${blank.kindName}.${slot.name}`)
					} else {
						assert.ok(value instanceof Syntax, `${blank.kindName}.${slot.name}`)
						assert.ok(value.isMissing)
						assert.strictEqual(value.kind, slot.kinds[0])
					}
				}
				return true
			})
		)
	})

	it('blank of any kind satisfies its shape', () => {
		fc.assert(
			fc.property(nodeKind, (kind) => {
				verifySyntax(makeBlank(kind).raw)
				return true
			})
		)
	})
})
