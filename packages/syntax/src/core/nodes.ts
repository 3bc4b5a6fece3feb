/**
 * Raw layout nodes and the shape-checked constructors that build them.
 *
 * A layout node is a kind plus a fixed list of child slots; `null` marks an
 * absent optional slot. Every constructor here validates against the shape
 * registry and freezes its result, so a node that exists is well-shaped and
 * never changes. Editing builds new nodes that share the untouched children.
 */

import { contractViolation } from './errors.ts'
import { isTokenKind, kindName, type NodeKind, type SyntaxKind } from './kinds.ts'
import { type CollectionShape, collectionShapeOf, type LayoutShape, layoutShapeOf, shapeOf } from './shapes.ts'
import { isBuiltToken, makeMissingToken, type TokenNode } from './tokens.ts'

export interface LayoutNode<K extends NodeKind = NodeKind> {
	readonly type: 'layout'
	readonly kind: K
	readonly children: readonly (SyntaxNode | null)[]
	readonly isMissing: boolean
}

export type SyntaxNode = TokenNode | LayoutNode

const builtLayouts = new WeakSet<LayoutNode>()

function freezeLayout<K extends NodeKind>(
	kind: K,
	children: readonly (SyntaxNode | null)[],
	isMissing: boolean
): LayoutNode<K> {
	const node = Object.freeze({
		children: Object.freeze([...children]),
		isMissing,
		kind,
		type: 'layout' as const,
	})
	builtLayouts.add(node)
	return node
}

/** True for nodes made here or in tokens.ts; hand-written lookalikes are not. */
export function isBuiltNode(node: SyntaxNode): boolean {
	return node.type === 'token' ? isBuiltToken(node) : builtLayouts.has(node)
}

export function assertBuiltNode(node: SyntaxNode): void {
	if (!isBuiltNode(node)) {
		contractViolation('FTCORE013', { kind: kindName(node.kind) })
	}
}

/** A node with slots is missing when none of them holds present text. */
function computeMissing(children: readonly (SyntaxNode | null)[]): boolean {
	return children.length > 0 && children.every((child) => child === null || child.isMissing)
}

function checkLayoutChildren(shape: LayoutShape, children: readonly (SyntaxNode | null)[]): void {
	if (children.length !== shape.slots.length) {
		contractViolation('FTCORE002', {
			actual: children.length,
			expected: shape.slots.length,
			kind: kindName(shape.kind),
		})
	}
	shape.slots.forEach((slot, index) => {
		const child = children[index] ?? null
		if (child === null) {
			if (!slot.optional) {
				contractViolation('FTCORE010', { kind: kindName(shape.kind), slot: slot.name })
			}
			return
		}
		assertBuiltNode(child)
		if (!slot.kinds.includes(child.kind)) {
			contractViolation('FTCORE003', {
				child: kindName(child.kind),
				kind: kindName(shape.kind),
				slot: slot.name,
			})
		}
	})
}

function checkCollectionElements(shape: CollectionShape, elements: readonly (SyntaxNode | null)[]): void {
	elements.forEach((element, index) => {
		if (element !== null) assertBuiltNode(element)
		if (element === null || !shape.elementKinds.includes(element.kind)) {
			contractViolation('FTCORE007', {
				child: element === null ? 'an absent element' : kindName(element.kind),
				index,
				kind: kindName(shape.kind),
			})
		}
	})
}

/**
 * Build a layout node after checking slot count and slot kinds.
 */
export function makeLayout<K extends NodeKind>(
	kind: K,
	children: readonly (SyntaxNode | null)[]
): LayoutNode<K> {
	checkLayoutChildren(layoutShapeOf(kind), children)
	return freezeLayout(kind, children, computeMissing(children))
}

/**
 * Build a collection node after checking every element's kind.
 * An empty collection made here is present: `{}` has no members but is not an error.
 */
export function makeCollection<K extends NodeKind>(
	kind: K,
	elements: readonly SyntaxNode[]
): LayoutNode<K> {
	checkCollectionElements(collectionShapeOf(kind), elements)
	return freezeLayout(kind, elements, computeMissing(elements))
}

/**
 * Build the placeholder for a node kind that could not be parsed.
 * Required slots hold the blank form of their first allowed kind, optional
 * slots are absent, collections are empty; the result is always missing.
 */
export function makeBlankLayout<K extends NodeKind>(kind: K): LayoutNode<K> {
	const shape = shapeOf(kind)
	if (shape.type === 'collection') return freezeLayout(kind, [], true)
	const children = shape.slots.map((slot) => {
		const blankKind = slot.kinds[0]
		if (slot.optional || blankKind === undefined) return null
		return makeBlank(blankKind)
	})
	checkLayoutChildren(shape, children)
	return freezeLayout(kind, children, true)
}

/** Blank form of any kind: a missing token or a blank layout. */
export function makeBlank(kind: SyntaxKind): SyntaxNode {
	return isTokenKind(kind) ? makeMissingToken(kind) : makeBlankLayout(kind)
}

/**
 * Rebuild `node` with one child replaced, re-validating the shape.
 * Every other child is reused by reference.
 */
export function replaceChildAt<K extends NodeKind>(
	node: LayoutNode<K>,
	index: number,
	child: SyntaxNode | null
): LayoutNode<K> {
	if (!Number.isInteger(index) || index < 0 || index >= node.children.length) {
		return contractViolation('FTCORE008', { child: index, kind: kindName(node.kind) })
	}
	const children = node.children.map((existing, i) => (i === index ? child : existing))
	return rebuildWith(node.kind, children)
}

/**
 * Build a node of `kind` from a new child list, as a layout or a collection
 * depending on its shape.
 */
export function rebuildWith<K extends NodeKind>(
	kind: K,
	children: readonly (SyntaxNode | null)[]
): LayoutNode<K> {
	const shape = shapeOf(kind)
	if (shape.type === 'layout') return makeLayout(kind, children)
	checkCollectionElements(shape, children)
	return freezeLayout(kind, children, computeMissing(children))
}

/**
 * Check a whole subtree against the shape registry.
 * Throws the first violation found; returns normally for well-shaped trees.
 */
export function verifySyntax(node: SyntaxNode): void {
	assertBuiltNode(node)
	if (node.type === 'token') return
	const shape = shapeOf(node.kind)
	if (shape.type === 'layout') {
		checkLayoutChildren(shape, node.children)
	} else {
		checkCollectionElements(shape, node.children)
	}
	for (const child of node.children) {
		if (child !== null) verifySyntax(child)
	}
}

/** Every token under `node`, in source order. */
export function* rawTokens(node: SyntaxNode): Generator<TokenNode> {
	if (node.type === 'token') {
		yield node
		return
	}
	for (const child of node.children) {
		if (child !== null) yield* rawTokens(child)
	}
}

/**
 * Structural equality: same kinds, same text, same trivia, same missing
 * state, all the way down. Identical references short-circuit.
 */
export function rawEquals(a: SyntaxNode | null, b: SyntaxNode | null): boolean {
	if (a === b) return true
	if (a === null || b === null) return false
	if (a.kind !== b.kind || a.isMissing !== b.isMissing) return false
	if (a.type === 'token' || b.type === 'token') {
		return (
			a.type === 'token' &&
			b.type === 'token' &&
			a.text === b.text &&
			a.leadingTrivia.equals(b.leadingTrivia) &&
			a.trailingTrivia.equals(b.trailingTrivia)
		)
	}
	if (a.children.length !== b.children.length) return false
	return a.children.every((child, i) => rawEquals(child, b.children[i] ?? null))
}
