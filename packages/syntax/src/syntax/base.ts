/**
 * Typed views over raw nodes.
 *
 * A view is a raw node plus where it sits (parent view and slot index). Views
 * hold no copy of the children: every accessor reads the raw node and wraps
 * the child it finds. Editing through a view rebuilds the raw parent chain up
 * to the root and shares every untouched subtree.
 */

import { contractViolation } from '../core/errors.ts'
import { kindName, type NodeKind, type SyntaxKind, TokenKind } from '../core/kinds.ts'
import {
	assertBuiltNode,
	type LayoutNode,
	makeCollection,
	rawEquals,
	replaceChildAt,
	type SyntaxNode,
} from '../core/nodes.ts'
import { slotIndexOf } from '../core/shapes.ts'
import { type TokenNode, withTokenTrivia } from '../core/tokens.ts'
import { Trivia } from '../core/trivia.ts'
import { printSyntax, textLength } from '../print/printer.ts'

export interface ParentContext {
	readonly node: NodeSyntax
	readonly index: number
}

export type ViewFactory<T extends NodeSyntax> = (raw: LayoutNode, parent: ParentContext | null) => T

export type ViewClass<T extends NodeSyntax> = new (raw: LayoutNode, parent: ParentContext | null) => T

export type SyntaxGuard<T extends Syntax> = (syntax: Syntax) => syntax is T

const views = new Map<NodeKind, ViewFactory<NodeSyntax>>()

/** Called once per node kind by the module that defines its view. */
export function registerView(kind: NodeKind, create: ViewFactory<NodeSyntax>): void {
	views.set(kind, create)
}

export function wrapNode(raw: LayoutNode, parent: ParentContext | null = null): NodeSyntax {
	const create = views.get(raw.kind)
	if (create === undefined) {
		return contractViolation('FTCORE001', { kind: kindName(raw.kind) })
	}
	return create(raw, parent)
}

export function wrapSyntax(raw: SyntaxNode, parent: ParentContext | null = null): Syntax {
	return raw.type === 'token' ? new TokenSyntax(raw, parent) : wrapNode(raw, parent)
}

/**
 * Parent context for `raw` once it replaces the node at `parent`: the parent
 * and all its ancestors are rebuilt around it.
 */
function reattach(parent: ParentContext | null, raw: SyntaxNode): ParentContext | null {
	if (parent === null) return null
	return { index: parent.index, node: parent.node.replacingChild(parent.index, raw) }
}

export abstract class Syntax {
	abstract readonly raw: SyntaxNode
	readonly parent: ParentContext | null

	constructor(parent: ParentContext | null) {
		this.parent = parent
	}

	abstract get kind(): SyntaxKind

	/** Every token in this subtree, in source order, wrapped with parent context */
	abstract tokens(): Generator<TokenSyntax>

	get kindName(): string {
		return kindName(this.kind)
	}

	get isMissing(): boolean {
		return this.raw.isMissing
	}

	get isPresent(): boolean {
		return !this.raw.isMissing
	}

	get indexInParent(): number | null {
		return this.parent?.index ?? null
	}

	/** Topmost view reachable through parent contexts. */
	get root(): Syntax {
		let current: Syntax = this
		while (current.parent !== null) current = current.parent.node
		return current
	}

	/** Same underlying node, whatever the parent context. */
	isSameNode(other: Syntax): boolean {
		return this.raw === other.raw
	}

	/** Structurally equal underlying nodes. */
	equals(other: Syntax): boolean {
		return rawEquals(this.raw, other.raw)
	}

	get textLength(): number {
		return textLength(this.raw)
	}

	toString(): string {
		return printSyntax(this.raw)
	}
}

export class TokenSyntax<K extends TokenKind = TokenKind> extends Syntax {
	readonly raw: TokenNode<K>

	constructor(raw: TokenNode<K>, parent: ParentContext | null = null) {
		super(parent)
		assertBuiltNode(raw)
		this.raw = raw
	}

	get kind(): K {
		return this.raw.kind
	}

	get text(): string {
		return this.raw.text
	}

	get leadingTrivia(): Trivia {
		return this.raw.leadingTrivia
	}

	get trailingTrivia(): Trivia {
		return this.raw.trailingTrivia
	}

	*tokens(): Generator<TokenSyntax> {
		yield this
	}

	withLeadingTrivia(trivia: Trivia): TokenSyntax<K> {
		return this.replacingSelf(withTokenTrivia(this.raw, trivia, this.raw.trailingTrivia))
	}

	withTrailingTrivia(trivia: Trivia): TokenSyntax<K> {
		return this.replacingSelf(withTokenTrivia(this.raw, this.raw.leadingTrivia, trivia))
	}

	withoutTrivia(): TokenSyntax<K> {
		return this.replacingSelf(withTokenTrivia(this.raw, Trivia.empty, Trivia.empty))
	}

	private replacingSelf(raw: TokenNode<K>): TokenSyntax<K> {
		return new TokenSyntax(raw, reattach(this.parent, raw))
	}
}

/** A view over a layout or collection node. */
export abstract class NodeSyntax extends Syntax {
	readonly raw: LayoutNode

	constructor(raw: LayoutNode, parent: ParentContext | null) {
		super(parent)
		assertBuiltNode(raw)
		this.raw = raw
	}

	abstract override get kind(): NodeKind

	get childCount(): number {
		return this.raw.children.length
	}

	/** Child at a slot or element index; null for an absent optional slot. */
	childAt(index: number): Syntax | null {
		if (!Number.isInteger(index) || index < 0 || index >= this.raw.children.length) {
			return contractViolation('FTCORE008', { child: index, kind: this.kindName })
		}
		const child = this.raw.children[index] ?? null
		return child === null ? null : wrapSyntax(child, { index, node: this })
	}

	*children(): Generator<Syntax | null> {
		for (let i = 0; i < this.raw.children.length; i++) {
			yield this.childAt(i)
		}
	}

	*tokens(): Generator<TokenSyntax> {
		for (const child of this.children()) {
			if (child !== null) yield* child.tokens()
		}
	}

	/**
	 * New view of this node with one child replaced, attached to a rebuilt
	 * parent chain. The shape is re-validated.
	 */
	replacingChild(index: number, child: SyntaxNode | null): NodeSyntax {
		const raw = replaceChildAt(this.raw, index, child)
		return wrapNode(raw, reattach(this.parent, raw))
	}

	protected rebuilt<T extends NodeSyntax>(raw: LayoutNode, create: ViewFactory<T>): T {
		return create(raw, reattach(this.parent, raw))
	}
}

/**
 * Base of all fixed-slot views. Subclasses name their slots after the shape
 * registry and read them through {@link required} and {@link optional}.
 */
export abstract class LayoutSyntax extends NodeSyntax {
	constructor(raw: LayoutNode, parent: ParentContext | null = null) {
		super(raw, parent)
		if (raw.kind !== this.kind) {
			contractViolation('FTCORE012', { actual: kindName(raw.kind), expected: kindName(this.kind) })
		}
	}

	/** Child in the named slot; null when the slot is absent. */
	childNamed(name: string): Syntax | null {
		return this.childAt(slotIndexOf(this.kind, name))
	}

	protected required<T extends Syntax>(name: string, guard: SyntaxGuard<T>): T {
		const child = this.childNamed(name)
		if (child === null || !guard(child)) {
			return contractViolation('FTCORE003', {
				child: child === null ? 'an absent child' : child.kindName,
				kind: this.kindName,
				slot: name,
			})
		}
		return child
	}

	protected optional<T extends Syntax>(name: string, guard: SyntaxGuard<T>): T | null {
		const child = this.childNamed(name)
		if (child === null) return null
		if (!guard(child)) {
			return contractViolation('FTCORE003', { child: child.kindName, kind: this.kindName, slot: name })
		}
		return child
	}

	protected replacing<T extends LayoutSyntax>(
		name: string,
		child: Syntax | null,
		viewClass: ViewClass<T>
	): T {
		const raw = replaceChildAt(this.raw, slotIndexOf(this.kind, name), child === null ? null : child.raw)
		return this.rebuilt(raw, (node, parent) => new viewClass(node, parent))
	}
}

/**
 * View over a collection node. Element kinds are fixed per collection kind by
 * the guard it is created with. Edits return new collections.
 */
export class SyntaxCollection<K extends NodeKind, E extends Syntax>
	extends NodeSyntax
	implements Iterable<E>
{
	private readonly collectionKind: K
	private readonly isElement: SyntaxGuard<E>

	constructor(raw: LayoutNode, parent: ParentContext | null, kind: K, isElement: SyntaxGuard<E>) {
		super(raw, parent)
		this.collectionKind = kind
		this.isElement = isElement
		if (raw.kind !== kind) {
			contractViolation('FTCORE012', { actual: kindName(raw.kind), expected: kindName(kind) })
		}
	}

	get kind(): K {
		return this.collectionKind
	}

	get count(): number {
		return this.raw.children.length
	}

	get isEmpty(): boolean {
		return this.raw.children.length === 0
	}

	at(index: number): E {
		const element = this.childAt(index)
		if (element === null || !this.isElement(element)) {
			return contractViolation('FTCORE007', {
				child: element === null ? 'an absent element' : element.kindName,
				index,
				kind: this.kindName,
			})
		}
		return element
	}

	first(): E | null {
		return this.isEmpty ? null : this.at(0)
	}

	last(): E | null {
		return this.isEmpty ? null : this.at(this.count - 1)
	}

	*[Symbol.iterator](): Iterator<E> {
		for (let i = 0; i < this.count; i++) {
			yield this.at(i)
		}
	}

	appending(element: E): SyntaxCollection<K, E> {
		return this.withElements([...this.elementNodes(), element.raw])
	}

	prepending(element: E): SyntaxCollection<K, E> {
		return this.withElements([element.raw, ...this.elementNodes()])
	}

	inserting(index: number, element: E): SyntaxCollection<K, E> {
		this.checkIndex(index, this.count)
		const elements = this.elementNodes()
		elements.splice(index, 0, element.raw)
		return this.withElements(elements)
	}

	replacing(index: number, element: E): SyntaxCollection<K, E> {
		this.checkIndex(index, this.count - 1)
		const elements = this.elementNodes()
		elements[index] = element.raw
		return this.withElements(elements)
	}

	removing(index: number): SyntaxCollection<K, E> {
		this.checkIndex(index, this.count - 1)
		const elements = this.elementNodes()
		elements.splice(index, 1)
		return this.withElements(elements)
	}

	private checkIndex(index: number, max: number): void {
		if (!Number.isInteger(index) || index < 0 || index > max) {
			contractViolation('FTCORE008', { child: index, kind: this.kindName })
		}
	}

	private elementNodes(): SyntaxNode[] {
		return this.raw.children.filter((child): child is SyntaxNode => child !== null)
	}

	private withElements(elements: readonly SyntaxNode[]): SyntaxCollection<K, E> {
		const raw = makeCollection(this.kind, elements)
		return this.rebuilt(
			raw,
			(node, parent) => new SyntaxCollection(node, parent, this.collectionKind, this.isElement)
		)
	}
}

export interface CollectionView<K extends NodeKind, E extends Syntax> {
	readonly kind: K
	readonly create: (raw: LayoutNode, parent?: ParentContext | null) => SyntaxCollection<K, E>
	readonly is: SyntaxGuard<SyntaxCollection<K, E>>
}

/**
 * Register the view of a collection kind and return its constructor and guard.
 */
export function defineCollection<K extends NodeKind, E extends Syntax>(
	kind: K,
	isElement: SyntaxGuard<E>
): CollectionView<K, E> {
	const create = (raw: LayoutNode, parent: ParentContext | null = null): SyntaxCollection<K, E> =>
		new SyntaxCollection(raw, parent, kind, isElement)
	registerView(kind, create)
	return {
		create,
		is: (syntax: Syntax): syntax is SyntaxCollection<K, E> =>
			syntax instanceof SyntaxCollection && syntax.kind === kind,
		kind,
	}
}

/**
 * Register the view class of a layout kind.
 */
export function defineLayout(kind: NodeKind, viewClass: ViewClass<LayoutSyntax>): void {
	registerView(kind, (raw, parent) => new viewClass(raw, parent))
}

export type TokenOf<N extends keyof typeof TokenKind> = TokenSyntax<(typeof TokenKind)[N]>

/** Guard for tokens of the given kinds. */
export function isTokenOf<K extends TokenKind>(...kinds: K[]): SyntaxGuard<TokenSyntax<K>> {
	const allowed: ReadonlySet<TokenKind> = new Set(kinds)
	return (syntax: Syntax): syntax is TokenSyntax<K> =>
		syntax instanceof TokenSyntax && allowed.has(syntax.kind)
}

export function isAnyToken(syntax: Syntax): syntax is TokenSyntax {
	return syntax instanceof TokenSyntax
}

export const isIdentifier = isTokenOf(TokenKind.Identifier)
export const isLeftParen = isTokenOf(TokenKind.LeftParen)
export const isRightParen = isTokenOf(TokenKind.RightParen)
export const isLeftAngle = isTokenOf(TokenKind.LeftAngle)
export const isRightAngle = isTokenOf(TokenKind.RightAngle)
export const isLeftBrace = isTokenOf(TokenKind.LeftBrace)
export const isRightBrace = isTokenOf(TokenKind.RightBrace)
export const isColon = isTokenOf(TokenKind.Colon)
export const isComma = isTokenOf(TokenKind.Comma)

/** Raw node of a view, or null for an absent slot. */
export function rawOf(syntax: Syntax | null): SyntaxNode | null {
	return syntax === null ? null : syntax.raw
}
