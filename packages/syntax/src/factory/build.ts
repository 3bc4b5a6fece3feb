import type { NodeKind } from '../core/kinds.ts'
import { makeBlankLayout, makeCollection, makeLayout } from '../core/nodes.ts'
import {
	type CollectionView,
	type LayoutSyntax,
	rawOf,
	type Syntax,
	type SyntaxCollection,
	type ViewClass,
} from '../syntax/base.ts'

/** Build a layout node from views in slot order and wrap it as a root view. */
export function layoutOf<T extends LayoutSyntax>(
	kind: NodeKind,
	viewClass: ViewClass<T>,
	children: readonly (Syntax | null)[]
): T {
	return new viewClass(makeLayout(kind, children.map(rawOf)), null)
}

export function blankLayoutOf<T extends LayoutSyntax>(kind: NodeKind, viewClass: ViewClass<T>): T {
	return new viewClass(makeBlankLayout(kind), null)
}

export function collectionOf<K extends NodeKind, E extends Syntax>(
	view: CollectionView<K, E>,
	elements: Iterable<E>
): SyntaxCollection<K, E> {
	return view.create(makeCollection(view.kind, Array.from(elements, (element) => element.raw)))
}

export function blankCollectionOf<K extends NodeKind, E extends Syntax>(
	view: CollectionView<K, E>
): SyntaxCollection<K, E> {
	return view.create(makeBlankLayout(view.kind))
}
