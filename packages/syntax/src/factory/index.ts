/**
 * The construction protocol: the only way callers build nodes.
 *
 * `make<Kind>` takes one argument per slot in slot order, `null` for an
 * absent optional slot. `makeBlank<Kind>` builds the missing placeholder.
 */

import type { NodeKind } from '../core/kinds.ts'
import { makeBlankLayout } from '../core/nodes.ts'
import { type NodeSyntax, wrapNode } from '../syntax/index.ts'

export * from './decls.ts'
export * from './generics.ts'
export * from './stmts.ts'
export * from './tokens.ts'
export * from './types.ts'

/** Blank placeholder of any node kind, wrapped in its view. */
export function makeBlank(kind: NodeKind): NodeSyntax {
	return wrapNode(makeBlankLayout(kind))
}
