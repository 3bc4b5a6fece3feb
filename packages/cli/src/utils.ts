import { FTCLI001, FTCLI002, FTCLI003, formatCodedMessage } from '@fulltree/diagnostics'
import {
	ALL_NODE_KINDS,
	ALL_TOKEN_KINDS,
	canonicalText,
	dumpSyntax,
	isNodeKind,
	kindByName,
	kindName,
	makeBlank,
	type NodeKind,
	type Shape,
	shapeOf,
	SyntaxContractError,
	type SyntaxKind,
} from '@fulltree/syntax'

export type KindResolution =
	| { readonly ok: true; readonly kind: NodeKind }
	| { readonly ok: false; readonly error: string }

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Look up a node kind by its name as written in NodeKind.
 */
export function resolveNodeKind(name: string): KindResolution {
	const kind = kindByName(name)
	if (kind === undefined) {
		return { error: formatCodedMessage(FTCLI001, { name }), ok: false }
	}
	if (!isNodeKind(kind)) {
		return { error: formatCodedMessage(FTCLI002, { name }), ok: false }
	}
	return { kind, ok: true }
}

export function formatInternalError(error: unknown): string {
	if (error instanceof SyntaxContractError) {
		return error.message
	}
	return formatCodedMessage(FTCLI003, { reason: getErrorMessage(error) })
}

function formatAlternatives(kinds: readonly SyntaxKind[]): string {
	if (kinds.length === ALL_TOKEN_KINDS.length && kinds.every((kind) => !isNodeKind(kind))) {
		return 'any token'
	}
	return kinds.map(kindName).join(' | ')
}

/**
 * One header line, then one line per slot (`name: Kind`, `name?: Kind` when
 * optional) or a single `element:` line for collections.
 */
export function formatShape(shape: Shape): string[] {
	if (shape.type === 'collection') {
		return [
			`${kindName(shape.kind)} (collection)`,
			`  element: ${formatAlternatives(shape.elementKinds)}`,
		]
	}
	return [
		`${kindName(shape.kind)} (layout)`,
		...shape.slots.map(
			(slot) => `  ${slot.name}${slot.optional ? '?' : ''}: ${formatAlternatives(slot.kinds)}`
		),
	]
}

export function formatShapeOf(kind: NodeKind): string[] {
	return formatShape(shapeOf(kind))
}

/**
 * Node kinds with their shape type; token kinds with their fixed text when
 * they have one.
 */
export function formatKindTable(includeTokens: boolean): string[] {
	const nodes = ALL_NODE_KINDS.map((kind) => `${kindName(kind)} (${shapeOf(kind).type})`)
	if (!includeTokens) return nodes
	const tokens = ALL_TOKEN_KINDS.map((kind) => {
		const text = canonicalText(kind)
		return text === undefined || text === ''
			? `${kindName(kind)} (token)`
			: `${kindName(kind)} (token '${text}')`
	})
	return [...nodes, ...tokens]
}

/** Dump of the blank placeholder tree for a node kind. */
export function formatBlank(kind: NodeKind, trivia: boolean): string {
	return dumpSyntax(makeBlank(kind), { trivia })
}
