/**
 * Raw token nodes: the leaves of the tree.
 * A token owns its literal text and the trivia on both sides of it, so the
 * source is rebuilt by concatenating leading trivia, text and trailing trivia.
 */

import { contractViolation } from './errors.ts'
import { canonicalText, isTokenKind, kindName, type TokenKind } from './kinds.ts'
import { Trivia } from './trivia.ts'

export interface TokenNode<K extends TokenKind = TokenKind> {
	readonly type: 'token'
	readonly kind: K
	/** Literal source text; empty for missing tokens and Eof */
	readonly text: string
	readonly leadingTrivia: Trivia
	readonly trailingTrivia: Trivia
	readonly isMissing: boolean
}

const builtTokens = new WeakSet<TokenNode>()

/** True when `token` came from one of the constructors below. */
export function isBuiltToken(token: TokenNode): boolean {
	return builtTokens.has(token)
}

/** Trivia values that only look like a Trivia are copied into a real one. */
function ownTrivia(trivia: Pick<Trivia, 'pieces'>): Trivia {
	return trivia instanceof Trivia ? trivia : new Trivia(trivia.pieces)
}

function freezeToken<K extends TokenKind>(
	kind: K,
	text: string,
	leadingTrivia: Trivia,
	trailingTrivia: Trivia,
	isMissing: boolean
): TokenNode<K> {
	const token = Object.freeze({
		isMissing,
		kind,
		leadingTrivia: ownTrivia(leadingTrivia),
		text,
		trailingTrivia: ownTrivia(trailingTrivia),
		type: 'token' as const,
	})
	builtTokens.add(token)
	return token
}

function assertTokenKind(kind: number): void {
	if (!isTokenKind(kind)) {
		contractViolation('FTCORE004', { kind: kindName(kind) })
	}
}

/**
 * Make a present token.
 * Keyword and punctuation kinds only accept their canonical spelling.
 */
export function makeToken<K extends TokenKind>(
	kind: K,
	text: string,
	leadingTrivia: Trivia = Trivia.empty,
	trailingTrivia: Trivia = Trivia.empty
): TokenNode<K> {
	assertTokenKind(kind)
	const expected = canonicalText(kind)
	if (expected !== undefined && expected !== text) {
		return contractViolation('FTCORE005', { actual: text, expected, kind: kindName(kind) })
	}
	return freezeToken(kind, text, leadingTrivia, trailingTrivia, false)
}

/**
 * Make a missing token: empty text, marked missing.
 * Trivia is empty unless the caller supplies it explicitly.
 */
export function makeMissingToken<K extends TokenKind>(
	kind: K,
	leadingTrivia: Trivia = Trivia.empty,
	trailingTrivia: Trivia = Trivia.empty
): TokenNode<K> {
	assertTokenKind(kind)
	return freezeToken(kind, '', leadingTrivia, trailingTrivia, true)
}

const interned = new Map<TokenKind, TokenNode>()

function isInternedKind<K extends TokenKind>(token: TokenNode, kind: K): token is TokenNode<K> {
	return token.kind === kind
}

/**
 * Make a keyword or punctuation token from its canonical spelling.
 * Trivia-free tokens are interned and shared.
 */
export function makeCanonicalToken<K extends TokenKind>(
	kind: K,
	leadingTrivia: Trivia = Trivia.empty,
	trailingTrivia: Trivia = Trivia.empty
): TokenNode<K> {
	const text = canonicalText(kind)
	if (text === undefined) {
		return contractViolation('FTCORE009', {
			actual: 'free-text',
			expected: 'keyword or punctuation',
			kind: kindName(kind),
		})
	}
	if (!leadingTrivia.isEmpty || !trailingTrivia.isEmpty) {
		return makeToken(kind, text, leadingTrivia, trailingTrivia)
	}
	const cached = interned.get(kind)
	if (cached !== undefined && isInternedKind(cached, kind)) return cached
	const token = makeToken(kind, text)
	interned.set(kind, token)
	return token
}

/**
 * Copy a token with different trivia, keeping kind, text and missing state.
 */
export function withTokenTrivia<K extends TokenKind>(
	token: TokenNode<K>,
	leadingTrivia: Trivia,
	trailingTrivia: Trivia
): TokenNode<K> {
	return freezeToken(token.kind, token.text, leadingTrivia, trailingTrivia, token.isMissing)
}
