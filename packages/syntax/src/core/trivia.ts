/**
 * Trivia: the non-semantic text (whitespace, comments, garbage) around a token.
 * Pieces keep their exact text and order; nothing is merged or normalized.
 */

import { contractViolation } from './errors.ts'

export const TriviaKind = {
	BlockComment: 4,
	DocBlockComment: 6,
	DocLineComment: 5,
	GarbageText: 7,
	LineComment: 3,
	Newlines: 2,
	Spaces: 0,
	Tabs: 1,
} as const

export type TriviaKind = (typeof TriviaKind)[keyof typeof TriviaKind]

export interface TriviaPiece {
	readonly kind: TriviaKind
	readonly text: string
}

const PIECE_PATTERNS: ReadonlyMap<TriviaKind, RegExp> = new Map<TriviaKind, RegExp>([
	[TriviaKind.Spaces, /^ +$/],
	[TriviaKind.Tabs, /^\t+$/],
	[TriviaKind.Newlines, /^(?:\r\n|\r|\n)+$/],
	[TriviaKind.LineComment, /^\/\/[^\r\n]*$/],
	[TriviaKind.BlockComment, /^\/\*[\s\S]*\*\/$/],
	[TriviaKind.DocLineComment, /^\/\/\/[^\r\n]*$/],
	[TriviaKind.DocBlockComment, /^\/\*\*[\s\S]*\*\/$/],
	[TriviaKind.GarbageText, /^[\s\S]+$/],
])

const TRIVIA_KIND_NAMES: ReadonlyMap<TriviaKind, string> = new Map(
	Object.entries(TriviaKind).map(([name, kind]): [TriviaKind, string] => [kind, name])
)

export function triviaKindName(kind: TriviaKind): string {
	return TRIVIA_KIND_NAMES.get(kind) ?? `#${kind}`
}

/**
 * Create a trivia piece, checking that `text` is a well-formed instance of `kind`.
 */
export function triviaPiece(kind: TriviaKind, text: string): TriviaPiece {
	const pattern = PIECE_PATTERNS.get(kind)
	if (pattern === undefined || !pattern.test(text)) {
		return contractViolation('FTCORE006', { piece: triviaKindName(kind), text: JSON.stringify(text) })
	}
	return Object.freeze({ kind, text })
}

function repeated(kind: TriviaKind, unit: string, count: number): Trivia {
	if (!Number.isInteger(count) || count < 0) {
		return contractViolation('FTCORE011', { count })
	}
	if (count === 0) return Trivia.empty
	return new Trivia([triviaPiece(kind, unit.repeat(count))])
}

/**
 * An immutable, ordered run of trivia pieces.
 * `Trivia.empty` is a valid value of its own; tokens always carry a leading and
 * a trailing Trivia, possibly empty.
 */
export class Trivia implements Iterable<TriviaPiece> {
	static readonly empty: Trivia = new Trivia([])

	readonly pieces: readonly TriviaPiece[]

	/** Pieces are checked and copied; the caller's piece objects are not kept. */
	constructor(pieces: Iterable<TriviaPiece>) {
		this.pieces = Object.freeze([...pieces].map((piece) => triviaPiece(piece.kind, piece.text)))
		Object.freeze(this)
	}

	static of(...pieces: TriviaPiece[]): Trivia {
		return pieces.length === 0 ? Trivia.empty : new Trivia(pieces)
	}

	static spaces(count: number): Trivia {
		return repeated(TriviaKind.Spaces, ' ', count)
	}

	static tabs(count: number): Trivia {
		return repeated(TriviaKind.Tabs, '\t', count)
	}

	static newlines(count: number): Trivia {
		return repeated(TriviaKind.Newlines, '\n', count)
	}

	static lineComment(text: string): Trivia {
		return Trivia.of(triviaPiece(TriviaKind.LineComment, text))
	}

	static blockComment(text: string): Trivia {
		return Trivia.of(triviaPiece(TriviaKind.BlockComment, text))
	}

	static docLineComment(text: string): Trivia {
		return Trivia.of(triviaPiece(TriviaKind.DocLineComment, text))
	}

	static docBlockComment(text: string): Trivia {
		return Trivia.of(triviaPiece(TriviaKind.DocBlockComment, text))
	}

	static garbageText(text: string): Trivia {
		return Trivia.of(triviaPiece(TriviaKind.GarbageText, text))
	}

	get count(): number {
		return this.pieces.length
	}

	get isEmpty(): boolean {
		return this.pieces.length === 0
	}

	/** Concatenated text of all pieces. */
	get text(): string {
		return this.pieces.map((piece) => piece.text).join('')
	}

	/** Length of {@link text}, in UTF-16 code units. */
	get length(): number {
		let total = 0
		for (const piece of this.pieces) total += piece.text.length
		return total
	}

	at(index: number): TriviaPiece | undefined {
		return this.pieces[index]
	}

	append(piece: TriviaPiece): Trivia {
		return new Trivia([...this.pieces, piece])
	}

	concat(other: Trivia): Trivia {
		if (other.isEmpty) return this
		if (this.isEmpty) return other
		return new Trivia([...this.pieces, ...other.pieces])
	}

	equals(other: Trivia): boolean {
		if (this === other) return true
		if (this.pieces.length !== other.pieces.length) return false
		return this.pieces.every((piece, i) => {
			const theirs = other.pieces[i]
			return theirs !== undefined && theirs.kind === piece.kind && theirs.text === piece.text
		})
	}

	[Symbol.iterator](): Iterator<TriviaPiece> {
		return this.pieces[Symbol.iterator]()
	}

	toString(): string {
		return this.text
	}
}
