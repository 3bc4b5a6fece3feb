/**
 * Diagnostics collected over one printed tree, with Rust-style formatting
 * against the tree's own source text.
 */

import {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	type RecoveryDiagnosticCode,
	SEVERITY_LABELS,
	SYNTAX_DIAGNOSTICS,
} from '@fulltree/diagnostics'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Character offset into the printed source */
	readonly offset: number
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Slot indices from the root to the node the diagnostic is about */
	readonly path: readonly number[]
	/** Template arguments used for message interpolation */
	readonly args: DiagnosticArgs
}

export interface SourceLocation {
	readonly offset: number
	readonly line: number
	readonly column: number
}

/** Offsets of the first character of every line. `\r\n`, `\r` and `\n` each end a line. */
function lineStarts(source: string): number[] {
	const starts = [0]
	for (let i = 0; i < source.length; i++) {
		const char = source[i]
		if (char === '\n' || (char === '\r' && source[i + 1] !== '\n')) starts.push(i + 1)
	}
	return starts
}

export class DiagnosticReport {
	readonly source: string
	readonly filename: string
	private readonly starts: number[]
	private readonly diagnostics: Diagnostic[] = []
	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.starts = lineStarts(source)
	}

	/** Line and column (both 1-indexed) of a character offset. */
	locate(offset: number): SourceLocation {
		let line = 0
		while (line + 1 < this.starts.length && (this.starts[line + 1] ?? Infinity) <= offset) {
			line++
		}
		return { column: offset - (this.starts[line] ?? 0) + 1, line: line + 1, offset }
	}

	emit(code: RecoveryDiagnosticCode, offset: number, path: readonly number[], args: DiagnosticArgs = {}): void {
		const def = SYNTAX_DIAGNOSTICS[code]
		const { column, line } = this.locate(offset)
		this.diagnostics.push({
			args,
			column,
			def,
			line,
			message: interpolateMessage(def.message, args),
			offset,
			path,
		})
		if (def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	/** Text of a 1-indexed line, without its line break. */
	getSourceLine(line: number): string | undefined {
		const start = this.starts[line - 1]
		if (start === undefined) return undefined
		const end = this.starts[line] ?? this.source.length
		return this.source.slice(start, end).replace(/(?:\r\n|\r|\n)$/, '')
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[FTSYN001]: expected '}'
	 *   --> shapes.src:1:11
	 *    |
	 *  1 | struct S {
	 *    |           ^
	 *    |
	 *    = help: Insert '}' here.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${SEVERITY_LABELS[def.severity]}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
