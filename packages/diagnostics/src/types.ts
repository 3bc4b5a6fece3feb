export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/** Word shown before the code in formatted output, as in `error[FTSYN001]`. */
export const SEVERITY_LABELS: Readonly<Record<DiagnosticSeverity, string>> = Object.freeze({
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Note]: 'note',
	[DiagnosticSeverity.Warning]: 'warning',
})

/**
 * One catalog entry. `message` and `suggestion` are templates whose `{name}`
 * placeholders are filled from {@link DiagnosticArgs}.
 */
export interface DiagnosticDef {
	/** Family prefix plus three digits: FTCORE (contract), FTSYN (recovery), FTCLI */
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	/** Longer explanation for docs and `--help` style output */
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>
