import type { OutputFormat } from '../types.js'

export type Cell = string | number | boolean | undefined | null

function text(v: Cell): string {
	return v == null ? '' : String(v)
}

// Tabs and newlines would break a TSV row; pipes would split a markdown cell
function plainCell(v: Cell): string {
	return text(v).replace(/[\t\n]+/g, ' ')
}

function markdownCell(v: Cell): string {
	return plainCell(v).replace(/\|/g, '\\|')
}

export function formatTable(
	headers: readonly string[],
	rows: readonly (readonly Cell[])[],
	format: OutputFormat,
): string {
	if (format === 'json') {
		const objects = rows.map((row) =>
			Object.fromEntries(headers.map((h, i) => [h, row[i] ?? null])),
		)
		return JSON.stringify(objects, null, 2)
	}

	if (format === 'plain') {
		return [headers.join('\t'), ...rows.map((row) => row.map(plainCell).join('\t'))].join('\n')
	}

	const cells = rows.map((row) => headers.map((_, i) => markdownCell(row[i])))
	const widths = headers.map((h, i) =>
		cells.reduce((max, row) => Math.max(max, row[i].length), h.length),
	)
	const line = (values: readonly string[]) =>
		`| ${values.map((v, i) => v.padEnd(widths[i])).join(' | ')} |`

	return [line(headers), line(widths.map((w) => '-'.repeat(w))), ...cells.map(line)].join('\n')
}

export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(data, null, 2)
	}

	const entries = Object.entries(data).filter(([, v]) => v != null)
	if (format === 'plain') {
		return entries.map(([k, v]) => `${k}\t${plainCell(v)}`).join('\n')
	}

	const keyWidth = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(keyWidth)}**: ${text(v)}`).join('\n')
}

/** Compact magnitude: 1.50B, 2.30M, 45.00K. */
export function formatNumber(n: number, decimals = 2): string {
	const abs = Math.abs(n)
	if (abs >= 1e12) return `${(n / 1e12).toFixed(decimals)}T`
	if (abs >= 1e9) return `${(n / 1e9).toFixed(decimals)}B`
	if (abs >= 1e6) return `${(n / 1e6).toFixed(decimals)}M`
	if (abs >= 1e3) return `${(n / 1e3).toFixed(decimals)}K`
	return n.toFixed(decimals)
}

export function formatCurrency(n: number, currency = 'USD'): string {
	return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n)
}
