/**
 * Per-column classification, decided once on the first data row.
 */

/** Marks a column whose single cell is a pre-encoded uncertain value */
export const UX_MARKER = "Ux";

/**
 * Where a column's distribution comes from:
 * - "ux": the first data cell, decoded as one pre-encoded value
 * - "samples": every numeric cell, fitted into an empirical distribution
 */
export type ColumnSource = "ux" | "samples";

/**
 * Classify one column from its header cell and its first data cell.
 */
export function classifyColumn(headerCell: string, firstDataCell: string): ColumnSource {
	return headerCell.includes(UX_MARKER) || firstDataCell.includes(UX_MARKER)
		? "ux"
		: "samples";
}

/**
 * Classify every column. Both arrays hold one cell per expected column.
 */
export function classifyColumns(
	headerCells: readonly string[],
	firstRowCells: readonly string[],
): ColumnSource[] {
	return headerCells.map((headerCell, column) =>
		classifyColumn(headerCell, firstRowCells[column] ?? ""),
	);
}
