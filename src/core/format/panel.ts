// CHANGE: Boxed panels for terminal messages
// PURITY: CORE
// INVARIANT: Every returned line of a panel has the same length
// COMPLEXITY: O(n) where n = total characters

/**
 * Draw a rounded box that fits its content.
 *
 * @example
 * ```ts
 * renderPanel(["hi"]);
 * // ["╭────╮", "│ hi │", "╰────╯"]
 * ```
 */
export function renderPanel(lines: readonly string[]): readonly string[] {
	const width = lines.reduce((max, line) => Math.max(max, line.length), 0);
	return [
		`╭${"─".repeat(width + 2)}╮`,
		...lines.map((line) => `│ ${line.padEnd(width)} │`),
		`╰${"─".repeat(width + 2)}╯`,
	];
}

/**
 * Centre text in a field, putting the odd leftover space on the right.
 * Text wider than the field is truncated.
 */
export function center(text: string, width: number): string {
	if (text.length >= width) return text.slice(0, width);
	const left = Math.floor((width - text.length) / 2);
	return `${" ".repeat(left)}${text}${" ".repeat(width - text.length - left)}`;
}

/**
 * Centre each line within the width of the widest of `lines` and `width`.
 */
export function centerBlock(
	lines: readonly string[],
	width: number,
): readonly string[] {
	return lines.map((line) => center(line, Math.max(width, line.length)));
}
