// CHANGE: Text shown when handing the terminal to QEMU
// PURITY: CORE
// INVARIANT: The quit hint is always the last paragraph
// COMPLEXITY: O(1)

import { PROGRAM_NAME } from "../cli/spec.js";
import { centerBlock, renderPanel } from "../format/panel.js";

const QUIT_HINT = [
	"Press 'Ctrl-a' followed by 'x' to end the simulation.",
	"QEMU is now controlling this terminal window until the simulation ends...",
];

export const debugCommandFor = (containerId: string): string =>
	`$ ${PROGRAM_NAME} project debug ${containerId}`;

/**
 * Panel printed before QEMU takes over the terminal.
 *
 * @param containerId - set when QEMU waits for a debugger in that container
 */
export function qemuHelpPanel(containerId?: string): readonly string[] {
	const body: string[] = [];
	if (containerId !== undefined) {
		const waiting = [
			"Simulation is paused waiting for debugger.",
			"Run this command in another window to attach the debugger:",
		];
		const inner = renderPanel([debugCommandFor(containerId)]);
		const width = Math.max(...waiting.map((line) => line.length), ...QUIT_HINT.map((line) => line.length));
		body.push(...waiting, ...centerBlock(inner, width));
	}
	body.push(...QUIT_HINT);
	return renderPanel(body);
}
