// CHANGE: Expected QEMU panels shared by message and app tests

export const QEMU_PANEL: readonly string[] = [
	"╭───────────────────────────────────────────────────────────────────────────╮",
	"│ Press 'Ctrl-a' followed by 'x' to end the simulation.                     │",
	"│ QEMU is now controlling this terminal window until the simulation ends... │",
	"╰───────────────────────────────────────────────────────────────────────────╯",
];

/** Panel for container "0123456789abcdef". */
export const QEMU_DEBUG_PANEL: readonly string[] = [
	"╭───────────────────────────────────────────────────────────────────────────╮",
	"│ Simulation is paused waiting for debugger.                                │",
	"│ Run this command in another window to attach the debugger:                │",
	"│               ╭───────────────────────────────────────────╮               │",
	"│               │ $ metalbox project debug 0123456789abcdef │               │",
	"│               ╰───────────────────────────────────────────╯               │",
	"│ Press 'Ctrl-a' followed by 'x' to end the simulation.                     │",
	"│ QEMU is now controlling this terminal window until the simulation ends... │",
	"╰───────────────────────────────────────────────────────────────────────────╯",
];
