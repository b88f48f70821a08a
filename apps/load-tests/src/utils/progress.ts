import type { Simulation, SimulationPhase } from "@homeserver-loadgen/core";
import chalk from "chalk";
import cliProgress from "cli-progress";

const LABELS: Record<SimulationPhase, string | null> = {
	users: "Init users",
	friendships: "Init friendships",
	ticks: "Running ticks",
	teardown: null,
};

/**
 * Create a progress bar for one phase of a step.
 */
export function createPhaseProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label.padEnd(16))} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total}`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: true,
			stopOnComplete: false,
		},
		cliProgress.Presets.shades_classic,
	);
}

export type PhaseBar = Pick<cliProgress.SingleBar, "start" | "update" | "setTotal" | "stop">;

/**
 * Shows a progress bar for every phase the simulation reports progress on.
 * @returns A function detaching the bars again.
 */
export function attachProgressBars(simulation: Simulation, create: (label: string) => PhaseBar = createPhaseProgressBar): () => void {
	let active: { phase: SimulationPhase; bar: PhaseBar } | null = null;

	const stop = () => {
		active?.bar.stop();
		active = null;
	};

	const onProgress = (phase: SimulationPhase, done: number, total: number) => {
		const label = LABELS[phase];
		if (!label) return;
		const current = active;
		if (current && current.phase === phase) {
			current.bar.setTotal(total);
			current.bar.update(done);
			return;
		}
		stop();
		const bar = create(label);
		bar.start(total, done);
		active = { phase, bar };
	};

	const onEnd = (phase: SimulationPhase) => {
		if (active?.phase === phase) stop();
	};

	simulation.on("phase-progress", onProgress);
	simulation.on("phase-end", onEnd);
	return () => {
		simulation.off("phase-progress", onProgress);
		simulation.off("phase-end", onEnd);
		stop();
	};
}
