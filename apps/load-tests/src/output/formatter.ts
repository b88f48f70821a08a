import { ALL_ACTION_KINDS, type LatencyStats, type StepReport } from "@homeserver-loadgen/core";
import chalk from "chalk";

/**
 * Format latency stats as a compact string.
 */
function formatLatency(stats: LatencyStats): string {
	const p99Color = stats.p99 <= 100 ? chalk.green : stats.p99 <= 400 ? chalk.yellow : chalk.red;
	return `min=${stats.min}ms, avg=${stats.avg}ms, p50=${stats.p50}ms, p95=${stats.p95}ms, p99=${p99Color(stats.p99 + "ms")}, max=${stats.max}ms`;
}

function rateColor(rate: number): (text: string) => string {
	return rate >= 99 ? chalk.green : rate >= 95 ? chalk.yellow : chalk.red;
}

/**
 * Lines summarizing one step, ready to print.
 */
export function formatStepReport(report: StepReport): string[] {
	const { ticks, metrics } = report;
	const lines: string[] = [];

	lines.push(chalk.gray("─────────────────────────────────────"));
	lines.push(chalk.bold(`         STEP ${report.step} SUMMARY`));
	lines.push(chalk.gray("─────────────────────────────────────"));
	lines.push(`Users:       ${report.stepUsers}`);
	lines.push(`Friendships: ${report.stepFriendships}`);
	lines.push(
		`Ticks:       ${ticks.ticks} (${chalk.green("✓")} ${ticks.completed} ${chalk.yellow("⏱")} ${ticks.timedOut} ${chalk.gray("↷")} ${ticks.skipped} ${chalk.red("✗")} ${ticks.failed})`,
	);

	lines.push("");
	lines.push(chalk.bold("Requests:"));
	for (const action of ALL_ACTION_KINDS) {
		const stats = metrics.actions[action];
		if (!stats) continue;
		const successRate = stats.requests > 0 ? ((stats.requests - stats.errors) / stats.requests) * 100 : 0;
		lines.push(
			`  ${action.padEnd(14)} ${stats.requests} (${rateColor(successRate)(successRate.toFixed(1) + "%")} ok)${stats.latency ? `  ${formatLatency(stats.latency)}` : ""}`,
		);
		for (const sample of stats.errorSamples) {
			lines.push(chalk.red(`    ${sample.count}× ${sample.message}`));
		}
	}

	const { messages } = metrics;
	const deliveryRate = messages.sent > 0 ? ((messages.sent - messages.pending) / messages.sent) * 100 : 100;
	lines.push("");
	lines.push(chalk.bold("Messages:"));
	lines.push(`  Delivery:  ${messages.sent - messages.pending}/${messages.sent} (${rateColor(deliveryRate)(deliveryRate.toFixed(1) + "%")})`);
	if (messages.pending > 0) lines.push(chalk.red(`  Pending:   ${messages.pending}`));
	if (messages.orphaned > 0) lines.push(chalk.yellow(`  Orphaned:  ${messages.orphaned}`));

	return lines;
}

/**
 * Print a step report summary to console.
 */
export function printStepReport(report: StepReport): void {
	for (const line of formatStepReport(report)) console.log(line);
}
