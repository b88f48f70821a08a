#!/usr/bin/env node
import {
	type ChatClientFactory,
	ConfigError,
	InMemoryHomeserver,
	Simulation,
	SimulationError,
	UsersStore,
} from "@homeserver-loadgen/core";
import chalk from "chalk";
import { Command } from "commander";
import { getHomeserverUrl, MatrixHttpClient } from "../client/matrix-client.js";
import { type ConfigLayer, type LoadgenConfig, loadConfig, toSimulationConfig } from "../config/simulation-config.js";
import { printStepReport } from "../output/formatter.js";
import { getUploader } from "../output/uploader.js";
import { FileKVStore } from "../utils/kvstore.js";
import { createLogger } from "../utils/logger.js";
import { attachProgressBars } from "../utils/progress.js";

const MEMORY_PREFIX = "memory://";

interface CliOptions {
	config?: string;
	homeserver?: string;
	outputDir?: string;
	usersFile?: string;
	steps?: string;
	usersPerStep?: string;
	friendshipRatio?: string;
	stepDuration?: string;
	tickDuration?: string;
	maxUsersPerTick?: string;
	waitingPeriod?: string;
	retry?: boolean;
	userCreationRetryAttempts?: string;
	userCreationThroughput?: string;
	roomCreationThroughput?: string;
	verbose?: boolean;
}

/** Command-line options as the topmost config layer. */
function toConfigLayer(cli: CliOptions): ConfigLayer {
	return {
		homeserverUrl: cli.homeserver,
		outputDir: cli.outputDir,
		usersFile: cli.usersFile,
		totalSteps: cli.steps,
		usersPerStep: cli.usersPerStep,
		friendshipRatio: cli.friendshipRatio,
		stepDuration: cli.stepDuration,
		tickDuration: cli.tickDuration,
		maxUsersPerTick: cli.maxUsersPerTick,
		waitingPeriod: cli.waitingPeriod,
		retryEnabled: cli.retry,
		userCreationRetryAttempts: cli.userCreationRetryAttempts,
		userCreationThroughput: cli.userCreationThroughput,
		roomCreationThroughput: cli.roomCreationThroughput,
	};
}

/**
 * The homeserver a run talks to: an in-process one for `memory://name`, HTTP otherwise.
 */
function connect(config: LoadgenConfig, verbose: boolean): { url: string; createClient: ChatClientFactory } {
	if (config.homeserverUrl.startsWith(MEMORY_PREFIX)) {
		const server = new InMemoryHomeserver({ serverName: config.homeserverUrl.slice(MEMORY_PREFIX.length) || "localhost" });
		return { url: config.homeserverUrl, createClient: () => server.createClient() };
	}

	const { url } = getHomeserverUrl(config.homeserverUrl);
	const logger = createLogger("client", { verbose });
	return {
		url,
		createClient: () => new MatrixHttpClient({ homeserver: config.homeserverUrl, retryEnabled: config.retryEnabled, logger }),
	};
}

function printConfiguration(config: LoadgenConfig, url: string, executionId: number): void {
	console.log(chalk.bold.blue("╔══════════════════════════════════════╗"));
	console.log(chalk.bold.blue("║       HOMESERVER LOAD GENERATOR      ║"));
	console.log(chalk.bold.blue("╚══════════════════════════════════════╝"));
	console.log("");
	console.log(chalk.bold("Configuration:"));
	console.log(`  Homeserver:  ${chalk.dim(url)}`);
	console.log(`  Execution:   ${chalk.cyan(executionId)}`);
	console.log(`  Steps:       ${chalk.bold(config.totalSteps)} × ${config.usersPerStep} users`);
	console.log(`  Friendships: ${config.friendshipRatio * 100}% of all pairs`);
	console.log(`  Step:        ${config.stepDuration}s in ${config.tickDuration}s ticks, ≤ ${config.maxUsersPerTick} users per tick`);
	console.log(`  Waiting:     ${config.waitingPeriod}s`);
	console.log(`  Retries:     ${config.retryEnabled ? chalk.green("enabled") : chalk.dim("disabled")}`);
	console.log(`  Output:      ${chalk.dim(config.outputDir)}`);
	console.log("");
}

async function run(cli: CliOptions): Promise<void> {
	const verbose = cli.verbose ?? false;
	const config = loadConfig({ configPath: cli.config, cli: toConfigLayer(cli) });
	const executionId = Date.now();
	const { url, createClient } = connect(config, verbose);
	const logger = createLogger("simulation", { verbose });

	printConfiguration(config, url, executionId);

	const usersStore = new UsersStore(new FileKVStore(config.usersFile, createLogger("users", { verbose })));
	try {
		const previous = await usersStore.totalUsers(url);
		if (previous > 0) logger.info(`${previous} user(s) created on this homeserver by earlier executions`);
	} catch (error) {
		logger.warn(`Could not read the user counters: ${String(error)}`);
	}

	const simulation = new Simulation(toSimulationConfig(config, executionId, url), {
		createClient,
		sink: getUploader(config.outputDir),
		usersStore,
		logger,
	});
	attachProgressBars(simulation);
	simulation.on("step-report", (report, location) => {
		console.log("");
		printStepReport(report);
		if (location) console.log(chalk.dim(`Report written to ${location}`));
		console.log("");
	});

	const controller = new AbortController();
	process.on("SIGINT", () => {
		if (controller.signal.aborted) {
			console.log(chalk.red("[simulation] Forced exit"));
			process.exit(130);
		}
		console.log(chalk.yellow("\n[simulation] Stopping after the current tick, press Ctrl+C again to exit"));
		controller.abort();
	});

	const reports = await simulation.run(controller.signal);
	console.log(chalk.green(`✓ Done, ${reports.length}/${config.totalSteps} step(s) completed`));
}

const program = new Command();

program.name("loadgen").description("Simulate chat users against a Matrix homeserver").version("0.1.0");

program
	.command("run", { isDefault: true })
	.description("Run the stepped simulation")
	.option("-c, --config <path>", "JSON config file (defaults to config/simulation.json)")
	.option("--homeserver <url>", "Homeserver URL, or memory://<name> for an in-process server")
	.option("--output-dir <path>", "Directory receiving the step reports")
	.option("--users-file <path>", "JSON file keeping user counters across executions")
	.option("--steps <number>", "Number of steps")
	.option("--users-per-step <number>", "Users added each step")
	.option("--friendship-ratio <ratio>", "Share of all user pairs that are friends, in (0, 1]")
	.option("--step-duration <seconds>", "Duration of each step")
	.option("--tick-duration <seconds>", "Duration of each tick, also the per-task deadline")
	.option("--max-users-per-tick <number>", "Users acting in one tick at most")
	.option("--waiting-period <seconds>", "Longest wait for in-flight messages after a step")
	.option("--retry", "Retry transient HTTP failures")
	.option("--no-retry", "Make a single attempt per request")
	.option("--user-creation-retry-attempts <number>", "Attempts to bring up each user")
	.option("--user-creation-throughput <number>", "Users brought up concurrently")
	.option("--room-creation-throughput <number>", "Friendships connected concurrently")
	.option("--verbose", "Print debug output")
	.action(run);

try {
	await program.parseAsync();
	process.exit(0);
} catch (error) {
	if (error instanceof ConfigError) {
		console.error(chalk.red(`[config] ${error.message}`));
	} else if (error instanceof SimulationError) {
		console.error(chalk.red(`[simulation] ${error.code}: ${error.message}`));
	} else {
		console.error(chalk.red(`[simulation] ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`));
	}
	process.exit(1);
}
