import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, type SimulationConfig } from "@homeserver-loadgen/core";
import { config as loadDotenv } from "dotenv";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load .env file from the load-tests directory
loadDotenv({ path: path.resolve(__dirname, "../../.env") });

/** Default location of the JSON config file. */
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, "../../config/simulation.json");

/**
 * Everything a run can be configured with. Durations are in seconds.
 */
export interface LoadgenConfig {
	/** Homeserver under test; `memory://<name>` runs against an in-process server. */
	homeserverUrl: string;
	outputDir: string;
	/** JSON file keeping the user counters of every execution. */
	usersFile: string;
	totalSteps: number;
	usersPerStep: number;
	friendshipRatio: number;
	stepDuration: number;
	tickDuration: number;
	maxUsersPerTick: number;
	waitingPeriod: number;
	retryEnabled: boolean;
	userCreationRetryAttempts: number;
	userCreationThroughput: number;
	roomCreationThroughput: number;
}

/** One configuration source; values may still be strings. */
export type ConfigLayer = Partial<Record<keyof LoadgenConfig, unknown>>;

export const DEFAULT_CONFIG: LoadgenConfig = {
	homeserverUrl: "http://localhost:8008",
	outputDir: "output",
	usersFile: "users.json",
	totalSteps: 3,
	usersPerStep: 10,
	friendshipRatio: 0.5,
	stepDuration: 60,
	tickDuration: 1,
	maxUsersPerTick: 10,
	waitingPeriod: 30,
	retryEnabled: false,
	userCreationRetryAttempts: 3,
	userCreationThroughput: 10,
	roomCreationThroughput: 10,
};

const KEYS = Object.keys(DEFAULT_CONFIG).filter(isConfigKey);

function isConfigKey(key: string): key is keyof LoadgenConfig {
	return key in DEFAULT_CONFIG;
}

/**
 * `homeserverUrl` is read from `LOADGEN_HOMESERVER_URL`, and so on for every key.
 */
export function envName(key: keyof LoadgenConfig): string {
	return `LOADGEN_${key.replace(/[A-Z]/g, (letter) => `_${letter}`).toUpperCase()}`;
}

/**
 * Reads a JSON config file. A missing file is an empty layer unless `required`.
 */
export function readConfigFile(file: string, required = false): ConfigLayer {
	if (!fs.existsSync(file)) {
		if (required) throw new ConfigError("config", `file not found: ${file}`);
		return {};
	}

	let data: unknown;
	try {
		data = JSON.parse(fs.readFileSync(file, "utf-8"));
	} catch (error) {
		throw new ConfigError("config", `cannot parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
	}
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new ConfigError("config", `${file} must contain a JSON object`);
	}

	const entries: Record<string, unknown> = { ...data };
	const layer: ConfigLayer = {};
	for (const [key, value] of Object.entries(entries)) {
		if (!isConfigKey(key)) throw new ConfigError(key, `unknown key in ${file}`);
		layer[key] = value;
	}
	return layer;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
	const layer: ConfigLayer = {};
	for (const key of KEYS) {
		const value = env[envName(key)];
		if (value !== undefined && value !== "") layer[key] = value;
	}
	return layer;
}

/**
 * Merges layers over the defaults (later layers win) and validates the result.
 * @throws ConfigError naming the first invalid key.
 */
export function resolveConfig(...layers: ConfigLayer[]): LoadgenConfig {
	const merged: ConfigLayer = { ...DEFAULT_CONFIG };
	for (const layer of layers) {
		for (const key of KEYS) {
			if (layer[key] !== undefined) merged[key] = layer[key];
		}
	}

	const config: LoadgenConfig = {
		homeserverUrl: toText("homeserverUrl", merged.homeserverUrl),
		outputDir: toText("outputDir", merged.outputDir),
		usersFile: toText("usersFile", merged.usersFile),
		totalSteps: toInteger("totalSteps", merged.totalSteps, 1),
		usersPerStep: toInteger("usersPerStep", merged.usersPerStep, 1),
		friendshipRatio: toNumber("friendshipRatio", merged.friendshipRatio),
		stepDuration: toNumber("stepDuration", merged.stepDuration),
		tickDuration: toNumber("tickDuration", merged.tickDuration),
		maxUsersPerTick: toInteger("maxUsersPerTick", merged.maxUsersPerTick, 1),
		waitingPeriod: toNumber("waitingPeriod", merged.waitingPeriod),
		retryEnabled: toBoolean("retryEnabled", merged.retryEnabled),
		userCreationRetryAttempts: toInteger("userCreationRetryAttempts", merged.userCreationRetryAttempts, 1),
		userCreationThroughput: toInteger("userCreationThroughput", merged.userCreationThroughput, 1),
		roomCreationThroughput: toInteger("roomCreationThroughput", merged.roomCreationThroughput, 1),
	};

	if (!(config.friendshipRatio > 0 && config.friendshipRatio <= 1)) {
		throw new ConfigError("friendshipRatio", `must be in (0, 1], got ${config.friendshipRatio}`);
	}
	if (!(config.stepDuration > 0)) throw new ConfigError("stepDuration", "must be positive");
	if (!(config.tickDuration > 0)) throw new ConfigError("tickDuration", "must be positive");
	if (config.tickDuration > config.stepDuration) {
		throw new ConfigError("tickDuration", `must not exceed stepDuration (${config.stepDuration}s)`);
	}
	if (config.waitingPeriod < 0) throw new ConfigError("waitingPeriod", "must not be negative");

	return config;
}

/**
 * Loads the configuration of a run: defaults, then the config file, then
 * `LOADGEN_*` environment variables, then command-line options.
 */
export function loadConfig(options: { configPath?: string; cli?: ConfigLayer; env?: NodeJS.ProcessEnv } = {}): LoadgenConfig {
	const file = options.configPath
		? readConfigFile(path.resolve(options.configPath), true)
		: readConfigFile(DEFAULT_CONFIG_PATH);
	return resolveConfig(file, readEnv(options.env), options.cli ?? {});
}

/**
 * The engine's view of a run, with durations in milliseconds.
 */
export function toSimulationConfig(config: LoadgenConfig, executionId: number, homeserverUrl = config.homeserverUrl): SimulationConfig {
	return {
		executionId,
		homeserverUrl,
		totalSteps: config.totalSteps,
		usersPerStep: config.usersPerStep,
		friendshipRatio: config.friendshipRatio,
		stepDurationMs: config.stepDuration * 1000,
		tickDurationMs: config.tickDuration * 1000,
		maxUsersPerTick: config.maxUsersPerTick,
		waitingPeriodMs: config.waitingPeriod * 1000,
		userCreationRetryAttempts: config.userCreationRetryAttempts,
		userCreationThroughput: config.userCreationThroughput,
		roomCreationThroughput: config.roomCreationThroughput,
	};
}

function toText(key: keyof LoadgenConfig, value: unknown): string {
	if (typeof value !== "string" || value.trim() === "") throw new ConfigError(key, "must be a non-empty string");
	return value.trim();
}

function toNumber(key: keyof LoadgenConfig, value: unknown): number {
	const parsed = typeof value === "string" ? Number(value.trim()) : value;
	if (typeof parsed !== "number" || !Number.isFinite(parsed) || (typeof value === "string" && value.trim() === "")) {
		throw new ConfigError(key, `must be a number, got ${JSON.stringify(value)}`);
	}
	return parsed;
}

function toInteger(key: keyof LoadgenConfig, value: unknown, min: number): number {
	const parsed = toNumber(key, value);
	if (!Number.isInteger(parsed) || parsed < min) throw new ConfigError(key, `must be an integer >= ${min}, got ${parsed}`);
	return parsed;
}

function toBoolean(key: keyof LoadgenConfig, value: unknown): boolean {
	if (typeof value === "boolean") return value;
	if (typeof value === "string") {
		const normalized = value.trim().toLowerCase();
		if (normalized === "true" || normalized === "1") return true;
		if (normalized === "false" || normalized === "0") return false;
	}
	throw new ConfigError(key, `must be true or false, got ${JSON.stringify(value)}`);
}
