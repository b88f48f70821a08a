import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError } from "@homeserver-loadgen/core";
import * as t from "vitest";
import { DEFAULT_CONFIG, envName, loadConfig, readConfigFile, readEnv, resolveConfig, toSimulationConfig } from "./simulation-config.js";

t.describe("simulation config", () => {
	let dir: string;

	const writeConfig = (name: string, content: string) => {
		const file = path.join(dir, name);
		fs.writeFileSync(file, content);
		return file;
	};

	t.beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "loadgen-config-"));
	});

	t.afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	t.it("should derive environment variable names from keys", () => {
		t.expect(envName("homeserverUrl")).toBe("LOADGEN_HOMESERVER_URL");
		t.expect(envName("totalSteps")).toBe("LOADGEN_TOTAL_STEPS");
	});

	t.it("should fall back to the defaults", () => {
		t.expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
	});

	t.it("should let later layers win", () => {
		const file = writeConfig("sim.json", JSON.stringify({ usersPerStep: 5, totalSteps: 2 }));

		const config = loadConfig({
			configPath: file,
			env: { LOADGEN_USERS_PER_STEP: "7", LOADGEN_RETRY_ENABLED: "true" },
			cli: { totalSteps: "4" },
		});

		t.expect(config.usersPerStep).toBe(7);
		t.expect(config.totalSteps).toBe(4);
		t.expect(config.retryEnabled).toBe(true);
		t.expect(config.friendshipRatio).toBe(DEFAULT_CONFIG.friendshipRatio);
	});

	t.it("should ignore empty environment variables", () => {
		t.expect(readEnv({ LOADGEN_OUTPUT_DIR: "", LOADGEN_TICK_DURATION: "0.5" })).toEqual({ tickDuration: "0.5" });
	});

	t.it("should reject unknown keys in the config file", () => {
		const file = writeConfig("sim.json", JSON.stringify({ usersPerStepp: 5 }));
		t.expect(() => readConfigFile(file)).toThrow('Invalid configuration "usersPerStepp": unknown key in');
	});

	t.it("should fail on a missing file only when it was asked for", () => {
		const missing = path.join(dir, "missing.json");
		t.expect(readConfigFile(missing)).toEqual({});
		t.expect(() => readConfigFile(missing, true)).toThrow(ConfigError);
	});

	t.it("should reject a file that is not a JSON object", () => {
		t.expect(() => readConfigFile(writeConfig("list.json", "[1, 2]"))).toThrow("must contain a JSON object");
		t.expect(() => readConfigFile(writeConfig("broken.json", "{"))).toThrow("cannot parse");
	});

	t.it.each([
		[{ friendshipRatio: "0" }, "friendshipRatio"],
		[{ friendshipRatio: 1.5 }, "friendshipRatio"],
		[{ totalSteps: "2.5" }, "totalSteps"],
		[{ usersPerStep: "ten" }, "usersPerStep"],
		[{ retryEnabled: "maybe" }, "retryEnabled"],
		[{ homeserverUrl: " " }, "homeserverUrl"],
		[{ stepDuration: 1, tickDuration: 2 }, "tickDuration"],
		[{ waitingPeriod: -1 }, "waitingPeriod"],
	])("should reject %o", (layer, key) => {
		const error = (() => {
			try {
				resolveConfig(layer);
			} catch (e) {
				return e;
			}
			return null;
		})();
		t.expect(error).toBeInstanceOf(ConfigError);
		t.expect(error).toMatchObject({ key });
	});

	t.it("should convert durations to milliseconds for the engine", () => {
		const config = resolveConfig({ stepDuration: 2, tickDuration: 0.5, waitingPeriod: 3 });

		t.expect(toSimulationConfig(config, 42)).toMatchObject({
			executionId: 42,
			homeserverUrl: DEFAULT_CONFIG.homeserverUrl,
			stepDurationMs: 2000,
			tickDurationMs: 500,
			waitingPeriodMs: 3000,
		});
	});
});
