import * as t from "vitest";
import { createLogger } from "./logger.js";

const stripAnsi = (text: unknown) => String(text).replace(/\u001b\[[0-9;]*m/g, "");

t.describe("createLogger", () => {
	t.afterEach(() => {
		t.vi.restoreAllMocks();
	});

	t.it("should prefix lines with the tag", () => {
		const log = t.vi.spyOn(console, "log").mockImplementation(() => {});
		const error = t.vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = createLogger("simulation");

		logger.info("step 1 starting");
		logger.warn("slow");
		logger.error("broken");

		t.expect(log.mock.calls.map(([line]) => stripAnsi(line))).toEqual(["[simulation] step 1 starting", "[simulation] slow"]);
		t.expect(stripAnsi(error.mock.calls[0]?.[0])).toBe("[simulation] broken");
	});

	t.it("should print debug lines only when verbose", () => {
		const log = t.vi.spyOn(console, "log").mockImplementation(() => {});

		createLogger("quiet").debug("hidden");
		createLogger("loud", { verbose: true }).debug("shown");

		t.expect(log.mock.calls.map(([line]) => stripAnsi(line))).toEqual(["[loud] shown"]);
	});
});
