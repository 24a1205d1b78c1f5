import { describe, it, expect, vi, afterEach } from "vitest";
import { withTimeout } from "./timeout";
import { TimeoutError } from "../errors";

describe("withTimeout", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves with the task value when it settles in time", async () => {
		await expect(withTimeout(Promise.resolve(42), 1_000, "task")).resolves.toBe(
			42
		);
	});

	it("rejects with TimeoutError when the task is too slow", async () => {
		vi.useFakeTimers();
		const never = new Promise<number>(() => undefined);
		const pending = withTimeout(never, 500, "fetch BTC");
		const assertion = expect(pending).rejects.toThrow(
			"fetch BTC timed out after 500ms"
		);

		await vi.advanceTimersByTimeAsync(500);
		await assertion;
		await expect(pending).rejects.toBeInstanceOf(TimeoutError);
	});

	it("passes the task through when no timeout is set", async () => {
		const task = Promise.resolve("ok");
		expect(withTimeout(task, 0, "task")).toBe(task);
	});
});
