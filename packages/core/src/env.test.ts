import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadEnvFiles } from "./env";

describe("loadEnvFiles", () => {
	const dirs: string[] = [];

	afterEach(() => {
		delete process.env.COINPULSE_TEST_VALUE;
		for (const dir of dirs.splice(0)) {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});

	it("applies .env then .env.local and reports the files it read", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "coinpulse-env-"));
		dirs.push(dir);
		fs.writeFileSync(path.join(dir, ".env"), "COINPULSE_TEST_VALUE=base\n");
		fs.writeFileSync(path.join(dir, ".env.local"), "COINPULSE_TEST_VALUE=local\n");

		expect(loadEnvFiles(dir)).toEqual([
			path.join(dir, ".env"),
			path.join(dir, ".env.local"),
		]);
		expect(process.env.COINPULSE_TEST_VALUE).toBe("local");
		expect(loadEnvFiles(dir)).toEqual([]);
	});

	it("skips missing files", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "coinpulse-env-"));
		dirs.push(dir);

		expect(loadEnvFiles(dir)).toEqual([]);
		expect(process.env.COINPULSE_TEST_VALUE).toBeUndefined();
	});
});
