import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const PACKAGES_DIR = fileURLToPath(new URL("../../../", import.meta.url));

// The engine packages stay free of network clients and of the layers above them
const TARGETS = [
	{ name: "core", forbidden: /from "(ccxt|ws|zod|@coinpulse\/[a-z-]+)"/ },
	{ name: "indicators", forbidden: /from "(ccxt|ws|@coinpulse\/(data|alerts|runtime|persistence))"/ },
	{ name: "alerts", forbidden: /from "(ccxt|ws|@coinpulse\/(data|runtime))"/ },
];

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	let current = stack.pop();
	while (current !== undefined) {
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
		} else if (current.endsWith(".ts") && !current.endsWith(".test.ts")) {
			results.push(current);
		}
		current = stack.pop();
	}
	return results;
};

describe("package import boundaries", () => {
	it("engine packages do not import I/O libraries or upper layers", () => {
		const offenders: string[] = [];
		for (const target of TARGETS) {
			const dir = path.join(PACKAGES_DIR, target.name, "src");
			for (const file of walkFiles(dir)) {
				const content = fs.readFileSync(file, "utf8");
				if (target.forbidden.test(content)) {
					offenders.push(`${target.name}:${path.relative(dir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("workspace manifests only depend on packages below them", () => {
		const manifest = (name: string): Record<string, string> => {
			const raw: unknown = JSON.parse(
				fs.readFileSync(path.join(PACKAGES_DIR, name, "package.json"), "utf8")
			);
			if (typeof raw !== "object" || raw === null || !("dependencies" in raw)) {
				return {};
			}
			const deps = raw.dependencies;
			return typeof deps === "object" && deps !== null
				? Object.fromEntries(Object.entries(deps).map(([key, value]) => [key, String(value)]))
				: {};
		};

		expect(Object.keys(manifest("core")).filter((dep) => dep.startsWith("@coinpulse/"))).toEqual([]);
		expect(Object.keys(manifest("indicators"))).toEqual(["@coinpulse/core"]);
		expect(Object.keys(manifest("alerts"))).toEqual(["@coinpulse/core"]);
	});
});
