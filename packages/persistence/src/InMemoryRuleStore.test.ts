import { describe, it, expect } from "vitest";
import type { AlertRule } from "@coinpulse/core";
import { InMemoryRuleStore } from "./InMemoryRuleStore";

const rule = (id: number, userId: string): AlertRule => ({
	id,
	userId,
	instrument: "ETH",
	direction: "below",
	threshold: 2_500,
	createdAt: 0,
	status: "active",
});

describe("InMemoryRuleStore", () => {
	it("keys rules by id and filters by user", () => {
		const store = new InMemoryRuleStore([rule(3, "a"), rule(1, "b")]);
		store.save(rule(2, "a"));

		expect(store.loadAll().map((r) => r.id)).toEqual([1, 2, 3]);
		expect(store.load("a").map((r) => r.id)).toEqual([2, 3]);
	});

	it("returns copies that do not alias stored rules", () => {
		const store = new InMemoryRuleStore([rule(1, "a")]);
		const [loaded] = store.loadAll();
		loaded.status = "removed";

		expect(store.loadAll()[0].status).toBe("active");
	});

	it("reports whether a delete removed anything", () => {
		const store = new InMemoryRuleStore([rule(1, "a")]);

		expect(store.delete(1)).toBe(true);
		expect(store.delete(1)).toBe(false);
	});
});
