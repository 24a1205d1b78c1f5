import { describe, it, expect, beforeEach } from "vitest";
import { RuleValidationError, type AlertRule, type RuleStore } from "@coinpulse/core";
import { InMemoryRuleStore } from "@coinpulse/persistence";
import { AlertBook } from "./AlertBook";

const NOW = 1_700_000_000_000;

describe("AlertBook", () => {
	let store: InMemoryRuleStore;
	let book: AlertBook;

	beforeEach(() => {
		store = new InMemoryRuleStore();
		book = new AlertBook(store, { clock: () => NOW });
	});

	describe("create()", () => {
		it("assigns increasing ids and persists before returning", () => {
			const first = book.create({
				userId: "42",
				instrument: "btc",
				direction: "above",
				threshold: 110,
			});
			const second = book.create({
				userId: "42",
				instrument: "ETH",
				direction: "below",
				threshold: 2_000,
			});

			expect(first).toEqual({
				id: 1,
				userId: "42",
				instrument: "BTC",
				direction: "above",
				threshold: 110,
				createdAt: NOW,
				status: "active",
			});
			expect(second.id).toBe(2);
			expect(store.loadAll()).toEqual([first, second]);
		});

		it.each([
			[{ userId: "", instrument: "BTC", direction: "above" as const, threshold: 1 }],
			[{ userId: "1", instrument: " ", direction: "above" as const, threshold: 1 }],
			[{ userId: "1", instrument: "BTC", direction: "above" as const, threshold: 0 }],
			[{ userId: "1", instrument: "BTC", direction: "below" as const, threshold: Number.NaN }],
		])("rejects invalid input %#", (input) => {
			expect(() => book.create(input)).toThrow(RuleValidationError);
			expect(store.loadAll()).toEqual([]);
		});

		it("does not index a rule the store failed to save", () => {
			const failing = new AlertBook(
				{
					save: () => {
						throw new Error("disk full");
					},
					load: () => [],
					loadAll: () => [],
					delete: () => false,
				},
				{ clock: () => NOW }
			);

			expect(() =>
				failing.create({ userId: "1", instrument: "BTC", direction: "above", threshold: 5 })
			).toThrow("disk full");
			expect(failing.list("1")).toEqual([]);
		});
	});

	describe("list()", () => {
		it("returns only the user's rules in id order", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });
			book.create({ userId: "b", instrument: "BTC", direction: "above", threshold: 2 });
			book.create({ userId: "a", instrument: "SOL", direction: "below", threshold: 3 });

			expect(book.list("a").map((rule) => rule.id)).toEqual([1, 3]);
			expect(book.list("c")).toEqual([]);
		});

		it("returns copies", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });
			book.list("a")[0].threshold = 999;

			expect(book.get(1)?.threshold).toBe(1);
		});
	});

	describe("remove()", () => {
		it("lets only the owner remove a rule", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });

			expect(book.remove("b", 1)).toBe(false);
			expect(book.remove("a", 1)).toBe(true);
			expect(book.remove("a", 1)).toBe(false);
			expect(book.list("a")).toEqual([]);
			expect(store.loadAll()).toEqual([]);
		});

		it("removes fired rules too", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });
			book.markFired(1, 2, NOW);

			expect(book.remove("a", 1)).toBe(true);
			expect(book.get(1)).toBeUndefined();
		});
	});

	describe("markFired()", () => {
		it("moves an active rule to fired once", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });

			expect(book.markFired(1, 5, NOW + 1)).toMatchObject({
				status: "fired",
				firedAt: NOW + 1,
				firedPrice: 5,
			});
			expect(book.markFired(1, 6, NOW + 2)).toBeNull();
			expect(store.loadAll()[0]).toMatchObject({ status: "fired", firedPrice: 5 });
			expect(book.activeFor("BTC")).toEqual([]);
		});

		it("keeps the transition when the store write fails", () => {
			let saves = 0;
			const flaky = new AlertBook({
				save: () => {
					saves += 1;
					if (saves > 1) {
						throw new Error("disk full");
					}
				},
				load: () => [],
				loadAll: () => [],
				delete: () => true,
			});
			flaky.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });

			expect(flaky.markFired(1, 5, NOW)?.status).toBe("fired");
			expect(flaky.markFired(1, 5, NOW)).toBeNull();
		});
	});

	describe("unsaved fired transitions", () => {
		const DAY_MS = 24 * 60 * 60 * 1000;
		let backing: InMemoryRuleStore;
		let failSaves: boolean;
		let flaky: AlertBook;

		beforeEach(() => {
			backing = new InMemoryRuleStore();
			failSaves = false;
			const flakyStore: RuleStore = {
				save: (rule) => {
					if (failSaves) {
						throw new Error("disk full");
					}
					backing.save(rule);
				},
				load: (userId) => backing.load(userId),
				loadAll: () => backing.loadAll(),
				delete: (ruleId) => backing.delete(ruleId),
			};
			flaky = new AlertBook(flakyStore, { clock: () => NOW });
			flaky.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });
		});

		it("are saved again by pruneFired once the store recovers", () => {
			failSaves = true;
			flaky.markFired(1, 5, NOW);
			expect(backing.loadAll()[0].status).toBe("active");

			expect(flaky.pruneFired(NOW + 1, DAY_MS)).toEqual([]);
			expect(backing.loadAll()[0].status).toBe("active");

			failSaves = false;
			expect(flaky.pruneFired(NOW + 2, DAY_MS)).toEqual([]);
			expect(backing.loadAll()[0]).toMatchObject({
				status: "fired",
				firedAt: NOW,
				firedPrice: 5,
			});

			const restarted = new AlertBook(backing, { clock: () => NOW });
			restarted.hydrate();
			expect(restarted.activeFor("BTC")).toEqual([]);
		});

		it("are not saved again after the owner removes the rule", () => {
			failSaves = true;
			flaky.markFired(1, 5, NOW);
			failSaves = false;

			expect(flaky.remove("a", 1)).toBe(true);
			flaky.pruneFired(NOW + 1, DAY_MS);

			expect(backing.loadAll()).toEqual([]);
		});
	});

	describe("hydrate()", () => {
		it("restores rules and continues the id sequence", () => {
			const persisted: AlertRule[] = [
				{ id: 4, userId: "a", instrument: "BTC", direction: "above", threshold: 1, createdAt: 0, status: "active" },
				{ id: 9, userId: "b", instrument: "ETH", direction: "below", threshold: 2, createdAt: 0, status: "fired", firedAt: 1, firedPrice: 2 },
			];
			const restored = new AlertBook(new InMemoryRuleStore(persisted), {
				clock: () => NOW,
			});

			expect(restored.hydrate()).toBe(2);
			expect(restored.activeFor("BTC").map((rule) => rule.id)).toEqual([4]);
			expect(restored.list("b")[0].status).toBe("fired");
			expect(
				restored.create({ userId: "a", instrument: "SOL", direction: "above", threshold: 3 }).id
			).toBe(10);
		});
	});

	describe("pruneFired()", () => {
		it("drops fired rules past retention and keeps the rest", () => {
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 1 });
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 2 });
			book.create({ userId: "a", instrument: "BTC", direction: "above", threshold: 3 });
			book.markFired(1, 5, 1_000);
			book.markFired(2, 5, 9_000);

			expect(book.pruneFired(10_000, 5_000)).toEqual([1]);
			expect(book.list("a").map((rule) => rule.id)).toEqual([2, 3]);
			expect(store.loadAll().map((rule) => rule.id)).toEqual([2, 3]);
		});
	});
});
