import {
	RuleValidationError,
	errorMessage,
	isAlertDirection,
	normalizeInstrument,
	type AlertDirection,
	type AlertRule,
	type RuleStore,
} from "@coinpulse/core";
import { alertsLogger } from "./alertsLogger";

export interface CreateRuleInput {
	userId: string;
	instrument: string;
	direction: AlertDirection;
	threshold: number;
}

export interface AlertBookOptions {
	clock?: () => number;
}

const byId = (a: AlertRule, b: AlertRule): number => a.id - b.id;

/**
 * Owns every alert rule and its lifecycle: active -> fired, and
 * active | fired -> removed (the rule leaves the book).
 *
 * Rules are indexed per instrument so evaluating one instrument never touches
 * another's rules. Callers get copies; only the book mutates its records.
 * Store writes happen before in-memory state changes, so a failed write
 * leaves the book as it was.
 */
export class AlertBook {
	private readonly clock: () => number;
	private readonly byRuleId = new Map<number, AlertRule>();
	private readonly byInstrument = new Map<string, Map<number, AlertRule>>();
	// fired rules whose store write failed
	private readonly unsaved = new Set<number>();
	private nextId = 1;

	constructor(
		private readonly store: RuleStore,
		options: AlertBookOptions = {}
	) {
		this.clock = options.clock ?? Date.now;
	}

	/** Loads persisted rules; returns how many were restored. */
	hydrate(): number {
		let restored = 0;
		for (const rule of this.store.loadAll()) {
			this.nextId = Math.max(this.nextId, rule.id + 1);
			if (rule.status === "removed") {
				continue;
			}
			this.index({ ...rule });
			restored += 1;
		}
		alertsLogger.info("alert_book_hydrated", {
			restored,
			nextId: this.nextId,
		});
		return restored;
	}

	create(input: CreateRuleInput): AlertRule {
		const userId = input.userId.trim();
		const instrument = normalizeInstrument(input.instrument);
		if (!userId) {
			throw new RuleValidationError("userId must not be empty");
		}
		if (!instrument) {
			throw new RuleValidationError("instrument must not be empty");
		}
		if (!isAlertDirection(input.direction)) {
			throw new RuleValidationError(
				`direction must be "above" or "below" (got "${input.direction}")`
			);
		}
		if (!Number.isFinite(input.threshold) || input.threshold <= 0) {
			throw new RuleValidationError(
				`threshold must be a positive number (got ${input.threshold})`
			);
		}

		const rule: AlertRule = {
			id: this.nextId,
			userId,
			instrument,
			direction: input.direction,
			threshold: input.threshold,
			createdAt: this.clock(),
			status: "active",
		};

		this.store.save({ ...rule });
		this.nextId += 1;
		this.index(rule);

		alertsLogger.info("alert_rule_created", {
			ruleId: rule.id,
			userId,
			instrument,
			direction: rule.direction,
			threshold: rule.threshold,
		});
		return { ...rule };
	}

	list(userId: string): AlertRule[] {
		return Array.from(this.byRuleId.values())
			.filter((rule) => rule.userId === userId)
			.sort(byId)
			.map((rule) => ({ ...rule }));
	}

	get(ruleId: number): AlertRule | undefined {
		const rule = this.byRuleId.get(ruleId);
		return rule ? { ...rule } : undefined;
	}

	/** Only the owner may remove a rule. */
	remove(userId: string, ruleId: number): boolean {
		const rule = this.byRuleId.get(ruleId);
		if (!rule || rule.userId !== userId) {
			return false;
		}

		this.store.delete(ruleId);
		this.unsaved.delete(ruleId);
		rule.status = "removed";
		this.unindex(rule);

		alertsLogger.info("alert_rule_removed", {
			ruleId,
			userId,
			instrument: rule.instrument,
		});
		return true;
	}

	/** Active rules for one instrument, ascending id. */
	activeFor(instrument: string): AlertRule[] {
		const rules = this.byInstrument.get(normalizeInstrument(instrument));
		if (!rules) {
			return [];
		}
		return Array.from(rules.values())
			.filter((rule) => rule.status === "active")
			.sort(byId)
			.map((rule) => ({ ...rule }));
	}

	/**
	 * active -> fired. Returns the fired rule, or null when the rule is gone or
	 * no longer active. The in-memory transition always sticks so a rule cannot
	 * fire twice; a failed store write is logged and retried by pruneFired.
	 */
	markFired(ruleId: number, price: number, at: number): AlertRule | null {
		const rule = this.byRuleId.get(ruleId);
		if (!rule || rule.status !== "active") {
			return null;
		}

		rule.status = "fired";
		rule.firedAt = at;
		rule.firedPrice = price;

		if (!this.persistFired(rule)) {
			this.unsaved.add(ruleId);
		}
		return { ...rule };
	}

	/**
	 * Drops fired rules whose firing is older than `retentionMs`, after
	 * retrying any fired transition the store failed to record.
	 * Returns the ids that were pruned.
	 */
	pruneFired(now: number, retentionMs: number): number[] {
		for (const ruleId of Array.from(this.unsaved)) {
			const rule = this.byRuleId.get(ruleId);
			if (!rule || rule.status !== "fired" || this.persistFired(rule)) {
				this.unsaved.delete(ruleId);
			}
		}

		const pruned: number[] = [];
		for (const rule of Array.from(this.byRuleId.values()).sort(byId)) {
			if (rule.status !== "fired" || rule.firedAt === undefined) {
				continue;
			}
			if (now - rule.firedAt < retentionMs) {
				continue;
			}
			try {
				this.store.delete(rule.id);
			} catch (error) {
				alertsLogger.error("alert_rule_prune_failed", {
					ruleId: rule.id,
					message: errorMessage(error),
				});
				continue;
			}
			rule.status = "removed";
			this.unsaved.delete(rule.id);
			this.unindex(rule);
			pruned.push(rule.id);
		}
		if (pruned.length) {
			alertsLogger.info("alert_rules_pruned", { ruleIds: pruned });
		}
		return pruned;
	}

	private persistFired(rule: AlertRule): boolean {
		try {
			this.store.save({ ...rule });
			return true;
		} catch (error) {
			alertsLogger.error("alert_rule_persist_failed", {
				ruleId: rule.id,
				instrument: rule.instrument,
				message: errorMessage(error),
			});
			return false;
		}
	}

	private index(rule: AlertRule): void {
		this.byRuleId.set(rule.id, rule);
		let rules = this.byInstrument.get(rule.instrument);
		if (!rules) {
			rules = new Map();
			this.byInstrument.set(rule.instrument, rules);
		}
		rules.set(rule.id, rule);
	}

	private unindex(rule: AlertRule): void {
		this.byRuleId.delete(rule.id);
		const rules = this.byInstrument.get(rule.instrument);
		if (!rules) {
			return;
		}
		rules.delete(rule.id);
		if (rules.size === 0) {
			this.byInstrument.delete(rule.instrument);
		}
	}
}
