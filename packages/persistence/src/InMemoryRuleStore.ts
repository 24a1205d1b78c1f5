import type { AlertRule, RuleStore } from "@coinpulse/core";

const byId = (a: AlertRule, b: AlertRule): number => a.id - b.id;

export class InMemoryRuleStore implements RuleStore {
	private readonly rules = new Map<number, AlertRule>();

	constructor(initial: AlertRule[] = []) {
		initial.forEach((rule) => this.rules.set(rule.id, { ...rule }));
	}

	save(rule: AlertRule): void {
		this.rules.set(rule.id, { ...rule });
	}

	load(userId: string): AlertRule[] {
		return this.loadAll().filter((rule) => rule.userId === userId);
	}

	loadAll(): AlertRule[] {
		return Array.from(this.rules.values(), (rule) => ({ ...rule })).sort(byId);
	}

	delete(ruleId: number): boolean {
		return this.rules.delete(ruleId);
	}
}
