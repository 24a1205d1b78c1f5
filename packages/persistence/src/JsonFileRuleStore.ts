import fs from "node:fs";
import path from "node:path";
import type { AlertRule, RuleStore } from "@coinpulse/core";
import { RULE_DOCUMENT_VERSION, ruleDocumentSchema, type RuleDocument } from "./schema";

/**
 * Rule store backed by one JSON document.
 *
 * Every mutation rewrites the document through a temp file that is fsynced
 * and renamed over the target, so a save/delete that returns is on disk.
 * The in-memory view only changes after the write succeeds.
 */
export class JsonFileRuleStore implements RuleStore {
	private rules: Map<number, AlertRule>;

	constructor(readonly filePath: string) {
		this.rules = this.read();
	}

	save(rule: AlertRule): void {
		const next = new Map(this.rules);
		next.set(rule.id, { ...rule });
		this.flush(next);
		this.rules = next;
	}

	load(userId: string): AlertRule[] {
		return this.loadAll().filter((rule) => rule.userId === userId);
	}

	loadAll(): AlertRule[] {
		return Array.from(this.rules.values(), (rule) => ({ ...rule })).sort(
			(a, b) => a.id - b.id
		);
	}

	delete(ruleId: number): boolean {
		if (!this.rules.has(ruleId)) {
			return false;
		}
		const next = new Map(this.rules);
		next.delete(ruleId);
		this.flush(next);
		this.rules = next;
		return true;
	}

	private read(): Map<number, AlertRule> {
		if (!fs.existsSync(this.filePath)) {
			return new Map();
		}

		const contents = fs.readFileSync(this.filePath, "utf-8");
		let raw: unknown;
		try {
			raw = JSON.parse(contents);
		} catch (error) {
			throw new Error(`Rule store ${this.filePath} is not valid JSON`, {
				cause: error,
			});
		}

		const parsed = ruleDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
				.join("; ");
			throw new Error(`Rule store ${this.filePath} is invalid: ${issues}`);
		}

		return new Map(parsed.data.rules.map((rule) => [rule.id, rule]));
	}

	private flush(rules: Map<number, AlertRule>): void {
		const document: RuleDocument = {
			version: RULE_DOCUMENT_VERSION,
			rules: Array.from(rules.values()).sort((a, b) => a.id - b.id),
		};

		fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
		const tempPath = `${this.filePath}.${process.pid}.tmp`;
		const fd = fs.openSync(tempPath, "w");
		try {
			fs.writeSync(fd, JSON.stringify(document, null, 2));
			fs.fsyncSync(fd);
		} finally {
			fs.closeSync(fd);
		}
		fs.renameSync(tempPath, this.filePath);
	}
}
