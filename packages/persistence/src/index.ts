/**
 * Durable storage for alert rules. Both stores implement the synchronous
 * RuleStore contract from @coinpulse/core.
 */
export { InMemoryRuleStore } from "./InMemoryRuleStore";
export { JsonFileRuleStore } from "./JsonFileRuleStore";
export { alertRuleSchema, ruleDocumentSchema, RULE_DOCUMENT_VERSION } from "./schema";
export type { RuleDocument } from "./schema";
