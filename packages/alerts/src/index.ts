export { AlertBook } from "./AlertBook";
export type { AlertBookOptions, CreateRuleInput } from "./AlertBook";
export { AlertEvaluator, isTriggered } from "./AlertEvaluator";
