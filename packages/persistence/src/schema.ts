import { z } from "zod";

export const alertRuleSchema = z.object({
	id: z.number().int().positive(),
	userId: z.string().min(1),
	instrument: z.string().min(1),
	direction: z.enum(["above", "below"]),
	threshold: z.number().positive(),
	createdAt: z.number(),
	status: z.enum(["active", "fired", "removed"]),
	firedAt: z.number().optional(),
	firedPrice: z.number().optional(),
});

export const RULE_DOCUMENT_VERSION = 1;

export const ruleDocumentSchema = z.object({
	version: z.literal(RULE_DOCUMENT_VERSION),
	rules: z.array(alertRuleSchema),
});

export type RuleDocument = z.infer<typeof ruleDocumentSchema>;
