import { z } from "zod";

export const telegramUserSchema = z.object({
	id: z.number(),
	is_bot: z.boolean().optional(),
	first_name: z.string().optional(),
	username: z.string().optional(),
});

export const telegramChatSchema = z.object({
	id: z.number(),
	type: z.string(),
});

export const telegramMessageSchema = z.object({
	message_id: z.number(),
	date: z.number(),
	chat: telegramChatSchema,
	from: telegramUserSchema.optional(),
	text: z.string().optional(),
});

export const telegramUpdateSchema = z.object({
	update_id: z.number(),
	message: telegramMessageSchema.optional(),
});

/** Bot API envelope; `result` is validated separately per method */
export const telegramEnvelopeSchema = z.object({
	ok: z.boolean(),
	result: z.unknown().optional(),
	description: z.string().optional(),
	error_code: z.number().optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;
export type TelegramMessage = z.infer<typeof telegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
