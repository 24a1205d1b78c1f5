import type { FiredAlert } from "@coinpulse/core";
import type { NotificationSink } from "@coinpulse/runtime";
import { formatFiredAlert } from "../format/messages";
import type { TelegramClient } from "./TelegramClient";

/** Alerts go to the private chat of the user who created the rule. */
export class TelegramNotificationSink implements NotificationSink {
	constructor(private readonly client: Pick<TelegramClient, "sendMessage">) {}

	async deliver(alert: FiredAlert): Promise<void> {
		await this.client.sendMessage(alert.userId, formatFiredAlert(alert));
	}
}
