import {
	InsufficientDataError,
	RuleValidationError,
	UnsupportedInstrumentError,
	createLogger,
	errorMessage,
	isAlertDirection,
	normalizeInstrument,
	type IndicatorSettings,
	type PriceQuote,
} from "@coinpulse/core";
import type { AlertService } from "@coinpulse/runtime";
import {
	escapeHtml,
	formatHelp,
	formatQuote,
	formatRuleCreated,
	formatRules,
	formatSnapshot,
	formatWelcome,
} from "../format/messages";
import { parseCommand } from "./parseCommand";

const botLogger = createLogger("alert-bot");

const GREETING_PATTERN = /\b(hello|hi|hey|greetings)\b/i;
const THANKS_PATTERN = /\bthank/i;

const SET_ALERT_USAGE = [
	"Please specify alert parameters. Example: /setalert BTC above 50000",
	"Format: /setalert [coin] [above|below] [price]",
].join("\n");

const GENERIC_FAILURE = "Sorry, something went wrong. Please try again later.";

export interface CommandHandlerOptions {
	/** Commands addressed to other bots are ignored */
	botUsername?: string;
	indicators?: IndicatorSettings;
}

type CommandRunner = (userId: string, args: string[]) => string;

/**
 * Turns one chat message into one reply. Never throws: bad input gets usage
 * text and unexpected failures a generic apology.
 */
export class CommandHandler {
	private readonly commands: ReadonlyMap<string, CommandRunner>;

	constructor(
		private readonly service: AlertService,
		private readonly options: CommandHandlerOptions = {}
	) {
		this.commands = new Map<string, CommandRunner>([
			["start", () => formatWelcome()],
			["help", () => formatHelp(this.service.instruments)],
			["price", (_userId, args) => this.price(args)],
			["analyze", (_userId, args) => this.analyze(args)],
			["setalert", (userId, args) => this.setAlert(userId, args)],
			["myalerts", (userId) => formatRules(this.service.listRules(userId))],
			["removealert", (userId, args) => this.removeAlert(userId, args)],
		]);
	}

	/** Returns null when the message is not meant for this bot. */
	handle(userId: string, text: string): string | null {
		const trimmed = text.trim();
		if (!trimmed.startsWith("/")) {
			return this.smallTalk(trimmed);
		}

		const command = parseCommand(trimmed, this.options.botUsername);
		if (!command) {
			return null;
		}
		const runner = this.commands.get(command.name);
		if (!runner) {
			return `Unknown command /${escapeHtml(command.name)}. Use /help to see available commands.`;
		}

		try {
			return runner(userId, command.args);
		} catch (error) {
			return this.describeFailure(command.name, error);
		}
	}

	private price(args: string[]): string {
		if (!args.length) {
			return "Please specify a cryptocurrency. Example: /price BTC";
		}
		return formatQuote(this.service.latestQuote(args[0]));
	}

	private analyze(args: string[]): string {
		if (!args.length) {
			return "Please specify a cryptocurrency. Example: /analyze BTC";
		}
		const snapshot = this.service.analyze(args[0]);
		let quote: PriceQuote | undefined;
		try {
			quote = this.service.latestQuote(snapshot.instrument);
		} catch (error) {
			if (!(error instanceof InsufficientDataError)) {
				throw error;
			}
		}
		return formatSnapshot(snapshot, quote, this.options.indicators);
	}

	private setAlert(userId: string, args: string[]): string {
		if (args.length < 3) {
			return SET_ALERT_USAGE;
		}
		const [coin, rawDirection, rawPrice] = args;
		const direction = rawDirection.toLowerCase();
		if (!isAlertDirection(direction)) {
			return "Condition must be 'above' or 'below'";
		}
		const threshold = Number(rawPrice.replace(/[$,]/g, ""));
		if (!rawPrice.trim() || !Number.isFinite(threshold) || threshold <= 0) {
			return "Please enter a valid price number";
		}

		const instrument = normalizeInstrument(coin);
		const id = this.service.createRule(userId, instrument, direction, threshold);
		return formatRuleCreated({ id, instrument, direction, threshold });
	}

	private removeAlert(userId: string, args: string[]): string {
		if (!args.length) {
			return "Please specify an alert ID. Example: /removealert 3";
		}
		if (!/^\d+$/.test(args[0])) {
			return "Please enter a valid alert ID (number)";
		}
		const ruleId = Number(args[0]);
		return this.service.removeRule(userId, ruleId)
			? `✅ Alert ${ruleId} removed successfully!`
			: "Alert not found or you don't have permission to remove it.";
	}

	private smallTalk(text: string): string {
		if (GREETING_PATTERN.test(text)) {
			return "Hello! I'm coinpulse. Use /help to see what I can do!";
		}
		if (THANKS_PATTERN.test(text)) {
			return "You're welcome! 😊";
		}
		return "I'm not sure how to respond to that. Use /help to see available commands.";
	}

	private describeFailure(command: string, error: unknown): string {
		if (error instanceof UnsupportedInstrumentError) {
			return `Sorry, ${escapeHtml(error.instrument)} is not tracked. Tracked coins: ${this.service.instruments.join(", ")}`;
		}
		if (error instanceof InsufficientDataError) {
			return `No price for ${escapeHtml(error.instrument)} yet. Please try again in a minute.`;
		}
		if (error instanceof RuleValidationError) {
			return escapeHtml(error.message);
		}
		botLogger.error("command_failed", {
			command,
			message: errorMessage(error),
		});
		return GENERIC_FAILURE;
	}
}
