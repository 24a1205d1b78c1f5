export interface ParsedCommand {
	/** Lower-case name without the slash, e.g. "setalert" */
	name: string;
	args: string[];
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?$/;

/**
 * Splits "/setalert@MyBot BTC above 50000" into name and args. Returns null
 * for plain text and for commands addressed to another bot.
 */
export const parseCommand = (
	text: string,
	botUsername?: string
): ParsedCommand | null => {
	const [head, ...args] = text.trim().split(/\s+/);
	const match = COMMAND_PATTERN.exec(head);
	if (!match) {
		return null;
	}
	const [, name, target] = match;
	if (target && botUsername && target.toLowerCase() !== botUsername.toLowerCase()) {
		return null;
	}
	return { name: name.toLowerCase(), args };
};
