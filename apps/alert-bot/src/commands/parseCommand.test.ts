import { describe, expect, it } from "vitest";
import { parseCommand } from "./parseCommand";

describe("parseCommand", () => {
	it("splits the command name from its arguments", () => {
		expect(parseCommand("/setalert BTC above 50000")).toEqual({
			name: "setalert",
			args: ["BTC", "above", "50000"],
		});
		expect(parseCommand("  /help  ")).toEqual({ name: "help", args: [] });
	});

	it("accepts commands addressed to this bot", () => {
		expect(parseCommand("/Price@CoinPulseBot eth", "coinpulsebot")).toEqual({
			name: "price",
			args: ["eth"],
		});
	});

	it("ignores commands addressed to another bot", () => {
		expect(parseCommand("/price@OtherBot eth", "coinpulsebot")).toBeNull();
	});

	it("returns null for plain text", () => {
		expect(parseCommand("hello")).toBeNull();
		expect(parseCommand("/")).toBeNull();
		expect(parseCommand("")).toBeNull();
	});
});
