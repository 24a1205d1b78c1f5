import { createLogger } from "@coinpulse/core";

export const alertsLogger = createLogger("alerts");
