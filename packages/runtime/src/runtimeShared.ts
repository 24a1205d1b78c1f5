import { createLogger } from "@coinpulse/core";

export const runtimeLogger = createLogger("runtime");
