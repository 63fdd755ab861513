import { pino, type Logger } from "pino";
import { config } from "./config.js";

export type { Logger };

/** Package logger. Trees log through this unless given their own. */
export const log: Logger = pino({ name: "merkle", level: config.logLevel });
