import pino, { type Logger } from "pino";
import { isTestEnv } from "./util/env.js";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
    if (isTestEnv()) return pino({ level: "silent" });
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
        },
    });
    return pino({
        base: undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    }, transport);
}
