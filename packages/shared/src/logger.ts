import { pino, type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const createLogger = (name: string, level: LogLevel = "info"): Logger => pino({ name, level });
