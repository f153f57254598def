import pino from "pino";
import { loadDotenv } from "./config.js";

// Логгеры создаются при загрузке модулей, поэтому .env читаем раньше них
loadDotenv();

export function logLevel(env: NodeJS.ProcessEnv = process.env): string {
    return env.LOG_LEVEL?.trim() || "info";
}

export function createLogger(name: string): pino.Logger {
    return pino({ name, level: logLevel() });
}
