import * as path from "path";
import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError, MissingCredentialsError } from "./errors.js";
import type { RunConfig } from "./types.js";

export const DEFAULT_SESSION = "tg_gifts";
export const DEFAULT_RECIPIENT = "me";
export const DEFAULT_MAX_PRICE = 500;
export const DEFAULT_POLL_INTERVAL = 15;
export const MIN_POLL_INTERVAL = 2;

const optionalString = z
    .string()
    .transform(s => s.trim())
    .optional()
    .transform(s => (s ? s : undefined));

// Пустая строка в .env = значение по умолчанию
const intWithDefault = (fallback: number) =>
    z.preprocess(
        v => (typeof v === "string" && v.trim() === "" ? undefined : v),
        z.coerce.number().int().default(fallback),
    );

const envSchema = z.object({
    API_ID: optionalString,
    TG_API_ID: optionalString,
    API_HASH: optionalString,
    TG_API_HASH: optionalString,
    TG_SESSION: optionalString,
    SESSION_STRING: optionalString,
    RECIPIENT: optionalString,
    MAX_PRICE_STARS: intWithDefault(DEFAULT_MAX_PRICE),
    POLL_INTERVAL: intWithDefault(DEFAULT_POLL_INTERVAL),
    DATA_DIR: optionalString,
});

export interface AppEnv {
    apiId?: number;
    apiHash?: string;
    session: string;
    sessionString?: string;
    recipient: string;
    maxPrice: number;
    pollInterval: number;
    dataDir: string;
}

export interface Credentials {
    apiId: number;
    apiHash: string;
}

function formatIssues(error: z.ZodError): { message: string; fields: string[] } {
    const fields = error.issues.map(issue => issue.path.join(".") || "(root)");
    const message = error.issues
        .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
    return { message, fields };
}

/**
 * Читает настройки процесса. Файл .env подхватывается из текущей директории,
 * уже выставленные переменные окружения имеют приоритет.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppEnv {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const { message, fields } = formatIssues(parsed.error);
        throw new ConfigError(`Некорректные переменные окружения: ${message}`, fields);
    }
    const e = parsed.data;

    const rawApiId = e.API_ID ?? e.TG_API_ID;
    const apiId = rawApiId !== undefined && /^\d+$/.test(rawApiId) ? Number(rawApiId) : undefined;

    return {
        apiId: apiId && apiId > 0 ? apiId : undefined,
        apiHash: e.API_HASH ?? e.TG_API_HASH,
        session: e.TG_SESSION ?? DEFAULT_SESSION,
        sessionString: e.SESSION_STRING,
        recipient: e.RECIPIENT ?? DEFAULT_RECIPIENT,
        maxPrice: e.MAX_PRICE_STARS,
        pollInterval: e.POLL_INTERVAL,
        dataDir: path.resolve(cwd, e.DATA_DIR ?? "data"),
    };
}

export function loadDotenv(cwd = process.cwd()): void {
    dotenv.config({ path: path.join(cwd, ".env") });
}

/**
 * Без API_ID и API_HASH не стартует ни один запуск.
 */
export function requireCredentials(env: Pick<AppEnv, "apiId" | "apiHash">): Credentials {
    const missing: string[] = [];
    if (!env.apiId) missing.push("API_ID");
    if (!env.apiHash) missing.push("API_HASH");
    if (env.apiId === undefined || env.apiHash === undefined || missing.length > 0) {
        throw new MissingCredentialsError(missing);
    }
    return { apiId: env.apiId, apiHash: env.apiHash };
}

const runConfigSchema = z.object({
    session: z.string(),
    recipient: z.string(),
    maxPrice: z.number().int().positive(),
    pollInterval: z.number().int().min(MIN_POLL_INTERVAL),
});

export interface RunConfigInput {
    session?: string;
    recipient?: string;
    maxPrice?: number;
    pollInterval?: number;
}

/**
 * Собирает конфиг запуска из того, что ввёл пользователь, подставляя значения по умолчанию.
 */
export function buildRunConfig(
    input: RunConfigInput,
    defaults: Partial<RunConfig> = {},
): RunConfig {
    const candidate = {
        session: input.session?.trim() || defaults.session || DEFAULT_SESSION,
        recipient: input.recipient?.trim() || defaults.recipient || DEFAULT_RECIPIENT,
        maxPrice: input.maxPrice ?? defaults.maxPrice ?? DEFAULT_MAX_PRICE,
        pollInterval: input.pollInterval ?? defaults.pollInterval ?? DEFAULT_POLL_INTERVAL,
    };

    const parsed = runConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const { message, fields } = formatIssues(parsed.error);
        throw new ConfigError(`Некорректные настройки запуска: ${message}`, fields);
    }
    return Object.freeze(parsed.data);
}

const FLAGS: Record<string, keyof RunConfigInput> = {
    "--session": "session",
    "--recipient": "recipient",
    "--max-price": "maxPrice",
    "--interval": "pollInterval",
};

/**
 * Флаги командной строки вида `--max-price 300`. Проверка значений остаётся за buildRunConfig.
 */
export function parseRunFlags(args: readonly string[]): RunConfigInput {
    const input: RunConfigInput = {};
    for (let i = 0; i < args.length; i += 2) {
        const flag = args[i] ?? "";
        const key = FLAGS[flag];
        const value = args[i + 1];
        if (!key) throw new ConfigError(`Неизвестный аргумент: ${flag}`, [flag]);
        if (value === undefined) throw new ConfigError(`Нет значения для ${flag}`, [flag]);

        if (key === "maxPrice" || key === "pollInterval") {
            const n = Number(value);
            if (value.trim() === "" || !Number.isInteger(n)) {
                throw new ConfigError(`${flag} должен быть целым числом`, [flag]);
            }
            input[key] = n;
        } else {
            input[key] = value;
        }
    }
    return input;
}
