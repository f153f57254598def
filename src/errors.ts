/**
 * Ошибки, которые различает покупатель подарков.
 */

export class ConfigError extends Error {
    constructor(message: string, public readonly fields: string[] = []) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * Нет API_ID / API_HASH. Запуск невозможен, пока их не задать в .env
 */
export class MissingCredentialsError extends ConfigError {
    constructor(fields: string[]) {
        super(`Не заданы ${fields.join(" / ")}. Укажите их в .env`, fields);
        this.name = "MissingCredentialsError";
    }
}

/**
 * Сессия не авторизована или отозвана сервером.
 * Лечится только командой login и новым запуском.
 */
export class AuthRequiredError extends Error {
    constructor(message = "Требуется авторизация") {
        super(message);
        this.name = "AuthRequiredError";
    }
}

export class CancelledError extends Error {
    constructor() {
        super("Остановлено");
        this.name = "CancelledError";
    }
}

// Одна строка для лога, без стека
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message || err.name;
    }
    if (typeof err === "string") return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}
