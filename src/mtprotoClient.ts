import * as fs from "fs";
import * as path from "path";
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import type { Credentials } from "./config.js";
import { createLogger } from "./logger.js";
import { TelegramGiftPlatform, isAuthError } from "./processWrap.js";
import type { OpenResult, PlatformConnector } from "./types.js";

const log = createLogger("mtproto");

export interface SessionStoreOptions {
    dataDir: string;
    /** SESSION_STRING из .env, важнее файла */
    sessionString?: string;
}

export function sessionFilePath(dataDir: string, session: string): string {
    const fileName = session.endsWith(".session") ? session : `${session}.session`;
    return path.join(dataDir, path.basename(fileName));
}

export function loadSessionString(session: string, options: SessionStoreOptions): string {
    if (options.sessionString) return options.sessionString;

    const file = sessionFilePath(options.dataDir, session);
    if (!fs.existsSync(file)) return "";
    return fs.readFileSync(file, "utf8").trim();
}

export function saveSession(session: string, stringSession: StringSession, dataDir: string): string {
    const file = sessionFilePath(dataDir, session);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, stringSession.save(), "utf8");
    log.info({ file }, "Сессия сохранена");
    return file;
}

function createClient(credentials: Credentials, stringSession: StringSession): TelegramClient {
    return new TelegramClient(stringSession, credentials.apiId, credentials.apiHash, {
        connectionRetries: 5,
    });
}

export interface SessionCheckClient {
    invoke(request: Api.updates.GetState): Promise<unknown>;
}

/**
 * true - сервер принял сессию, false - отклонил её.
 * Таймауты, FLOOD_WAIT и прочие сбои пробрасываются как есть.
 */
export async function isSessionAuthorized(client: SessionCheckClient): Promise<boolean> {
    try {
        await client.invoke(new Api.updates.GetState());
        return true;
    } catch (err) {
        if (isAuthError(err)) return false;
        throw err;
    }
}

/**
 * Открывает сессии без интерактивного входа. Если сессии нет или сервер её
 * не признаёт, возвращает authRequired и ничего не спрашивает.
 */
export function createTelegramConnector(
    credentials: Credentials,
    options: SessionStoreOptions,
): PlatformConnector {
    return {
        async tryOpen(session: string): Promise<OpenResult> {
            const saved = loadSessionString(session, options);
            if (!saved) {
                log.warn({ session }, "Сохранённой сессии нет");
                return { status: "authRequired" };
            }

            const client = createClient(credentials, new StringSession(saved));
            try {
                await client.connect();
                if (!(await isSessionAuthorized(client))) {
                    await client.destroy();
                    return { status: "authRequired" };
                }
            } catch (err) {
                await client.destroy();
                throw err;
            }
            return { status: "ready", platform: new TelegramGiftPlatform(client) };
        },
    };
}

function ask(question: string): Promise<string> {
    process.stdout.write(question);
    return new Promise<string>(resolve =>
        process.stdin.once("data", d => {
            process.stdin.pause();
            resolve(d.toString().trim());
        }),
    );
}

/**
 * Интерактивный вход в консоли. Запускается отдельной командой,
 * цикл покупки его никогда не вызывает.
 */
export async function loginFlow(
    session: string,
    credentials: Credentials,
    options: SessionStoreOptions,
): Promise<string> {
    const stringSession = new StringSession(loadSessionString(session, options));
    const client = createClient(credentials, stringSession);

    try {
        await client.start({
            phoneNumber: () => ask("Введите номер телефона (+7...): "),
            phoneCode: () => ask("Введите код из Telegram: "),
            password: () => ask("Если включен 2FA, введите пароль (или Enter): "),
            onError: (err) => log.error({ err }, "Ошибка в loginFlow"),
        });
        log.info("Логин выполнен");
        return saveSession(session, stringSession, options.dataDir);
    } finally {
        await client.destroy();
    }
}
