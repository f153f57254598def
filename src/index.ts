#!/usr/bin/env node
// Консольная оболочка над покупателем подарков.
//   run     - опрашивать каталог и купить первый подходящий подарок
//   login   - интерактивный вход, сохраняет сессию в DATA_DIR
//   balance - показать баланс Stars
// Настройки берутся из .env, флаги командной строки их перекрывают.

import { buildRunConfig, loadDotenv, loadEnv, parseRunFlags, requireCredentials } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createTelegramConnector, loginFlow } from "./mtprotoClient.js";
import { RunController } from "./runControl.js";

const log = createLogger("gift-buyer");

const USAGE = `Использование:
  star-gift-buyer run [--session NAME] [--recipient @user|ID|me] [--max-price N] [--interval SEC]
  star-gift-buyer login [--session NAME]
  star-gift-buyer balance [--session NAME]`;

async function main(argv: string[]): Promise<number> {
    // Без команды (или сразу с флагами) считаем, что это run
    const first = argv[0];
    const implicitRun = first === undefined || (first.startsWith("--") && first !== "--help");
    const command = implicitRun ? "run" : first;
    const rest = implicitRun ? argv : argv.slice(1);
    if (command === "--help" || command === "help") {
        console.log(USAGE);
        return 0;
    }

    loadDotenv();
    const env = loadEnv();
    const credentials = requireCredentials(env);
    const flags = parseRunFlags(rest);
    const config = buildRunConfig(flags, env);
    const store = { dataDir: env.dataDir, sessionString: env.sessionString };

    const sink = (line: string) => log.info(line);
    const controller = new RunController(createTelegramConnector(credentials, store), sink);

    switch (command) {
        case "login": {
            const file = await loginFlow(config.session, credentials, store);
            sink(`Авторизация завершена, сессия: ${file}. Запустите покупатель командой run.`);
            return 0;
        }
        case "balance": {
            const balance = await controller.checkBalance(config.session);
            return balance === null ? 1 : 0;
        }
        case "run": {
            log.info({ ...config }, "Настройки запуска");
            const handle = controller.start(config);
            if (!handle) return 1;

            const onSignal = () => {
                void controller.stopAll();
            };
            process.once("SIGINT", onSignal);
            process.once("SIGTERM", onSignal);
            try {
                const outcome = await handle.done;
                return outcome.status === "error" ? 1 : 0;
            } finally {
                process.off("SIGINT", onSignal);
                process.off("SIGTERM", onSignal);
            }
        }
        default:
            console.error(USAGE);
            return 2;
    }
}

main(process.argv.slice(2))
    .then(code => {
        // gramjs держит таймеры после отключения, поэтому выходим явно
        process.exit(code);
    })
    .catch((err: unknown) => {
        if (err instanceof ConfigError) {
            log.error(err.message);
        } else {
            log.error({ err }, describeError(err));
        }
        process.exit(1);
    });
