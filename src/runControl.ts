import { describeError } from "./errors.js";
import { GiftBuyer, type GiftBuyerOptions } from "./giftBuyer.js";
import { formatStars, starsValue } from "./stars.js";
import type { LogSink, PlatformConnector, RunConfig, RunOutcome } from "./types.js";

export interface RunHandle {
    readonly id: number;
    /** Завершается вместе с запуском, никогда не отклоняется */
    readonly done: Promise<RunOutcome>;
}

interface RunEntry {
    buyer: GiftBuyer;
    handle: RunHandle;
}

/**
 * Реестр запусков. Одновременно работает не больше одного покупателя.
 */
export class RunController {
    private readonly runs = new Map<number, RunEntry>();
    private nextId = 1;

    constructor(
        private readonly connector: PlatformConnector,
        private readonly log: LogSink,
        private readonly buyerOptions: GiftBuyerOptions = {},
    ) {}

    isActive(): boolean {
        return this.runs.size > 0;
    }

    /**
     * Запускает покупателя в фоне. Если запуск уже идёт, ничего не делает и возвращает null.
     */
    start(config: RunConfig): RunHandle | null {
        if (this.isActive()) {
            this.log("Фоновой процесс уже работает.");
            return null;
        }

        const id = this.nextId++;
        const buyer = new GiftBuyer(config, this.connector, this.log, this.buyerOptions);
        this.log("Старт покупателя подарков…");

        const done = buyer.run().finally(() => {
            this.runs.delete(id);
            this.log("Фоновая задача завершена.");
        });
        const handle: RunHandle = { id, done };
        this.runs.set(id, { buyer, handle });
        return handle;
    }

    stop(handle: RunHandle | null | undefined): void {
        const entry = handle ? this.runs.get(handle.id) : undefined;
        if (!entry || entry.buyer.isStopRequested()) {
            return;
        }
        entry.buyer.stop();
        this.log("Остановка запрошена…");
    }

    stopAll(): Promise<RunOutcome[]> {
        const pending = [...this.runs.values()].map(entry => {
            this.stop(entry.handle);
            return entry.handle.done;
        });
        return Promise.all(pending);
    }

    /**
     * Проверка баланса вне запуска: отдельная короткая сессия,
     * сессию активного покупателя не трогает.
     */
    async checkBalance(session: string): Promise<number | null> {
        try {
            const opened = await this.connector.tryOpen(session);
            if (opened.status === "authRequired") {
                this.log("Требуется авторизация: выполните команду login.");
                return null;
            }
            try {
                const balance = starsValue(await opened.platform.getBalance());
                this.log(`Баланс: ${formatStars(balance)} ⭐`);
                return balance;
            } finally {
                await opened.platform.close();
            }
        } catch (err) {
            this.log(`Ошибка получения баланса: ${describeError(err)}`);
            return null;
        }
    }
}
