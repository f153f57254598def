import { abortable, sleep } from "./cancellation.js";
import { AuthRequiredError, CancelledError, describeError } from "./errors.js";
import { selectCandidates } from "./offerEvaluator.js";
import { formatStars, isAffordable, starsValue } from "./stars.js";
import type {
    BuyerState,
    CatalogResult,
    GiftOffer,
    GiftPlatform,
    LogSink,
    OpenResult,
    PaymentForm,
    PlatformConnector,
    RunConfig,
    RunOutcome,
} from "./types.js";

const CANCELLED: RunOutcome = { status: "cancelled" };

const LOGIN_HINT = "Требуется авторизация: выполните команду login и перезапустите покупатель.";

// Результат одной попытки купить конкретный подарок
type PurchaseAttempt = "bought" | "failed" | "cancelled";

export interface GiftBuyerOptions {
    onStateChange?: (state: BuyerState) => void;
}

/**
 * Цикл покупки: опрос каталога, отбор подарков, проверка баланса, оплата.
 * Останавливается после первой успешной покупки или по stop().
 */
export class GiftBuyer {
    private readonly controller = new AbortController();
    private state: BuyerState = "idle";

    constructor(
        private readonly config: RunConfig,
        private readonly connector: PlatformConnector,
        private readonly log: LogSink,
        private readonly options: GiftBuyerOptions = {},
    ) {}

    getState(): BuyerState {
        return this.state;
    }

    isStopRequested(): boolean {
        return this.controller.signal.aborted;
    }

    // Можно вызывать сколько угодно раз и из любого места
    stop(): void {
        if (!this.controller.signal.aborted) {
            this.controller.abort();
        }
    }

    /**
     * Никогда не бросает: любой исход превращается в RunOutcome.
     */
    async run(): Promise<RunOutcome> {
        try {
            return this.finish(await this.runSession());
        } catch (err) {
            if (err instanceof CancelledError) return this.finish(CANCELLED);
            this.log(`Фоновая задача упала: ${describeError(err)}`);
            return this.finish({ status: "error", reason: describeError(err) });
        }
    }

    private finish(outcome: RunOutcome): RunOutcome {
        this.setState("done");
        if (outcome.status === "cancelled") {
            this.log("Покупатель остановлен.");
        }
        return outcome;
    }

    private setState(state: BuyerState): void {
        if (this.state === state) return;
        this.state = state;
        this.options.onStateChange?.(state);
    }

    private get signal(): AbortSignal {
        return this.controller.signal;
    }

    private async runSession(): Promise<RunOutcome> {
        this.setState("authenticating");
        if (this.signal.aborted) throw new CancelledError();

        // Подключение не прерываем: иначе открытая сессия останется без владельца
        let opened: OpenResult;
        try {
            opened = await this.connector.tryOpen(this.config.session);
        } catch (err) {
            if (err instanceof AuthRequiredError) return this.authRequired();
            this.log(`Не удалось подключиться: ${describeError(err)}`);
            return { status: "error", reason: describeError(err) };
        }

        if (opened.status === "authRequired") {
            return this.authRequired();
        }

        const platform = opened.platform;
        try {
            return await this.acquire(platform);
        } finally {
            await platform.close().catch((err: unknown) => {
                this.log(`Ошибка при закрытии сессии: ${describeError(err)}`);
            });
        }
    }

    private authRequired(): RunOutcome {
        this.log(LOGIN_HINT);
        return { status: "error", reason: "auth required" };
    }

    private async acquire(platform: GiftPlatform): Promise<RunOutcome> {
        // Стартовый баланс и получатель: без них дальше идти нет смысла
        try {
            const balance = starsValue(await this.request(() => platform.getBalance()));
            this.log(`Баланс: ${formatStars(balance)} ⭐`);
            const recipient = await this.request(() => platform.resolveRecipient(this.config.recipient));
            this.log(`Получатель: ${recipient}`);
        } catch (err) {
            if (err instanceof CancelledError) throw err;
            if (err instanceof AuthRequiredError) return this.authRequired();
            this.log(`Ошибка подготовки: ${describeError(err)}`);
            return { status: "error", reason: describeError(err) };
        }

        let lastHash = 0;

        while (!this.signal.aborted) {
            this.setState("pollingCatalog");

            let catalog: CatalogResult;
            try {
                catalog = await this.request(() => platform.getCatalog(lastHash));
            } catch (err) {
                if (err instanceof CancelledError) throw err;
                if (err instanceof AuthRequiredError) return this.authRequired();
                this.log(`Ошибка при получении списка подарков: ${describeError(err)}`);
                if (!(await this.pause())) break;
                continue;
            }

            if (catalog.kind === "notModified") {
                if (!(await this.pause())) break;
                continue;
            }

            lastHash = catalog.hash;
            if (catalog.offers.length === 0) {
                if (!(await this.pause())) break;
                continue;
            }

            this.setState("evaluatingOffers");
            const candidates = selectCandidates(catalog.offers, this.config.maxPrice);

            let bought: GiftOffer | null | "cancelled";
            try {
                bought = await this.tryCandidates(platform, candidates);
            } catch (err) {
                if (err instanceof AuthRequiredError) return this.authRequired();
                throw err;
            }
            if (bought === "cancelled") break;
            if (bought !== null) {
                return { status: "success", offer: bought };
            }

            if (!(await this.pause())) break;
        }

        return CANCELLED;
    }

    /**
     * Перебирает кандидатов от дешёвых к дорогим.
     * Возвращает купленный подарок, null если ничего не купили, "cancelled" при остановке.
     */
    private async tryCandidates(
        platform: GiftPlatform,
        candidates: GiftOffer[],
    ): Promise<GiftOffer | null | "cancelled"> {
        for (const gift of candidates) {
            if (this.signal.aborted) return "cancelled";

            // Баланс перечитывается перед каждой покупкой
            this.setState("verifyingBalance");
            let balance: number;
            try {
                balance = starsValue(await this.request(() => platform.getBalance()));
            } catch (err) {
                if (err instanceof CancelledError || err instanceof AuthRequiredError) throw err;
                this.log(`Ошибка получения баланса: ${describeError(err)}`);
                return null;
            }

            if (!isAffordable(balance, gift.price)) {
                this.log(`Пропуск - не хватает Stars (${balance} < ${gift.price})`);
                continue;
            }

            this.setState("attemptingPurchase");
            const attempt = await this.purchase(platform, gift);
            if (attempt === "bought") return gift;
            if (attempt === "cancelled") return "cancelled";
        }
        return null;
    }

    private async purchase(platform: GiftPlatform, gift: GiftOffer): Promise<PurchaseAttempt> {
        let form: PaymentForm;
        try {
            form = await this.request(() => platform.createPaymentForm(this.config.recipient, gift.id));
        } catch (err) {
            if (err instanceof CancelledError || err instanceof AuthRequiredError) throw err;
            this.log(`Ошибка формы оплаты: ${describeError(err)}`);
            return "failed";
        }

        if (form.kind !== "stars") {
            this.log(`Неожиданный тип формы оплаты: ${form.typeName}`);
            return "failed";
        }

        // После остановки новых оплат не начинаем
        if (this.signal.aborted) return "cancelled";

        // Отправленную оплату дожидаемся до конца, даже если пришёл stop()
        try {
            await platform.submitPaymentForm(form);
        } catch (err) {
            if (err instanceof AuthRequiredError) throw err;
            this.log(`Ошибка при оплате: ${describeError(err)}`);
            return "failed";
        }

        const name = gift.title ? `${gift.title} (${gift.id})` : gift.id;
        this.log(`✅ Куплено: ${name} за ${gift.price} ⭐`);
        return "bought";
    }

    // После остановки новых запросов не отправляем
    private request<T>(call: () => Promise<T>): Promise<T> {
        if (this.signal.aborted) return Promise.reject(new CancelledError());
        return abortable(call(), this.signal);
    }

    private pause(): Promise<boolean> {
        return sleep(this.config.pollInterval * 1000, this.signal);
    }
}
