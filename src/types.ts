// Типы, общие для цикла покупки и обёртки над Telegram API

export interface RunConfig {
    readonly session: string;
    /** @username, числовой ID или "me" */
    readonly recipient: string;
    /** Потолок цены в Stars */
    readonly maxPrice: number;
    /** Интервал опроса каталога, секунды */
    readonly pollInterval: number;
}

/** Сумма в Stars: целая часть + nanos (1e-9) */
export interface StarsAmount {
    amount: number;
    nanos: number;
}

export interface GiftOffer {
    /** int64 ID подарка в десятичной записи */
    id: string;
    price: number;
    limited: boolean;
    soldOut: boolean;
    /** undefined = без ограничения */
    availabilityRemains?: number;
    /** Название для лога */
    title?: string;
}

export type CatalogResult =
    | { kind: "snapshot"; hash: number; offers: GiftOffer[] }
    | { kind: "notModified" };

export interface StarsPaymentForm {
    kind: "stars";
    formId: string;
    giftId: string;
    recipient: string;
    typeName: string;
}

export type PaymentForm =
    | StarsPaymentForm
    | { kind: "unsupported"; typeName: string };

export interface GiftPlatform {
    getBalance(): Promise<StarsAmount>;
    getCatalog(hash: number): Promise<CatalogResult>;
    createPaymentForm(recipient: string, offerId: string): Promise<PaymentForm>;
    submitPaymentForm(form: StarsPaymentForm): Promise<void>;
    /** Проверяет получателя заранее и возвращает имя для лога (@username, имя или название чата) */
    resolveRecipient(recipient: string): Promise<string>;
    close(): Promise<void>;
}

export type OpenResult =
    | { status: "ready"; platform: GiftPlatform }
    | { status: "authRequired" };

export interface PlatformConnector {
    /** Никогда не запускает интерактивный вход */
    tryOpen(session: string): Promise<OpenResult>;
}

export type LogSink = (line: string) => void;

export type BuyerState =
    | "idle"
    | "authenticating"
    | "pollingCatalog"
    | "evaluatingOffers"
    | "verifyingBalance"
    | "attemptingPurchase"
    | "done";

export type RunOutcome =
    | { status: "success"; offer: GiftOffer }
    | { status: "cancelled" }
    | { status: "error"; reason: string };
