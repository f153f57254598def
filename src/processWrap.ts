import { Api, TelegramClient, errors } from "telegram";
import bigInt from "big-integer";
import { AuthRequiredError } from "./errors.js";
import { createLogger } from "./logger.js";
import { toStarsAmount, type RawLong } from "./stars.js";
import type {
    CatalogResult,
    GiftOffer,
    GiftPlatform,
    PaymentForm,
    StarsAmount,
    StarsPaymentForm,
} from "./types.js";

const log = createLogger("telegram-api");

// Ответы сервера, после которых сессию нужно авторизовать заново
const AUTH_RPC_ERRORS = new Set([
    "AUTH_KEY_UNREGISTERED",
    "AUTH_KEY_INVALID",
    "SESSION_REVOKED",
    "SESSION_EXPIRED",
    "USER_DEACTIVATED",
]);

// Формы, которые оплачиваются звёздами через payments.sendStarsForm
const STARS_FORM_TYPES = new Set(["payments.PaymentFormStars", "payments.PaymentFormStarGift"]);

/** Поля Api.StarGift, которые нужны для отбора */
export interface RawStarGift {
    id: RawLong;
    stars: RawLong;
    limited?: boolean;
    soldOut?: boolean;
    availabilityRemains?: number;
    title?: string;
}

export interface RawPaymentForm {
    className: string;
    formId: RawLong;
}

export function isAuthError(err: unknown): boolean {
    if (err instanceof AuthRequiredError) return true;
    if (!(err instanceof errors.RPCError)) return false;
    return err.code === 401 || AUTH_RPC_ERRORS.has(err.errorMessage);
}

export function idToString(id: RawLong): string {
    return typeof id === "number" ? String(id) : id.toString();
}

export function toGiftOffer(gift: RawStarGift): GiftOffer {
    const offer: GiftOffer = {
        id: idToString(gift.id),
        price: toStarsAmount(gift.stars).amount,
        limited: gift.limited ?? false,
        soldOut: gift.soldOut ?? false,
    };
    if (gift.availabilityRemains !== undefined) offer.availabilityRemains = gift.availabilityRemains;
    if (gift.title) offer.title = gift.title;
    return offer;
}

export function toPaymentForm(form: RawPaymentForm, giftId: string, recipient: string): PaymentForm {
    if (!STARS_FORM_TYPES.has(form.className)) {
        return { kind: "unsupported", typeName: form.className };
    }
    return {
        kind: "stars",
        formId: idToString(form.formId),
        giftId,
        recipient,
        typeName: form.className,
    };
}

/** Поля пользователя, чата или канала, по которым его узнают в логе */
export interface RawEntity {
    username?: string;
    firstName?: string;
    title?: string;
}

export function recipientName(entity: RawEntity, fallback: string): string {
    if (entity.username) return `@${entity.username}`;
    return entity.firstName || entity.title || fallback;
}

/**
 * GiftPlatform поверх gramjs. Один экземпляр = одна сессия, закрывается через close().
 */
export class TelegramGiftPlatform implements GiftPlatform {
    private readonly peers = new Map<string, Api.TypeInputPeer>();

    constructor(private readonly client: TelegramClient) {}

    async getBalance(): Promise<StarsAmount> {
        const status = await this.call("payments.getStarsStatus", () =>
            this.client.invoke(new Api.payments.GetStarsStatus({ peer: new Api.InputPeerSelf() })),
        );
        return toStarsAmount(status.balance);
    }

    async getCatalog(hash: number): Promise<CatalogResult> {
        const res = await this.call("payments.getStarGifts", () =>
            this.client.invoke(new Api.payments.GetStarGifts({ hash })),
        );
        if (res instanceof Api.payments.StarGiftsNotModified) {
            return { kind: "notModified" };
        }

        // Уникальные (коллекционные) подарки в каталоге не продаются
        const offers = res.gifts
            .filter((g): g is Api.StarGift => g instanceof Api.StarGift)
            .map(toGiftOffer);
        log.debug({ hash: res.hash, total: res.gifts.length, offers: offers.length }, "catalog fetched");
        return { kind: "snapshot", hash: res.hash, offers };
    }

    async createPaymentForm(recipient: string, offerId: string): Promise<PaymentForm> {
        const invoice = await this.buildInvoice(recipient, offerId);
        const form = await this.call("payments.getPaymentForm", () =>
            this.client.invoke(new Api.payments.GetPaymentForm({ invoice })),
        );
        return toPaymentForm(form, offerId, recipient);
    }

    async submitPaymentForm(form: StarsPaymentForm): Promise<void> {
        const invoice = await this.buildInvoice(form.recipient, form.giftId);
        await this.call("payments.sendStarsForm", () =>
            this.client.invoke(
                new Api.payments.SendStarsForm({
                    formId: bigInt(form.formId),
                    invoice,
                }),
            ),
        );
    }

    async resolveRecipient(recipient: string): Promise<string> {
        await this.peerFor(recipient);
        const entity = await this.call("getEntity", () => this.client.getEntity(recipient));
        return recipientName(entity, recipient);
    }

    async close(): Promise<void> {
        this.peers.clear();
        await this.client.destroy();
    }

    private async buildInvoice(recipient: string, giftId: string): Promise<Api.InputInvoiceStarGift> {
        const peer = await this.peerFor(recipient);
        return new Api.InputInvoiceStarGift({
            peer,
            giftId: bigInt(giftId),
        });
    }

    private async peerFor(recipient: string): Promise<Api.TypeInputPeer> {
        const cached = this.peers.get(recipient);
        if (cached) return cached;
        const peer = await this.call("getInputEntity", () => this.client.getInputEntity(recipient));
        this.peers.set(recipient, peer);
        return peer;
    }

    private async call<T>(method: string, fn: () => Promise<T>): Promise<T> {
        log.debug({ method }, "request");
        try {
            return await fn();
        } catch (err) {
            if (isAuthError(err)) {
                log.warn({ method, err }, "session rejected");
                throw new AuthRequiredError(`Сессия отклонена сервером (${method})`);
            }
            log.debug({ method, err }, "request failed");
            throw err;
        }
    }
}
