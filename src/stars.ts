import bigInt from "big-integer";
import type { StarsAmount } from "./types.js";

const NANOS_PER_STAR = 1_000_000_000;

// long из gramjs приходит как big-integer
export type RawLong = bigInt.BigInteger | number;

/**
 * Сырые суммы из ответов API. В старых слоях баланс был просто long,
 * в новых это StarsAmount { amount, nanos }.
 */
export type RawStarsAmount = RawLong | { amount: RawLong; nanos?: number };

function longToNumber(v: RawLong): number {
    return typeof v === "number" ? v : v.toJSNumber();
}

export function toStarsAmount(raw: RawStarsAmount | null | undefined): StarsAmount {
    if (raw == null) return { amount: 0, nanos: 0 };
    if (typeof raw === "object" && "amount" in raw) {
        return { amount: longToNumber(raw.amount), nanos: raw.nanos ?? 0 };
    }
    return { amount: longToNumber(raw), nanos: 0 };
}

export function starsValue(v: StarsAmount): number {
    return v.amount + v.nanos / NANOS_PER_STAR;
}

export function isAffordable(balance: number, price: number): boolean {
    return balance >= price;
}

export function formatStars(v: number): string {
    return v.toFixed(0);
}
