import type { GiftOffer } from "./types.js";

export function isEligible(offer: GiftOffer, maxPrice: number): boolean {
    if (!offer.limited || offer.soldOut) return false;
    if (offer.availabilityRemains !== undefined && offer.availabilityRemains <= 0) return false;
    return offer.price <= maxPrice;
}

/**
 * Отбирает подарки, которые можно купить, от дешёвых к дорогим.
 * При равной цене сохраняется порядок каталога (Array.prototype.sort стабилен).
 */
export function selectCandidates(offers: readonly GiftOffer[], maxPrice: number): GiftOffer[] {
    return offers
        .filter(offer => isEligible(offer, maxPrice))
        .sort((a, b) => a.price - b.price);
}
