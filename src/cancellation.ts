import { CancelledError } from "./errors.js";

/**
 * Пауза, которую можно прервать через signal.
 * true - проспали весь интервал, false - прервано остановкой.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>(resolve => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Ждёт запрос, но отпускает вызывающего сразу при остановке.
 * Сам запрос не отменяется, его результат просто отбрасывается.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        // Запрос уже ушёл: его ошибка никому не нужна, но и необработанной быть не должна
        promise.catch(() => undefined);
        return Promise.reject(new CancelledError());
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CancelledError());
        signal.addEventListener("abort", onAbort, { once: true });
        promise.then(
            value => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(err);
            },
        );
    });
}
