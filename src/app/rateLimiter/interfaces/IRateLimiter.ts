/**
 * Паузы между проверками аккаунтов
 */

export interface IRateLimiterOptions {
    /** Пауза перед каждой проверкой (мс) */
    preCheckDelayMs: number;
    /** Дополнительная пауза после проверки (мс) */
    postCheckDelayMs: number;
}

export const DEFAULT_RATE_LIMITER_OPTIONS: IRateLimiterOptions = {
    preCheckDelayMs: 2000,
    postCheckDelayMs: 1000
};

export interface IRateLimiter {
    /**
     * @returns false, если ожидание прервано сигналом
     */
    waitBeforeCheckAsync(_signal?: AbortSignal): Promise<boolean>;
    waitAfterCheckAsync(_signal?: AbortSignal): Promise<boolean>;
}
