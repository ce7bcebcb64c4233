/**
 * Лимитер с фиксированными задержками до и после проверки
 * Ожидание прерывается через AbortSignal, чтобы остановка не ждала всю паузу
 */

import { setTimeout as sleep } from 'timers/promises';
import { createLogger } from '../../../shared/utils/logger';
import { DEFAULT_RATE_LIMITER_OPTIONS, IRateLimiter, IRateLimiterOptions } from '../interfaces/IRateLimiter';

const log = createLogger('RateLimiter');

function isAbortError(_error: unknown): boolean {
    return _error instanceof Error && _error.name === 'AbortError';
}

/**
 * Пауза, которую можно прервать
 *
 * @returns false, если ожидание прервано
 */
export async function waitAsync(_ms: number, _signal?: AbortSignal): Promise<boolean> {
    if (_signal?.aborted) return false;
    if (_ms <= 0) return true;

    try {
        await sleep(_ms, undefined, { signal: _signal });
        return true;
    } catch (error) {
        if (isAbortError(error)) {
            return false;
        }
        throw error;
    }
}

export class RateLimiterService implements IRateLimiter {
    private readonly p_options: IRateLimiterOptions;

    constructor(_options: Partial<IRateLimiterOptions> = {}) {
        this.p_options = { ...DEFAULT_RATE_LIMITER_OPTIONS, ..._options };

        if (this.p_options.preCheckDelayMs < 0 || this.p_options.postCheckDelayMs < 0) {
            throw new RangeError('Задержки лимитера не могут быть отрицательными');
        }
    }

    async waitBeforeCheckAsync(_signal?: AbortSignal): Promise<boolean> {
        if (this.p_options.preCheckDelayMs > 0) {
            log.debug(`Жду ${this.p_options.preCheckDelayMs}мс перед проверкой`);
        }
        return waitAsync(this.p_options.preCheckDelayMs, _signal);
    }

    async waitAfterCheckAsync(_signal?: AbortSignal): Promise<boolean> {
        return waitAsync(this.p_options.postCheckDelayMs, _signal);
    }
}
