/**
 * Последовательная проверка списка аккаунтов
 *
 * idle -> running -> completed | cancelled
 * Только один поток: клиент держит одну сессию, параллельные входы ломают друг друга.
 * Остановка проверяется между аккаунтами, запущенная команда всегда доходит до конца.
 */

import { createLogger } from '../../../shared/utils/logger';
import { WorkerStateError, getErrorMessage } from '../../../shared/errors';
import { IAccountValidator } from '../../accountValidator/interfaces/IAccountValidator';
import { IRateLimiter } from '../../rateLimiter/interfaces/IRateLimiter';
import {
    BatchEvent,
    BatchEventListener,
    BatchState,
    IBatchSummary,
    IBatchWorker,
    IClassificationOutcome
} from '../interfaces/IBatchWorker';
import { errorToOutcome, rejectionToOutcome, statusToOutcome } from '../parts/outcomeMapping';

const log = createLogger('BatchWorker');

export class BatchWorkerService implements IBatchWorker {
    private readonly p_validator: IAccountValidator;
    private readonly p_rateLimiter: IRateLimiter;
    private readonly p_listeners = new Set<BatchEventListener>();
    private readonly p_abortController = new AbortController();
    private p_state: BatchState = 'idle';
    private p_stopRequested = false;
    private p_remaining: string[] = [];
    private p_runPromise: Promise<IBatchSummary> | null = null;

    constructor(_validator: IAccountValidator, _rateLimiter: IRateLimiter) {
        this.p_validator = _validator;
        this.p_rateLimiter = _rateLimiter;
    }

    get state(): BatchState {
        return this.p_state;
    }

    /**
     * Аккаунты, которые еще не проверены
     */
    get remainingAccounts(): readonly string[] {
        return [...this.p_remaining];
    }

    subscribe(_listener: BatchEventListener): () => void {
        this.p_listeners.add(_listener);
        return () => {
            this.p_listeners.delete(_listener);
        };
    }

    startAsync(_accounts: readonly string[]): Promise<IBatchSummary> {
        if (this.p_state !== 'idle') {
            return Promise.reject(new WorkerStateError(
                `Воркер уже в состоянии "${this.p_state}", для нового запуска создайте новый экземпляр`
            ));
        }

        if (_accounts.length === 0) {
            log.warn('Список аккаунтов пуст');
            this.emit({ type: 'emptyInput' });
            return Promise.resolve(this.createSummary(0, 0, { valid: 0, invalid: 0, errors: 0 }));
        }

        this.p_remaining = [..._accounts];
        this.transition('running');
        this.p_runPromise = this.runAsync(_accounts.length);
        return this.p_runPromise;
    }

    stop(): void {
        if (this.p_state !== 'running' || this.p_stopRequested) {
            return;
        }

        log.info('Запрошена остановка проверки');
        this.p_stopRequested = true;
        this.p_abortController.abort();
    }

    async stopAsync(): Promise<IBatchSummary | null> {
        this.stop();
        return this.p_runPromise;
    }

    private async runAsync(_total: number): Promise<IBatchSummary> {
        const startTime = Date.now();
        const signal = this.p_abortController.signal;
        const counters = { valid: 0, invalid: 0, errors: 0 };
        let processed = 0;

        log.operationStart('Batch', { total: _total });

        while (this.p_remaining.length > 0 && !this.p_stopRequested) {
            const proceed = await this.p_rateLimiter.waitBeforeCheckAsync(signal);
            if (!proceed || this.p_stopRequested) {
                break;
            }

            const account = this.p_remaining[0];
            const outcome = await this.processAccountAsync(account);
            this.p_remaining.shift();
            processed++;

            if (outcome.category === 'Valid') counters.valid++;
            else if (outcome.category === 'Invalid') counters.invalid++;
            else counters.errors++;

            this.emit({ type: 'outcome', outcome, index: processed, total: _total });

            await this.p_rateLimiter.waitAfterCheckAsync(signal);
        }

        if (this.p_stopRequested) {
            // не оставляем клиент залогиненным
            const loggedOut = await this.safeLogoutAsync();
            log.info(`Проверка остановлена (${processed}/${_total})`, { loggedOut });
            this.transition('cancelled');
        } else {
            this.transition('completed');
        }

        const summary = this.createSummary(_total, processed, counters, Date.now() - startTime);
        log.operationEnd('Batch', startTime, { ...summary });
        this.emit({ type: 'finished', summary });
        return summary;
    }

    /**
     * Полная проверка одного аккаунта. Никогда не бросает исключений
     */
    private async processAccountAsync(_account: string): Promise<IClassificationOutcome> {
        try {
            const setResult = await this.p_validator.setAccountAsync(_account);

            if (!setResult.accepted) {
                return rejectionToOutcome(_account, setResult);
            }

            try {
                const status = await this.p_validator.getValidityAsync(_account);
                return statusToOutcome(_account, status);
            } finally {
                await this.p_validator.logoutAsync();
            }
        } catch (error) {
            log.error(`Ошибка проверки аккаунта ${_account}`, error);
            return errorToOutcome(_account, getErrorMessage(error));
        }
    }

    private async safeLogoutAsync(): Promise<boolean> {
        try {
            return await this.p_validator.logoutAsync();
        } catch (error) {
            log.warn(`Не удалось выйти из аккаунта при остановке: ${getErrorMessage(error)}`);
            return false;
        }
    }

    private transition(_state: BatchState): void {
        this.p_state = _state;
        this.emit({ type: 'state', state: _state });
    }

    private emit(_event: BatchEvent): void {
        for (const listener of [...this.p_listeners]) {
            try {
                listener(_event);
            } catch (error) {
                log.error(`Ошибка в обработчике события "${_event.type}"`, error);
            }
        }
    }

    private createSummary(
        _total: number,
        _processed: number,
        _counters: { valid: number; invalid: number; errors: number },
        _durationMs: number = 0
    ): IBatchSummary {
        return {
            state: this.p_state,
            total: _total,
            processed: _processed,
            valid: _counters.valid,
            invalid: _counters.invalid,
            errors: _counters.errors,
            durationMs: _durationMs
        };
    }
}
