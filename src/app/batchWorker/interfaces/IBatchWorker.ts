/**
 * Интерфейсы пакетной проверки аккаунтов
 */

import { RejectionReason } from '../../accountValidator/interfaces/IAccountValidator';

export type OutcomeCategory = 'Valid' | 'Invalid' | 'Error';

/**
 * Результат проверки одного аккаунта - единственный контракт с UI
 */
export interface IClassificationOutcome {
    account: string;
    category: OutcomeCategory;
    message: string;
    /** Причина отказа во входе, если была */
    reason?: RejectionReason;
    /** Дата окончания YYYY-MM-DD для проверенных аккаунтов */
    expiresAt?: string;
}

export type BatchState = 'idle' | 'running' | 'completed' | 'cancelled';

export interface IBatchSummary {
    state: BatchState;
    total: number;
    processed: number;
    valid: number;
    invalid: number;
    errors: number;
    durationMs: number;
}

export type BatchEvent =
    | { type: 'state'; state: BatchState }
    | { type: 'outcome'; outcome: IClassificationOutcome; index: number; total: number }
    | { type: 'emptyInput' }
    | { type: 'finished'; summary: IBatchSummary };

export type BatchEventListener = (_event: BatchEvent) => void;

export interface IBatchWorker {
    readonly state: BatchState;

    /**
     * Подписка на события. Возвращает функцию отписки
     */
    subscribe(_listener: BatchEventListener): () => void;

    /**
     * Запуск проверки. Промис завершается итоговой статистикой
     */
    startAsync(_accounts: readonly string[]): Promise<IBatchSummary>;

    /**
     * Запрос остановки. Срабатывает между аккаунтами
     */
    stop(): void;

    /**
     * Остановка с ожиданием завершения текущего аккаунта
     */
    stopAsync(): Promise<IBatchSummary | null>;
}
