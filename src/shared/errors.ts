/**
 * Типизированные ошибки чекера
 *
 * ConfigError и его наследники прерывают запуск до старта пакета,
 * остальные превращаются в результат проверки конкретного аккаунта.
 */

/**
 * Некорректная конфигурация (прокси, переменные окружения, входной файл)
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Неподдерживаемый тип прокси
 */
export class UnsupportedProxyKindError extends ConfigError {
    readonly kind: string;

    constructor(_kind: string) {
        super(`Неподдерживаемый тип прокси: ${_kind}`);
        this.name = 'UnsupportedProxyKindError';
        this.kind = _kind;
    }
}

export interface IExecutionErrorDetails {
    exitCode: number | null;
    signal?: string | null;
    stdout: string;
    stderr: string;
}

/**
 * Внешний процесс завершился с ошибкой или не запустился
 */
export class ExecutionError extends Error {
    readonly exitCode: number | null;
    readonly signal: string | null;
    readonly stdout: string;
    readonly stderr: string;

    constructor(message: string, _details: IExecutionErrorDetails) {
        super(message);
        this.name = 'ExecutionError';
        this.exitCode = _details.exitCode;
        this.signal = _details.signal ?? null;
        this.stdout = _details.stdout;
        this.stderr = _details.stderr;
    }

    /**
     * Весь захваченный вывод процесса
     */
    get output(): string {
        return [this.stdout, this.stderr].filter(part => part.length > 0).join('\n');
    }
}

/**
 * Не удалось извлечь или разобрать дату окончания подписки
 */
export class ParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ParseError';
    }
}

/**
 * Пустой номер аккаунта
 */
export class EmptyInputError extends Error {
    constructor(message: string = 'Пустой номер аккаунта') {
        super(message);
        this.name = 'EmptyInputError';
    }
}

/**
 * Недопустимый переход состояния воркера
 */
export class WorkerStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkerStateError';
    }
}

/**
 * Текст ошибки для логов и результатов
 */
export function getErrorMessage(_error: unknown): string {
    if (_error instanceof Error) {
        return _error.message;
    }
    return String(_error);
}
