/**
 * Интерфейсы для записи результатов проверки
 */

export interface IResultSink {
    /**
     * Создание файлов результатов, если их нет
     */
    initializeAsync(): Promise<void>;

    /**
     * Рабочий аккаунт: "<account> (Expires at: <YYYY-MM-DD>)"
     */
    recordValidAsync(_account: string, _expiresAt: string): Promise<void>;

    /**
     * Аккаунт с превышенным лимитом устройств
     */
    recordDeviceLimitAsync(_account: string): Promise<void>;
}

export interface IResultSinkPaths {
    validFile: string;
    deviceLimitFile: string;
}
