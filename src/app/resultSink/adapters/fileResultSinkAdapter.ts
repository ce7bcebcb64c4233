/**
 * Адаптер для записи результатов в текстовые файлы
 * Только дозапись, без дедупликации: повторные прогоны дублируют строки
 */

import { createLogger } from '../../../shared/utils/logger';
import { appendLine, ensureFile } from '../../../shared/utils/helpers';
import { IResultSink, IResultSinkPaths } from '../interfaces/IResultSink';

const log = createLogger('ResultSink');

/**
 * Строка файла рабочих аккаунтов
 */
export function formatValidLine(_account: string, _expiresAt: string): string {
    return `${_account} (Expires at: ${_expiresAt})`;
}

export class FileResultSinkAdapter implements IResultSink {
    private readonly p_paths: IResultSinkPaths;

    constructor(_paths: IResultSinkPaths) {
        this.p_paths = { ..._paths };
    }

    async initializeAsync(): Promise<void> {
        for (const filePath of [this.p_paths.validFile, this.p_paths.deviceLimitFile]) {
            if (await ensureFile(filePath)) {
                log.info(`Создан пустой файл: ${filePath}`);
            }
        }
    }

    async recordValidAsync(_account: string, _expiresAt: string): Promise<void> {
        await appendLine(this.p_paths.validFile, formatValidLine(_account, _expiresAt));
    }

    async recordDeviceLimitAsync(_account: string): Promise<void> {
        await appendLine(this.p_paths.deviceLimitFile, _account);
    }
}
