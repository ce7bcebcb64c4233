/**
 * Хранение результатов в памяти (тестовый режим без записи на диск)
 */

import { IResultSink } from '../interfaces/IResultSink';
import { formatValidLine } from './fileResultSinkAdapter';

export class MemoryResultSinkAdapter implements IResultSink {
    readonly validLines: string[] = [];
    readonly deviceLimitLines: string[] = [];

    async initializeAsync(): Promise<void> {
        // файлов нет
    }

    async recordValidAsync(_account: string, _expiresAt: string): Promise<void> {
        this.validLines.push(formatValidLine(_account, _expiresAt));
    }

    async recordDeviceLimitAsync(_account: string): Promise<void> {
        this.deviceLimitLines.push(_account);
    }
}
