/**
 * Утилита для форматированного вывода логов
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const p_levelPriority: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Уровень читается из env при каждом вызове
 */
function resolveLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL || '').trim().toLowerCase();
    if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
        return raw;
    }
    return 'info';
}

function isEnabled(_level: Exclude<LogLevel, 'silent'>): boolean {
    return p_levelPriority[_level] >= p_levelPriority[resolveLevel()];
}

/**
 * Дублирование строки в LOG_FILE (если задан)
 */
function writeToLogFile(_level: string, _line: string): void {
    const logFile = process.env.LOG_FILE;
    if (!logFile) return;

    try {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
        fs.appendFileSync(logFile, `${new Date().toISOString()} - ${_level.toUpperCase()} - ${_line}\n`, 'utf-8');
    } catch (error) {
        console.error(`Не удалось записать лог в ${logFile}:`, error);
    }
}

function emit(_level: Exclude<LogLevel, 'silent'>, _line: string): void {
    if (!isEnabled(_level)) return;

    if (_level === 'error') {
        console.error(_line);
    } else if (_level === 'warn') {
        console.warn(_line);
    } else {
        console.log(_line);
    }
    writeToLogFile(_level, _line);
}

function formatMeta(_meta?: Record<string, unknown>): string {
    if (!_meta || Object.keys(_meta).length === 0) return '';
    return ` ${JSON.stringify(_meta)}`;
}

export class Logger {
    /**
     * Информационное сообщение
     */
    static info(message: string): void {
        emit('info', `ℹ️  ${message}`);
    }

    /**
     * Успешная операция
     */
    static success(message: string): void {
        emit('info', `✅ ${message}`);
    }

    /**
     * Ошибка
     */
    static error(message: string, error?: unknown): void {
        emit('error', `❌ ${message}`);
        if (error !== undefined && isEnabled('error')) {
            console.error(error);
        }
    }

    /**
     * Предупреждение
     */
    static warn(message: string): void {
        emit('warn', `⚠️  ${message}`);
    }

    /**
     * Секция/заголовок
     */
    static section(message: string): void {
        emit('info', `\n${'═'.repeat(60)}\n  ${message}\n${'═'.repeat(60)}`);
    }

    /**
     * Строка таблицы результатов
     */
    static action(
        counters: string,
        account: string,
        status: string,
        result: string
    ): void {
        const maxResultLength = 60;
        const truncatedResult = result.length > maxResultLength
            ? result.substring(0, maxResultLength) + '...'
            : result;

        emit('info', `${counters.padEnd(9)} | ${account.padEnd(18)} | ${status.padEnd(8)} | ${truncatedResult}`);
    }
}

export interface IScopedLogger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    success(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
    operationStart(operation: string, meta?: Record<string, unknown>): void;
    operationEnd(operation: string, startTime: number, meta?: Record<string, unknown>): void;
}

/**
 * Логгер с префиксом модуля
 *
 * @example
 * const log = createLogger('BatchWorker');
 * log.info('Старт пакета', { total: 10 });
 */
export function createLogger(scope: string): IScopedLogger {
    const prefix = `[${scope}]`;

    return {
        debug(message, meta) {
            emit('debug', `🔎 ${prefix} ${message}${formatMeta(meta)}`);
        },
        info(message, meta) {
            emit('info', `ℹ️  ${prefix} ${message}${formatMeta(meta)}`);
        },
        success(message, meta) {
            emit('info', `✅ ${prefix} ${message}${formatMeta(meta)}`);
        },
        warn(message, meta) {
            emit('warn', `⚠️  ${prefix} ${message}${formatMeta(meta)}`);
        },
        error(message, error, meta) {
            const details = error instanceof Error
                ? `: ${error.message}`
                : error !== undefined ? `: ${String(error)}` : '';
            emit('error', `❌ ${prefix} ${message}${details}${formatMeta(meta)}`);
        },
        operationStart(operation, meta) {
            emit('debug', `▶️  ${prefix} ${operation}${formatMeta(meta)}`);
        },
        operationEnd(operation, startTime, meta) {
            emit('debug', `⏹️  ${prefix} ${operation} (${Date.now() - startTime}мс)${formatMeta(meta)}`);
        }
    };
}
