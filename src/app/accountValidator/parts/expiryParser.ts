/**
 * Извлечение даты окончания подписки из вывода "account get"
 */

import { ParseError } from '../../../shared/errors';

const EXPIRY_PATTERN = /Expires at:\s+(\d{4}-\d{2}-\d{2})/;

/**
 * Дата в формате YYYY-MM-DD или null, если строки нет
 */
export function extractExpiryDate(_output: string): string | null {
    const match = _output.match(EXPIRY_PATTERN);
    return match ? match[1] : null;
}

/**
 * Конец указанного дня по UTC (23:59:59.999)
 *
 * @throws ParseError для несуществующей даты
 */
export function parseExpiryEndOfDay(_date: string): Date {
    const match = _date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) {
        throw new ParseError(`Некорректный формат даты: "${_date}"`);
    }

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const result = new Date(Date.UTC(year, month - 1, day, 23, 59, 59, 999));

    // Date.UTC переносит 2025-02-30 на март
    if (result.getUTCFullYear() !== year || result.getUTCMonth() !== month - 1 || result.getUTCDate() !== day) {
        throw new ParseError(`Несуществующая дата: "${_date}"`);
    }

    return result;
}

/**
 * Аккаунт действителен, пока не прошел конец дня окончания
 */
export function isNotExpired(_expiry: Date, _now: Date): boolean {
    return _expiry.getTime() >= _now.getTime();
}
