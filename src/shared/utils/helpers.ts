/**
 * Вспомогательные функции для работы с файлами и данными
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, getErrorMessage } from '../errors';

/**
 * Разбирает список аккаунтов: по одному на строку, пустые строки и комментарии пропускаются
 */
export function parseAccountsList(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Загружает список аккаунтов из файла
 */
export async function loadAccountsFromFile(filePath: string): Promise<string[]> {
    try {
        const content = await fs.readFile(filePath, 'utf-8');
        return parseAccountsList(content);
    } catch (error) {
        throw new ConfigError(`Ошибка при загрузке файла ${filePath}: ${getErrorMessage(error)}`);
    }
}

/**
 * Проверяет существование файла
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Создает директорию если её нет
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
    try {
        await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
        throw new Error(`Ошибка при создании директории ${dirPath}: ${getErrorMessage(error)}`);
    }
}

/**
 * Создает пустой файл (и его директорию), если его нет
 *
 * @returns true, если файл был создан
 */
export async function ensureFile(filePath: string): Promise<boolean> {
    await ensureDirectory(path.dirname(filePath));

    if (await fileExists(filePath)) {
        return false;
    }

    // 'a' - существующее содержимое не затирается
    await fs.writeFile(filePath, '', { flag: 'a' });
    return true;
}

/**
 * Дописывает строку в конец файла
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
    await fs.appendFile(filePath, `${line}\n`, 'utf-8');
}

/**
 * Форматирует дату для имени файла
 */
export function formatDateForFilename(date: Date = new Date()): string {
    return date.toISOString().replace(/[:.]/g, '-').slice(0, -5);
}

/**
 * Форматирует длительность в мс для вывода
 */
export function formatDuration(ms: number): string {
    const totalSeconds = Math.floor(ms / 1000);
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;

    if (minutes > 0) return `${minutes}м ${seconds}с`;
    return `${seconds}с`;
}
