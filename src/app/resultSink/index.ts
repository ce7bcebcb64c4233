/**
 * Модуль записи результатов проверки
 */

export * from './interfaces/IResultSink';
export * from './adapters/fileResultSinkAdapter';
export * from './adapters/memoryResultSinkAdapter';
