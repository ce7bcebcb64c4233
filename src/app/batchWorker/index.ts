/**
 * Модуль пакетной проверки аккаунтов
 *
 * @example
 * import { createBatchWorker } from '../../app/batchWorker';
 *
 * const worker = createBatchWorker({ sink, proxy, pacing: { preCheckDelayMs: 2000 } });
 * worker.subscribe(event => { ... });
 * const summary = await worker.startAsync(accounts);
 */

export * from './interfaces/IBatchWorker';
export * from './services/batchWorkerService';
export * from './parts/outcomeMapping';
export * from './parts/workerFactory';
