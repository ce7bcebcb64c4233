/**
 * Модуль запуска внешнего VPN клиента
 */

export * from './interfaces/ICommandExecutor';
export * from './services/commandExecutorService';
export * from './adapters/spawnProcessLauncher';
