/**
 * Интерфейсы для запуска внешнего VPN клиента
 */

/**
 * Команда в виде исполняемого файла и аргументов (без shell)
 */
export interface ICommandSpec {
    executable: string;
    args: string[];
}

export interface ICommandResult {
    stdout: string;
    stderr: string;
}

/**
 * Сырые данные завершившегося процесса
 */
export interface IProcessOutcome {
    exitCode: number | null;
    signal: string | null;
    stdout: string;
    stderr: string;
    /** Ошибка запуска (ENOENT, таймаут и т.д.) */
    spawnError?: Error;
}

export interface IProcessLaunchOptions {
    env: NodeJS.ProcessEnv;
    /** 0 - без таймаута */
    timeoutMs: number;
}

/**
 * Низкоуровневый запуск процесса
 */
export interface IProcessLauncher {
    launchAsync(_command: ICommandSpec, _options: IProcessLaunchOptions): Promise<IProcessOutcome>;
}

export interface ICommandExecutorOptions {
    /** Переменные, добавляемые к каждому запуску (например, прокси) */
    baseEnvOverrides?: Record<string, string>;
    /** Таймаут одного запуска в мс, 0 - без таймаута */
    timeoutMs?: number;
    launcher?: IProcessLauncher;
}

export interface ICommandExecutor {
    /**
     * Запуск команды с дополнительными переменными окружения
     *
     * @throws ExecutionError при ненулевом коде выхода или ошибке запуска
     */
    runAsync(_command: ICommandSpec, _envOverrides?: Record<string, string>): Promise<ICommandResult>;
}
