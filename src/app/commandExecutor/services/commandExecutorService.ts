/**
 * Сервис запуска внешнего VPN клиента
 * Окружение дочернего процесса = копия process.env + переопределения (прокси)
 */

import { createLogger } from '../../../shared/utils/logger';
import { ExecutionError } from '../../../shared/errors';
import {
    ICommandExecutor,
    ICommandExecutorOptions,
    ICommandResult,
    ICommandSpec,
    IProcessLauncher
} from '../interfaces/ICommandExecutor';
import { SpawnProcessLauncher } from '../adapters/spawnProcessLauncher';

const log = createLogger('CommandExecutor');

/**
 * Строка команды для логов
 */
export function formatCommand(_command: ICommandSpec): string {
    return [_command.executable, ..._command.args].join(' ');
}

export class CommandExecutorService implements ICommandExecutor {
    private readonly p_launcher: IProcessLauncher;
    private readonly p_baseEnvOverrides: Record<string, string>;
    private readonly p_timeoutMs: number;

    constructor(_options: ICommandExecutorOptions = {}) {
        this.p_launcher = _options.launcher ?? new SpawnProcessLauncher();
        this.p_baseEnvOverrides = { ..._options.baseEnvOverrides };
        this.p_timeoutMs = _options.timeoutMs ?? 0;
    }

    /**
     * Окружение для дочернего процесса
     */
    buildEnvironment(_envOverrides: Record<string, string> = {}): NodeJS.ProcessEnv {
        return {
            ...process.env,
            ...this.p_baseEnvOverrides,
            ..._envOverrides
        };
    }

    async runAsync(_command: ICommandSpec, _envOverrides: Record<string, string> = {}): Promise<ICommandResult> {
        const startTime = Date.now();
        const commandLine = formatCommand(_command);
        log.operationStart('RunCommand', { command: commandLine });

        const outcome = await this.p_launcher.launchAsync(_command, {
            env: this.buildEnvironment(_envOverrides),
            timeoutMs: this.p_timeoutMs
        });

        if (outcome.spawnError || outcome.exitCode !== 0) {
            const reason = outcome.stderr.trim()
                || outcome.spawnError?.message
                || (outcome.signal ? `завершена сигналом ${outcome.signal}` : `код выхода ${outcome.exitCode}`);

            log.error(`Ошибка выполнения команды "${commandLine}": ${reason}`);

            throw new ExecutionError(`Ошибка выполнения команды: ${reason}`, {
                exitCode: outcome.exitCode,
                signal: outcome.signal,
                stdout: outcome.stdout,
                stderr: outcome.stderr
            });
        }

        log.operationEnd('RunCommand', startTime, { command: commandLine });

        return {
            stdout: outcome.stdout,
            stderr: outcome.stderr
        };
    }
}
