/**
 * Запуск процесса через child_process.spawn
 */

import { spawn } from 'child_process';
import {
    ICommandSpec,
    IProcessLauncher,
    IProcessLaunchOptions,
    IProcessOutcome
} from '../interfaces/ICommandExecutor';

export class SpawnProcessLauncher implements IProcessLauncher {
    launchAsync(_command: ICommandSpec, _options: IProcessLaunchOptions): Promise<IProcessOutcome> {
        return new Promise((resolve) => {
            let stdout = '';
            let stderr = '';
            let spawnError: Error | undefined;
            let timer: NodeJS.Timeout | undefined;
            let settled = false;

            const child = spawn(_command.executable, _command.args, {
                env: _options.env,
                // без stdin: запрос ввода сразу получает EOF
                stdio: ['ignore', 'pipe', 'pipe'],
                shell: false,
                windowsHide: true
            });

            child.stdout.setEncoding('utf-8');
            child.stderr.setEncoding('utf-8');
            child.stdout.on('data', (chunk: string) => {
                stdout += chunk;
            });
            child.stderr.on('data', (chunk: string) => {
                stderr += chunk;
            });

            if (_options.timeoutMs > 0) {
                timer = setTimeout(() => {
                    spawnError = new Error(`Команда не завершилась за ${_options.timeoutMs}мс`);
                    child.kill('SIGKILL');
                }, _options.timeoutMs);
            }

            const finish = (_code: number | null, _signal: string | null) => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                resolve({
                    exitCode: _code,
                    signal: _signal,
                    stdout,
                    stderr,
                    spawnError
                });
            };

            child.on('error', (error) => {
                spawnError = spawnError ?? error;
                // процесс так и не запустился - 'close' может не прийти
                if (child.pid === undefined) {
                    finish(null, null);
                }
            });

            child.once('close', (code, signal) => {
                finish(code, signal);
            });
        });
    }
}
