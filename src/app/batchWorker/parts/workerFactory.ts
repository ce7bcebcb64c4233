/**
 * Сборка воркера: прокси -> исполнитель -> валидатор -> воркер
 */

import { ProxyConfig } from '../../../shared/utils/proxyParser';
import {
    CommandExecutorService,
    ICommandExecutor,
    ICommandSpec,
    IProcessLauncher
} from '../../commandExecutor';
import { AccountValidatorService, buildClientCommands, ILoginRule } from '../../accountValidator';
import { IRateLimiterOptions, RateLimiterService } from '../../rateLimiter';
import { IResultSink } from '../../resultSink';
import { BatchWorkerService } from '../services/batchWorkerService';

export interface IBatchWorkerFactoryOptions {
    sink: IResultSink;
    proxy?: ProxyConfig | null;
    pacing?: Partial<IRateLimiterOptions>;
    client?: ICommandSpec;
    commandTimeoutMs?: number;
    loginRules?: readonly ILoginRule[];
    launcher?: IProcessLauncher;
    /** Готовый исполнитель вместо CommandExecutorService */
    executor?: ICommandExecutor;
    now?: () => Date;
}

export function createBatchWorker(_options: IBatchWorkerFactoryOptions): BatchWorkerService {
    const executor = _options.executor ?? new CommandExecutorService({
        baseEnvOverrides: _options.proxy ? _options.proxy.environmentOverrides() : {},
        timeoutMs: _options.commandTimeoutMs,
        launcher: _options.launcher
    });

    const validator = new AccountValidatorService(executor, _options.sink, {
        commands: buildClientCommands(_options.client),
        loginRules: _options.loginRules,
        now: _options.now
    });

    return new BatchWorkerService(validator, new RateLimiterService(_options.pacing));
}
