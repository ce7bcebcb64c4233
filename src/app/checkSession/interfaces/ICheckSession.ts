/**
 * Интерфейсы сеанса проверки (консольный запуск)
 */

import { ProxyConfig } from '../../../shared/utils/proxyParser';
import { ICommandSpec, IProcessLauncher } from '../../commandExecutor/interfaces/ICommandExecutor';
import { IRateLimiterOptions } from '../../rateLimiter/interfaces/IRateLimiter';
import { IResultSinkPaths } from '../../resultSink/interfaces/IResultSink';
import { IBatchSummary, IClassificationOutcome } from '../../batchWorker/interfaces/IBatchWorker';

export interface ICheckSessionOptions {
    accounts: readonly string[];
    paths: IResultSinkPaths;
    proxy?: ProxyConfig | null;
    pacing?: Partial<IRateLimiterOptions>;
    client?: ICommandSpec;
    commandTimeoutMs?: number;
    /** Не писать в файлы результатов */
    dryRun?: boolean;
    /** Проверить прокси перед запуском */
    checkProxyFirst?: boolean;
    /** Файл для сохранения отчета "<account> - <status> - <message>" */
    reportFile?: string;
    /** Остановка по Ctrl+C */
    handleSignals?: boolean;
    launcher?: IProcessLauncher;
    now?: () => Date;
}

export interface ICheckSessionResult {
    summary: IBatchSummary;
    outcomes: IClassificationOutcome[];
    reportFile?: string;
}
