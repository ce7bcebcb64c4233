/**
 * Сеанс проверки для консоли: файлы результатов, прокси, вывод прогресса, отчет
 */

import { Logger, createLogger } from '../../../shared/utils/logger';
import { ConfigError } from '../../../shared/errors';
import { checkProxyHealth, formatHealthResult } from '../../../shared/utils/proxyChecker';
import { FileResultSinkAdapter, IResultSink, MemoryResultSinkAdapter } from '../../resultSink';
import { createBatchWorker, IClassificationOutcome } from '../../batchWorker';
import { DEFAULT_RATE_LIMITER_OPTIONS } from '../../rateLimiter';
import { ICheckSessionOptions, ICheckSessionResult } from '../interfaces/ICheckSession';
import { OutcomeReportAdapter } from '../adapters/outcomeReportAdapter';

const log = createLogger('CheckSession');

const p_categoryIcons: Record<IClassificationOutcome['category'], string> = {
    Valid: '✅',
    Invalid: '❌',
    Error: '⚠️'
};

export class CheckSessionService {
    private readonly p_report = new OutcomeReportAdapter();

    async runAsync(_options: ICheckSessionOptions): Promise<ICheckSessionResult> {
        Logger.section('ПРОВЕРКА VPN АККАУНТОВ');
        Logger.info(`Аккаунтов: ${_options.accounts.length}`);
        Logger.info(`Прокси: ${_options.proxy ? _options.proxy.describe() : 'отключен'}`);
        const pacing = { ...DEFAULT_RATE_LIMITER_OPTIONS, ..._options.pacing };
        Logger.info(`Задержка: ${pacing.preCheckDelayMs}мс до проверки, ${pacing.postCheckDelayMs}мс после`);
        if (_options.dryRun) {
            Logger.warn('Тестовый режим: файлы результатов не изменяются');
        }

        if (_options.proxy && _options.checkProxyFirst) {
            const health = await checkProxyHealth(_options.proxy);
            Logger.info(formatHealthResult(health, _options.proxy.describe()));
            if (!health.alive) {
                throw new ConfigError(`Прокси недоступен: ${health.error}`);
            }
        }

        const sink: IResultSink = _options.dryRun
            ? new MemoryResultSinkAdapter()
            : new FileResultSinkAdapter(_options.paths);
        await sink.initializeAsync();

        const worker = createBatchWorker({
            sink,
            proxy: _options.proxy,
            pacing: _options.pacing,
            client: _options.client,
            commandTimeoutMs: _options.commandTimeoutMs,
            launcher: _options.launcher,
            now: _options.now
        });

        const outcomes: IClassificationOutcome[] = [];
        const unsubscribe = worker.subscribe((event) => {
            if (event.type === 'outcome') {
                outcomes.push(event.outcome);
                const { outcome } = event;
                Logger.action(
                    `[${event.index}/${event.total}]`,
                    outcome.account || '(пусто)',
                    `${p_categoryIcons[outcome.category]} ${outcome.category}`,
                    outcome.message
                );
            }
        });

        const onSigint = () => {
            Logger.warn('Остановка после текущего аккаунта... (повторный Ctrl+C - выход)');
            worker.stop();
        };
        if (_options.handleSignals) {
            process.once('SIGINT', onSigint);
        }

        try {
            const summary = await worker.startAsync(_options.accounts);
            Logger.info(`\n${this.p_report.formatSummary(summary)}`);

            let reportFile: string | undefined;
            if (_options.reportFile && outcomes.length > 0) {
                reportFile = await this.p_report.exportAsync(outcomes, _options.reportFile);
                Logger.success(`Отчет сохранен: ${reportFile}`);
            }

            if (!_options.dryRun) {
                log.info(`Рабочие аккаунты: ${_options.paths.validFile}`);
                log.info(`Лимит устройств: ${_options.paths.deviceLimitFile}`);
            }

            return { summary, outcomes, reportFile };
        } finally {
            unsubscribe();
            process.removeListener('SIGINT', onSigint);
        }
    }
}
