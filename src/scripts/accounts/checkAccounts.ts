/**
 * Проверка аккаунтов из файла без интерактивных вопросов
 * Все настройки берутся из .env (см. .env.example)
 *
 * Запуск: npm run check
 */

import { loadConfig } from '../../config';
import { Logger } from '../../shared/utils/logger';
import { ProxyConfig } from '../../shared/utils/proxyParser';
import { loadAccountsFromFile, ensureFile } from '../../shared/utils/helpers';
import { CheckSessionService } from '../../app/checkSession';

async function main() {
    const config = loadConfig();
    const proxy = ProxyConfig.parse(config.proxy.raw, config.proxy.kind);

    if (await ensureFile(config.paths.inputFile)) {
        Logger.warn(`Создан пустой входной файл: ${config.paths.inputFile}`);
    }

    const accounts = await loadAccountsFromFile(config.paths.inputFile);
    Logger.info(`Загружено ${accounts.length} аккаунтов из ${config.paths.inputFile}`);

    if (accounts.length === 0) {
        Logger.warn(`Нет аккаунтов в ${config.paths.inputFile}`);
        return;
    }

    const session = new CheckSessionService();
    const result = await session.runAsync({
        accounts,
        paths: config.paths,
        proxy,
        pacing: config.pacing,
        client: config.client,
        commandTimeoutMs: config.commandTimeoutMs,
        dryRun: config.dryRun,
        checkProxyFirst: config.proxy.checkFirst,
        reportFile: config.reportFile,
        handleSignals: true
    });

    if (result.summary.state === 'cancelled') {
        process.exitCode = 130;
    }
}

main().catch((error) => {
    Logger.error('Проверка прервана', error);
    process.exitCode = 1;
});
