/**
 * Проверка прокси из .env (PROXY, PROXY_TYPE)
 *
 * SOCKS4/SOCKS5 - соединение через прокси, HTTP/HTTPS - доступность самого прокси
 *
 * Запуск: npm run test:proxy
 */

import { loadConfig } from '../../config';
import { Logger } from '../../shared/utils/logger';
import { ProxyConfig } from '../../shared/utils/proxyParser';
import { checkProxyHealth, formatHealthResult } from '../../shared/utils/proxyChecker';

async function main() {
    console.log('\n🔍 ТЕСТ ПРОКСИ СОЕДИНЕНИЯ\n');

    const config = loadConfig();
    const proxy = ProxyConfig.parse(config.proxy.raw, config.proxy.kind);

    if (!proxy) {
        console.log('❌ Прокси не настроен');
        console.log('   Добавьте прокси в .env файл в формате:');
        console.log('   PROXY=proxy.example.com:1080:user:pass');
        console.log('   PROXY_TYPE=socks5');
        process.exitCode = 1;
        return;
    }

    console.log(`Проверка ${proxy.describe()}${proxy.hasCredentials ? ' (с авторизацией)' : ''}...`);
    const health = await checkProxyHealth(proxy, 15000);
    console.log(formatHealthResult(health, proxy.describe()));

    if (!health.alive) {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    Logger.error('Ошибка проверки прокси', error);
    process.exitCode = 1;
});
