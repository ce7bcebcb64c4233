/**
 * Утилита для проверки доступности прокси перед запуском проверки аккаунтов
 * SOCKS - полноценное рукопожатие через прокси, HTTP/HTTPS - TCP соединение с прокси
 */

import * as net from 'net';
import { SocksClient, SocksClientOptions } from 'socks';
import { ProxyConfig } from './proxyParser';
import { getErrorMessage } from '../errors';

/**
 * Результат проверки прокси
 */
export interface IProxyHealthResult {
    alive: boolean;
    latencyMs: number;
    error?: string;
}

export interface IProxyCheckTarget {
    host: string;
    port: number;
}

const DEFAULT_TARGET: IProxyCheckTarget = {
    host: 'example.com',
    port: 80
};

function openTcpConnection(_host: string, _port: number, _timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection({ host: _host, port: _port });

        socket.setTimeout(_timeoutMs);
        socket.once('connect', () => {
            socket.destroy();
            resolve();
        });
        socket.once('timeout', () => {
            socket.destroy();
            reject(new Error('Connection timeout'));
        });
        socket.once('error', (error) => {
            socket.destroy();
            reject(error);
        });
    });
}

async function openSocksConnection(
    _proxy: ProxyConfig,
    _target: IProxyCheckTarget,
    _timeoutMs: number
): Promise<void> {
    const options: SocksClientOptions = {
        proxy: {
            host: _proxy.domain,
            port: Number(_proxy.port),
            type: _proxy.kind === 'socks4' ? 4 : 5,
            userId: _proxy.username,
            password: _proxy.password
        },
        command: 'connect',
        destination: _target,
        timeout: _timeoutMs
    };

    const { socket } = await SocksClient.createConnection(options);
    socket.destroy();
}

/**
 * Проверяет доступность прокси
 *
 * @param _timeoutMs - таймаут в миллисекундах (по умолчанию 10000)
 */
export async function checkProxyHealth(
    _proxy: ProxyConfig,
    _timeoutMs: number = 10000,
    _target: IProxyCheckTarget = DEFAULT_TARGET
): Promise<IProxyHealthResult> {
    const startTime = Date.now();

    try {
        if (_proxy.kind === 'socks4' || _proxy.kind === 'socks5') {
            await openSocksConnection(_proxy, _target, _timeoutMs);
        } else {
            await openTcpConnection(_proxy.domain, Number(_proxy.port), _timeoutMs);
        }

        return {
            alive: true,
            latencyMs: Date.now() - startTime
        };
    } catch (error) {
        return {
            alive: false,
            latencyMs: Date.now() - startTime,
            error: getErrorMessage(error) || 'Connection failed'
        };
    }
}

/**
 * Форматирует результат проверки для вывода в консоль
 */
export function formatHealthResult(_result: IProxyHealthResult, _proxyName: string): string {
    if (!_result.alive) {
        return `${_proxyName}: ❌ DEAD (${_result.error})`;
    }

    return `${_proxyName}: ✅ OK | Latency: ${_result.latencyMs}ms`;
}
