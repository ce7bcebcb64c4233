/**
 * Сервис проверки аккаунтов через CLI VPN клиента
 * Протокол: account login <номер> -> account get -> account logout
 */

import { createLogger } from '../../../shared/utils/logger';
import { EmptyInputError, ExecutionError, getErrorMessage } from '../../../shared/errors';
import { ICommandExecutor } from '../../commandExecutor/interfaces/ICommandExecutor';
import { IResultSink } from '../../resultSink/interfaces/IResultSink';
import {
    IAccountStatus,
    IAccountValidator,
    IAccountValidatorOptions,
    IClientCommands,
    ILoginRule,
    ISetAccountResult,
    RejectionReason
} from '../interfaces/IAccountValidator';
import { DEFAULT_LOGIN_RULES, matchLoginRule } from '../parts/loginRules';
import { extractExpiryDate, isNotExpired, parseExpiryEndOfDay } from '../parts/expiryParser';
import { buildClientCommands } from '../parts/clientCommands';

const log = createLogger('AccountValidator');

export const EXPIRY_NOT_FOUND_MESSAGE = 'Дата окончания не найдена';
export const UNKNOWN_RESPONSE_MESSAGE = 'Неизвестный ответ клиента';

export class AccountValidatorService implements IAccountValidator {
    private readonly p_executor: ICommandExecutor;
    private readonly p_sink: IResultSink;
    private readonly p_commands: IClientCommands;
    private readonly p_rules: readonly ILoginRule[];
    private readonly p_now: () => Date;

    constructor(_executor: ICommandExecutor, _sink: IResultSink, _options: IAccountValidatorOptions = {}) {
        this.p_executor = _executor;
        this.p_sink = _sink;
        this.p_commands = _options.commands ?? buildClientCommands();
        this.p_rules = _options.loginRules ?? DEFAULT_LOGIN_RULES;
        this.p_now = _options.now ?? (() => new Date());
    }

    async setAccountAsync(_account: string): Promise<ISetAccountResult> {
        const account = _account.trim();

        if (!account) {
            return {
                accepted: false,
                reason: RejectionReason.EmptyInput,
                message: new EmptyInputError().message
            };
        }

        let output: string;

        try {
            const result = await this.p_executor.runAsync(this.p_commands.login(account));
            output = `${result.stdout}\n${result.stderr}`;
        } catch (error) {
            if (!(error instanceof ExecutionError)) {
                throw error;
            }
            log.warn(`Вход для ${account} завершился ошибкой: ${error.message}`);
            return {
                accepted: false,
                reason: RejectionReason.ExecutionFailed,
                message: error.message
            };
        }

        const rule = matchLoginRule(output, account, this.p_rules);

        if (rule) {
            if (rule.outcome === 'accepted') {
                log.info(`Аккаунт ${account} установлен`);
                return { accepted: true, message: rule.message };
            }

            if (rule.outcome === RejectionReason.TooManyDevices) {
                log.warn(`У аккаунта ${account} слишком много устройств`);
                await this.p_sink.recordDeviceLimitAsync(account);
            } else {
                log.info(`Аккаунт ${account} не существует`);
            }

            return { accepted: false, reason: rule.outcome, message: rule.message };
        }

        log.warn(`Неизвестный ответ клиента для ${account}`, { output: output.trim() });
        return {
            accepted: false,
            reason: RejectionReason.UnknownResponse,
            message: UNKNOWN_RESPONSE_MESSAGE
        };
    }

    async getValidityAsync(_account: string): Promise<IAccountStatus> {
        const account = _account.trim();
        let output: string;

        try {
            output = (await this.p_executor.runAsync(this.p_commands.status())).stdout;
        } catch (error) {
            if (!(error instanceof ExecutionError)) {
                throw error;
            }
            return this.createFailedStatus(account, `Не удалось получить данные аккаунта: ${error.message}`);
        }

        const expiresAt = extractExpiryDate(output);
        if (!expiresAt) {
            return this.createFailedStatus(account, EXPIRY_NOT_FOUND_MESSAGE);
        }

        let expiryDate: Date;
        try {
            expiryDate = parseExpiryEndOfDay(expiresAt);
        } catch (error) {
            log.error('Ошибка разбора даты окончания', error, { account });
            return this.createFailedStatus(account, `Ошибка разбора даты окончания: ${getErrorMessage(error)}`);
        }

        const isValid = isNotExpired(expiryDate, this.p_now());

        if (isValid) {
            log.success(`Рабочий аккаунт: ${account}, действует до ${expiresAt}`);
            await this.p_sink.recordValidAsync(account, expiresAt);
        } else {
            log.info(`Истекший аккаунт: ${account}, истек ${expiresAt}`);
        }

        return Object.freeze({
            accountNumber: account,
            isValid,
            expiryDate,
            expiresAt,
            deviceLimitReached: false
        });
    }

    async logoutAsync(): Promise<boolean> {
        try {
            const result = await this.p_executor.runAsync(this.p_commands.logout());
            if (result.stdout.trim()) {
                log.info('Выход из аккаунта выполнен');
                return true;
            }
            log.warn('Выход из аккаунта: пустой ответ клиента');
            return false;
        } catch (error) {
            log.warn(`Не удалось выйти из аккаунта: ${getErrorMessage(error)}`);
            return false;
        }
    }

    private createFailedStatus(_account: string, _message: string): IAccountStatus {
        return Object.freeze({
            accountNumber: _account,
            isValid: false,
            errorMessage: _message,
            deviceLimitReached: false
        });
    }
}
