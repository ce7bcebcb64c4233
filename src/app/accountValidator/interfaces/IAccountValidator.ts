/**
 * Интерфейсы для проверки аккаунтов через VPN клиент
 */

import { ICommandSpec } from '../../commandExecutor/interfaces/ICommandExecutor';

/**
 * Причина отказа во входе
 */
export enum RejectionReason {
    TooManyDevices = 'TooManyDevices',
    NotFound = 'NotFound',
    ExecutionFailed = 'ExecutionFailed',
    UnknownResponse = 'UnknownResponse',
    EmptyInput = 'EmptyInput'
}

export interface ISetAccountResult {
    accepted: boolean;
    reason?: RejectionReason;
    /** Описание для вывода */
    message: string;
}

/**
 * Статус аккаунта после входа. Создается один раз и не меняется
 */
export interface IAccountStatus {
    readonly accountNumber: string;
    readonly isValid: boolean;
    readonly expiryDate?: Date;
    /** Дата окончания в исходном виде YYYY-MM-DD */
    readonly expiresAt?: string;
    readonly errorMessage?: string;
    readonly deviceLimitReached: boolean;
}

export type LoginRuleOutcome = 'accepted' | RejectionReason.TooManyDevices | RejectionReason.NotFound;

/**
 * Правило классификации вывода команды входа
 * В pattern подстановка {account} заменяется номером аккаунта
 */
export interface ILoginRule {
    pattern: string;
    outcome: LoginRuleOutcome;
    message: string;
}

/**
 * Команды VPN клиента
 */
export interface IClientCommands {
    login(_account: string): ICommandSpec;
    status(): ICommandSpec;
    logout(): ICommandSpec;
}

export interface IAccountValidatorOptions {
    commands?: IClientCommands;
    loginRules?: readonly ILoginRule[];
    /** Текущее время (подменяется в тестах) */
    now?: () => Date;
}

export interface IAccountValidator {
    /**
     * Вход с аккаунтом и классификация ответа клиента
     */
    setAccountAsync(_account: string): Promise<ISetAccountResult>;

    /**
     * Проверка срока действия для текущего (вошедшего) аккаунта
     */
    getValidityAsync(_account: string): Promise<IAccountStatus>;

    /**
     * Выход из аккаунта. Ошибки не пробрасываются
     */
    logoutAsync(): Promise<boolean>;
}
