/**
 * Маркеры ответа VPN клиента на вход
 * Проверяются сверху вниз, первое совпадение определяет результат
 *
 * Применяются только к выводу успешно завершившейся команды: ненулевой код выхода
 * дает ExecutionFailed, даже если в stderr есть один из маркеров.
 */

import { ILoginRule, RejectionReason } from '../interfaces/IAccountValidator';

export const ACCOUNT_PLACEHOLDER = '{account}';

export const DEFAULT_LOGIN_RULES: readonly ILoginRule[] = [
    {
        pattern: 'Mullvad account "{account}" set',
        outcome: 'accepted',
        message: 'Аккаунт установлен'
    },
    {
        pattern: 'There are too many devices on the account.',
        outcome: RejectionReason.TooManyDevices,
        message: 'Слишком много устройств на аккаунте'
    },
    {
        pattern: 'The account does not exist',
        outcome: RejectionReason.NotFound,
        message: 'Аккаунт не существует'
    }
];

/**
 * Первое сработавшее правило или null
 */
export function matchLoginRule(
    _output: string,
    _account: string,
    _rules: readonly ILoginRule[] = DEFAULT_LOGIN_RULES
): ILoginRule | null {
    for (const rule of _rules) {
        const marker = rule.pattern.split(ACCOUNT_PLACEHOLDER).join(_account);
        if (_output.includes(marker)) {
            return rule;
        }
    }
    return null;
}
