/**
 * Преобразование ответов валидатора в результаты проверки
 */

import {
    IAccountStatus,
    ISetAccountResult,
    RejectionReason
} from '../../accountValidator/interfaces/IAccountValidator';
import { IClassificationOutcome, OutcomeCategory } from '../interfaces/IBatchWorker';

const p_reasonCategories: Record<RejectionReason, OutcomeCategory> = {
    [RejectionReason.TooManyDevices]: 'Invalid',
    [RejectionReason.NotFound]: 'Invalid',
    [RejectionReason.ExecutionFailed]: 'Error',
    [RejectionReason.UnknownResponse]: 'Error',
    [RejectionReason.EmptyInput]: 'Error'
};

export function categoryForReason(_reason: RejectionReason): OutcomeCategory {
    return p_reasonCategories[_reason];
}

/**
 * Отказ во входе
 */
export function rejectionToOutcome(_account: string, _result: ISetAccountResult): IClassificationOutcome {
    const reason = _result.reason ?? RejectionReason.UnknownResponse;
    return {
        account: _account,
        category: categoryForReason(reason),
        message: _result.message,
        reason
    };
}

/**
 * Статус аккаунта после входа
 */
export function statusToOutcome(_account: string, _status: IAccountStatus): IClassificationOutcome {
    if (_status.isValid) {
        return {
            account: _account,
            category: 'Valid',
            message: `Действует до ${_status.expiresAt}`,
            expiresAt: _status.expiresAt
        };
    }

    if (_status.expiresAt) {
        return {
            account: _account,
            category: 'Invalid',
            message: `Срок действия истек ${_status.expiresAt}`,
            expiresAt: _status.expiresAt
        };
    }

    return {
        account: _account,
        category: 'Error',
        message: _status.errorMessage ?? 'Не удалось определить срок действия'
    };
}

export function errorToOutcome(_account: string, _message: string): IClassificationOutcome {
    return {
        account: _account,
        category: 'Error',
        message: _message
    };
}
