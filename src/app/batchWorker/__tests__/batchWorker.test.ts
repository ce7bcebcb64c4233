/**
 * Тесты пакетной проверки
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BatchWorkerService } from '../services/batchWorkerService';
import { createBatchWorker } from '../parts/workerFactory';
import { categoryForReason, statusToOutcome } from '../parts/outcomeMapping';
import { BatchEvent, IClassificationOutcome } from '../interfaces/IBatchWorker';
import {
    IAccountStatus,
    IAccountValidator,
    ISetAccountResult,
    RejectionReason
} from '../../accountValidator';
import { RateLimiterService } from '../../rateLimiter';
import { FileResultSinkAdapter } from '../../resultSink';
import { ICommandExecutor, ICommandResult, ICommandSpec } from '../../commandExecutor';
import { WorkerStateError } from '../../../shared/errors';

/**
 * Валидатор, который принимает все аккаунты и считает их действующими
 */
class FakeValidator implements IAccountValidator {
    readonly setCalls: string[] = [];
    logoutCalls = 0;
    failValidityFor: string | null = null;

    async setAccountAsync(_account: string): Promise<ISetAccountResult> {
        this.setCalls.push(_account);
        if (_account.startsWith('bad')) {
            return { accepted: false, reason: RejectionReason.NotFound, message: 'Аккаунт не существует' };
        }
        return { accepted: true, message: 'Аккаунт установлен' };
    }

    async getValidityAsync(_account: string): Promise<IAccountStatus> {
        if (_account === this.failValidityFor) {
            throw new Error('disk full');
        }
        return { accountNumber: _account, isValid: true, expiresAt: '2099-01-01', deviceLimitReached: false };
    }

    async logoutAsync(): Promise<boolean> {
        this.logoutCalls++;
        return true;
    }
}

function createWorker(_validator: IAccountValidator) {
    return new BatchWorkerService(_validator, new RateLimiterService({ preCheckDelayMs: 0, postCheckDelayMs: 0 }));
}

function collectOutcomes(_events: BatchEvent[]): IClassificationOutcome[] {
    const outcomes: IClassificationOutcome[] = [];
    for (const event of _events) {
        if (event.type === 'outcome') outcomes.push(event.outcome);
    }
    return outcomes;
}

describe('outcomeMapping', () => {
    test('категории причин отказа', () => {
        expect(categoryForReason(RejectionReason.TooManyDevices)).toBe('Invalid');
        expect(categoryForReason(RejectionReason.NotFound)).toBe('Invalid');
        expect(categoryForReason(RejectionReason.ExecutionFailed)).toBe('Error');
        expect(categoryForReason(RejectionReason.UnknownResponse)).toBe('Error');
        expect(categoryForReason(RejectionReason.EmptyInput)).toBe('Error');
    });

    test('статус после входа', () => {
        const base = { accountNumber: '1', deviceLimitReached: false };

        expect(statusToOutcome('1', { ...base, isValid: true, expiresAt: '2099-01-01' })).toEqual({
            account: '1', category: 'Valid', message: 'Действует до 2099-01-01', expiresAt: '2099-01-01'
        });
        expect(statusToOutcome('1', { ...base, isValid: false, expiresAt: '2020-01-01' })).toEqual({
            account: '1', category: 'Invalid', message: 'Срок действия истек 2020-01-01', expiresAt: '2020-01-01'
        });
        expect(statusToOutcome('1', { ...base, isValid: false, errorMessage: 'Дата окончания не найдена' })).toEqual({
            account: '1', category: 'Error', message: 'Дата окончания не найдена'
        });
    });
});

describe('BatchWorkerService', () => {
    test('аккаунты проверяются по порядку, одно событие на аккаунт', async () => {
        const validator = new FakeValidator();
        const worker = createWorker(validator);
        const events: BatchEvent[] = [];
        worker.subscribe(event => events.push(event));

        const summary = await worker.startAsync(['A', 'bad-B', 'C']);

        expect(validator.setCalls).toEqual(['A', 'bad-B', 'C']);
        expect(collectOutcomes(events).map(outcome => `${outcome.account}:${outcome.category}`))
            .toEqual(['A:Valid', 'bad-B:Invalid', 'C:Valid']);
        expect(validator.logoutCalls).toBe(2);
        expect(summary).toMatchObject({ state: 'completed', total: 3, processed: 3, valid: 2, invalid: 1, errors: 0 });
        expect(worker.state).toBe('completed');
        expect(events.filter(event => event.type === 'state')).toEqual([
            { type: 'state', state: 'running' },
            { type: 'state', state: 'completed' }
        ]);
        expect(events[events.length - 1].type).toBe('finished');
    });

    test('остановка после k аккаунтов: k событий и один выход', async () => {
        const validator = new FakeValidator();
        const worker = createWorker(validator);
        const events: BatchEvent[] = [];
        worker.subscribe((event) => {
            events.push(event);
            if (event.type === 'outcome' && event.index === 2) {
                worker.stop();
            }
        });

        const summary = await worker.startAsync(['bad-1', 'bad-2', 'bad-3', 'bad-4']);

        expect(collectOutcomes(events)).toHaveLength(2);
        expect(validator.setCalls).toEqual(['bad-1', 'bad-2']);
        expect(validator.logoutCalls).toBe(1);
        expect(summary).toMatchObject({ state: 'cancelled', total: 4, processed: 2, invalid: 2 });
        expect(worker.remainingAccounts).toEqual(['bad-3', 'bad-4']);
    });

    test('stopAsync прерывает паузу и ждет завершения', async () => {
        const validator = new FakeValidator();
        const worker = new BatchWorkerService(validator, new RateLimiterService({ preCheckDelayMs: 10000, postCheckDelayMs: 0 }));

        const running = worker.startAsync(['A', 'B']);
        const summary = await worker.stopAsync();

        expect(summary?.state).toBe('cancelled');
        expect(summary?.processed).toBe(0);
        expect(await running).toBe(summary);
        expect(validator.setCalls).toEqual([]);
        expect(validator.logoutCalls).toBe(1);
    });

    test('пустой список - событие emptyInput без запуска', async () => {
        const worker = createWorker(new FakeValidator());
        const events: BatchEvent[] = [];
        worker.subscribe(event => events.push(event));

        const summary = await worker.startAsync([]);

        expect(events).toEqual([{ type: 'emptyInput' }]);
        expect(summary).toMatchObject({ state: 'idle', total: 0, processed: 0 });
        expect(worker.state).toBe('idle');
    });

    test('повторный запуск - WorkerStateError', async () => {
        const worker = createWorker(new FakeValidator());
        await worker.startAsync(['A']);

        await expect(worker.startAsync(['A'])).rejects.toBeInstanceOf(WorkerStateError);
    });

    test('stop до запуска ничего не делает', async () => {
        const worker = createWorker(new FakeValidator());

        worker.stop();

        expect(worker.state).toBe('idle');
        expect(await worker.stopAsync()).toBeNull();
    });

    test('ошибка в обработчике не останавливает проверку', async () => {
        const worker = createWorker(new FakeValidator());
        const outcomes: IClassificationOutcome[] = [];
        worker.subscribe(() => {
            throw new Error('listener failed');
        });
        worker.subscribe((event) => {
            if (event.type === 'outcome') outcomes.push(event.outcome);
        });

        const summary = await worker.startAsync(['A', 'B']);

        expect(outcomes).toHaveLength(2);
        expect(summary.state).toBe('completed');
    });

    test('исключение проверки - результат Error, выход все равно выполняется', async () => {
        const validator = new FakeValidator();
        validator.failValidityFor = 'A';
        const worker = createWorker(validator);
        const events: BatchEvent[] = [];
        worker.subscribe(event => events.push(event));

        const summary = await worker.startAsync(['A', 'B']);

        expect(collectOutcomes(events)[0]).toEqual({ account: 'A', category: 'Error', message: 'disk full' });
        expect(validator.logoutCalls).toBe(2);
        expect(summary).toMatchObject({ valid: 1, errors: 1 });
    });

    test('отписка', async () => {
        const worker = createWorker(new FakeValidator());
        const events: BatchEvent[] = [];
        const unsubscribe = worker.subscribe(event => events.push(event));

        unsubscribe();
        await worker.startAsync(['A']);

        expect(events).toEqual([]);
    });
});

describe('createBatchWorker', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vpn-checker-worker-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    test('действующий и пустой аккаунт с записью в файлы', async () => {
        const calls: string[] = [];
        const executor: ICommandExecutor = {
            async runAsync(_command: ICommandSpec): Promise<ICommandResult> {
                calls.push(_command.args.join(' '));
                switch (_command.args[1]) {
                    case 'login':
                        return { stdout: `Mullvad account "${_command.args[2]}" set`, stderr: '' };
                    case 'get':
                        return { stdout: 'Expires at: 2099-01-01 00:00:00 UTC', stderr: '' };
                    default:
                        return { stdout: 'Removed device', stderr: '' };
                }
            }
        };
        const paths = {
            validFile: path.join(tempDir, 'accounts_working.txt'),
            deviceLimitFile: path.join(tempDir, 'accounts_max_devices.txt')
        };
        const sink = new FileResultSinkAdapter(paths);
        await sink.initializeAsync();

        const worker = createBatchWorker({
            sink,
            executor,
            pacing: { preCheckDelayMs: 0, postCheckDelayMs: 0 },
            now: () => new Date('2025-06-15T12:00:00Z')
        });
        const events: BatchEvent[] = [];
        worker.subscribe(event => events.push(event));

        const summary = await worker.startAsync(['AAAA', '']);

        expect(collectOutcomes(events)).toEqual([
            { account: 'AAAA', category: 'Valid', message: 'Действует до 2099-01-01', expiresAt: '2099-01-01' },
            { account: '', category: 'Error', message: 'Пустой номер аккаунта', reason: RejectionReason.EmptyInput }
        ]);
        expect(calls).toEqual(['account login AAAA', 'account get', 'account logout']);
        expect(summary).toMatchObject({ state: 'completed', total: 2, processed: 2, valid: 1, invalid: 0, errors: 1 });
        expect(await fs.readFile(paths.validFile, 'utf-8')).toBe('AAAA (Expires at: 2099-01-01)\n');
        expect(await fs.readFile(paths.deviceLimitFile, 'utf-8')).toBe('');
    });
});
