/**
 * Форматирование и сохранение результатов проверки
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ensureDirectory, formatDuration } from '../../../shared/utils/helpers';
import { IBatchSummary, IClassificationOutcome } from '../../batchWorker/interfaces/IBatchWorker';

const p_stateTitles: Record<IBatchSummary['state'], string> = {
    idle: 'не запускалась',
    running: 'выполняется',
    completed: 'завершена',
    cancelled: 'остановлена'
};

export class OutcomeReportAdapter {
    /**
     * Строка отчета
     */
    formatOutcomeLine(_outcome: IClassificationOutcome): string {
        return `${_outcome.account} - ${_outcome.category} - ${_outcome.message}`;
    }

    /**
     * Сохранение отчета (файл перезаписывается)
     */
    async exportAsync(_outcomes: readonly IClassificationOutcome[], _filePath: string): Promise<string> {
        const resolved = path.resolve(_filePath);
        await ensureDirectory(path.dirname(resolved));

        const content = _outcomes.map(outcome => this.formatOutcomeLine(outcome)).join('\n');
        await fs.writeFile(resolved, content ? `${content}\n` : '', 'utf-8');

        return resolved;
    }

    /**
     * Итоговый блок статистики
     */
    formatSummary(_summary: IBatchSummary): string {
        let output = `📊 Проверка ${p_stateTitles[_summary.state]}\n`;
        output += `════════════════════════════\n`;
        output += `Всего       ${_summary.total}\n`;
        output += `Проверено   ${_summary.processed}\n`;
        output += `Valid       ${_summary.valid}\n`;
        output += `Invalid     ${_summary.invalid}\n`;
        output += `Errors      ${_summary.errors}\n`;
        output += `Время       ${formatDuration(_summary.durationMs)}`;

        if (_summary.state === 'cancelled') {
            output += `\nПропущено   ${_summary.total - _summary.processed}`;
        }

        return output;
    }
}
