import { format, isValid, parse } from 'date-fns';

/** Ano 1 do calendário ROC (民國) = 1912 */
export const ROC_YEAR_OFFSET = 1911;

const ROC_DATE_PATTERN = /^(\d{1,3})\/(\d{1,2})\/(\d{1,2})$/;

/**
 * Converte data ROC ("113/10/30") para Date local (2024-10-30).
 * Entrada mal formada ou data inexistente retorna null.
 */
export function parseRocDate(value: string | null | undefined): Date | null {
    if (!value) return null;

    const matchResult = ROC_DATE_PATTERN.exec(value.trim());
    if (!matchResult) return null;

    const [, rocYear, month, day] = matchResult;
    const year = parseInt(rocYear, 10) + ROC_YEAR_OFFSET;
    const date = parse(`${year}/${month}/${day}`, 'yyyy/M/d', new Date());

    return isValid(date) ? date : null;
}

/** Date ou "yyyy-MM-dd" para o formato ROC com zero à esquerda ("113/10/30") */
export function toRocDate(value: Date | string | null | undefined): string | null {
    if (!value) return null;

    const date = typeof value === 'string' ? parse(value, 'yyyy-MM-dd', new Date()) : value;
    if (!isValid(date)) return null;

    return `${date.getFullYear() - ROC_YEAR_OFFSET}/${format(date, 'MM/dd')}`;
}

/** Date para "yyyy-MM-dd" (coluna DATE do Postgres) */
export function toIsoDate(date: Date): string {
    return format(date, 'yyyy-MM-dd');
}
