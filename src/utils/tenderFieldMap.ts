import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const FIELD_MAP_PATH = path.resolve(__dirname, '../../data/tender-field-map.json');

// Os nomes de coluna entram em SQL montado dinamicamente
const COLUMN_NAME = /^[a-z_][a-z0-9_]*$/;

const fieldMapSchema = z.record(z.string().min(1), z.string().regex(COLUMN_NAME));

let cached: Readonly<Record<string, string>> | null = null;

/** Rótulo (como aparece na página de detalhe) -> coluna da tabela tenders */
export function loadTenderFieldMap(): Readonly<Record<string, string>> {
    if (cached === null) {
        const raw: unknown = JSON.parse(fs.readFileSync(FIELD_MAP_PATH, 'utf-8'));
        cached = Object.freeze(fieldMapSchema.parse(raw));
    }
    return cached;
}

export function tenderDetailColumns(): string[] {
    return Array.from(new Set(Object.values(loadTenderFieldMap())));
}

export function isColumnName(value: string): boolean {
    return COLUMN_NAME.test(value);
}
