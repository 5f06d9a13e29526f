import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/** Read a file from `tests/fixtures` */
export function fixture(name: string): string {
    return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}
