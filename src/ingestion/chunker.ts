import { readFile } from 'node:fs/promises';
import { createLogger } from '../lib/logger.js';
import { InputError } from '../lib/errors.js';
import type { Section } from '../analysis/types.js';

const log = createLogger('ingestion.chunker');

const SECTION_SEPARATOR = '\n\n';

// ─── Main Entry Point ─────────────────────────────────────────

/**
 * Split contract text into ordered sections at blank lines.
 *
 * Each section keeps the index of its segment in the raw split as `id`, so ids
 * are unique and increasing but skip the positions of dropped blank segments.
 */
export function chunkText(text: string): Section[] {
    const normalized = text.replace(/\r\n?/g, '\n');

    const sections: Section[] = [];
    normalized.split(SECTION_SEPARATOR).forEach((segment, index) => {
        const clean = segment.trim();
        if (clean) {
            sections.push({ id: index, text: clean });
        }
    });

    log.debug({ textLength: text.length, sectionCount: sections.length }, 'Chunking complete');
    return sections;
}

/**
 * Read a plaintext contract from disk and chunk it.
 *
 * @throws InputError when the file cannot be read
 */
export async function chunkFile(filePath: string): Promise<Section[]> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (err) {
        throw new InputError(`Could not read contract file '${filePath}'`, undefined, { cause: err });
    }

    const sections = chunkText(content);
    log.info({ filePath, sectionCount: sections.length }, 'Contract file chunked');
    return sections;
}
