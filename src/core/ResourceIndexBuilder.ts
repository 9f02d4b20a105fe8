/**
 * Resource Index Builder
 *
 * Scans a directory of localized policy-definition resources (ADML) and
 * builds a flat id -> text lookup from every <string> entry found inside a
 * <stringTable>. Files are read in lexicographic order; when two files
 * define the same id the later file wins.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { SaxesParser } from 'saxes';
import type { Logger, ResourceEntry, ResourceIndex } from '../types/index.js';
import { MissingDirectoryError, NoResourceFilesError, ResourceParseError, describeCause } from './errors.js';

export const DEFAULT_RESOURCE_EXTENSION = '.adml';

const STRING_TABLE_TAG = 'stringTable';
const STRING_TAG = 'string';

export class ResourceIndexBuilder {
    private readonly logger: Logger;
    private readonly extension: string;

    constructor(logger: Logger, extension: string = DEFAULT_RESOURCE_EXTENSION) {
        this.logger = logger;
        this.extension = extension.startsWith('.') ? extension : `.${extension}`;
    }

    /**
     * Build the index from every resource file in `directory` (non-recursive)
     */
    async build(directory: string): Promise<ResourceIndex> {
        const resolvedDir = path.resolve(directory);
        const files = await this.listResourceFiles(resolvedDir);

        const index = new Map<string, string>();
        for (const file of files) {
            const filePath = path.join(resolvedDir, file);
            const content = await this.readResourceFile(filePath);
            const entries = this.parseDocument(content, filePath);

            for (const entry of entries) {
                index.set(entry.id, entry.text);
            }
            this.logger.debug(`Loaded ${entries.length} strings from ${file}`);
        }

        this.logger.info(`Resource index built: ${index.size} strings from ${files.length} file(s)`);
        return index;
    }

    /**
     * Extract every (id, text) pair from one resource document
     * @throws ResourceParseError if the document is not well-formed XML
     */
    parseDocument(content: string, file: string): ResourceEntry[] {
        const source = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
        const parser = new SaxesParser();
        const entries: ResourceEntry[] = [];
        const failures: ResourceParseError[] = [];

        let depth = 0;
        let tableDepth = 0;
        let capture: { id: string; text: string; depth: number } | undefined;

        parser.on('opentag', (tag) => {
            depth++;
            const name = localName(tag.name);
            if (name === STRING_TAG && tableDepth > 0 && !capture) {
                const id = tag.attributes['id'];
                if (typeof id === 'string') {
                    capture = { id, text: '', depth };
                }
            }
            if (name === STRING_TABLE_TAG) tableDepth++;
        });

        parser.on('text', (text) => {
            if (capture) capture.text += text;
        });

        parser.on('cdata', (cdata) => {
            if (capture) capture.text += cdata;
        });

        parser.on('closetag', (tag) => {
            if (capture && capture.depth === depth) {
                entries.push({ id: capture.id, text: capture.text });
                capture = undefined;
            }
            if (localName(tag.name) === STRING_TABLE_TAG) tableDepth--;
            depth--;
        });

        parser.on('error', (error) => {
            failures.push(toParseError(file, error, parser.line, parser.column));
        });

        parser.write(source).close();

        if (failures.length > 0) {
            throw failures[0];
        }
        return entries;
    }

    private async readResourceFile(filePath: string): Promise<string> {
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new ResourceParseError(filePath, `cannot read file: ${describeCause(error)}`);
        }
    }

    private async listResourceFiles(directory: string): Promise<string[]> {
        let isDirectory = false;
        try {
            const info = await fs.stat(directory);
            isDirectory = info.isDirectory();
        } catch {
            isDirectory = false;
        }
        if (!isDirectory) {
            throw new MissingDirectoryError(directory);
        }

        const files = await glob(`*${this.extension}`, {
            cwd: directory,
            nodir: true,
            nocase: true,
        });
        if (files.length === 0) {
            throw new NoResourceFilesError(directory, this.extension);
        }

        return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
}

function localName(qualified: string): string {
    const colon = qualified.indexOf(':');
    return colon === -1 ? qualified : qualified.slice(colon + 1);
}

/**
 * saxes prefixes its messages with "line:column: "; keep the position as
 * fields and the rest as the reason
 */
function toParseError(file: string, error: Error, line: number, column: number): ResourceParseError {
    const match = /^(\d+):(\d+): ([\s\S]*)$/.exec(error.message);
    if (match) {
        return new ResourceParseError(file, match[3], Number(match[1]), Number(match[2]));
    }
    return new ResourceParseError(file, error.message, line, column);
}

/**
 * Resolve the display text for a registry item name: the first index entry
 * whose id ends with the item name, or undefined when none does.
 */
export function resolveDescription(index: ResourceIndex, itemName: string): string | undefined {
    if (itemName === '') return undefined;

    for (const [id, text] of index) {
        if (id.endsWith(itemName)) {
            return text;
        }
    }
    return undefined;
}

export default ResourceIndexBuilder;
