/**
 * Audit Emitter
 * Renders audit rules into the scanner's .audit grammar and writes the file
 *
 * Field names, field order, tag spelling and the tab layout are what the
 * consuming scanner expects; do not reformat.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AuditDocument, AuditMetadata, AuditRule, Logger } from '../types/index.js';
import { WriteError } from './errors.js';

export interface WriteOptions {
    /** Replace an existing destination instead of failing with EEXIST */
    overwrite?: boolean;
}

/**
 * Collapse line breaks so a value always stays on its field's line
 */
function singleLine(value: string): string {
    return value.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

export function renderOpening(metadata: AuditMetadata): string {
    return (
        `<check_type: "Windows" version:"${metadata.version}">\n` +
        `\t<group_policy: "${singleLine(metadata.description)}">\n`
    );
}

export function renderRule(rule: AuditRule): string {
    return (
        '\t<custom_item>\n' +
        `\t\ttype:\t\t\t${rule.type}\n` +
        `\tdescription:\t\t${singleLine(rule.description)}\n` +
        `\t\tvalue_type:\t\t${rule.valueType}\n` +
        `\t\tvalue_data\t\t${rule.valueData}\n` +
        `\t\treg_key:\t\t${rule.regKey}\n` +
        `\t\treg_item:\t\t${rule.regItem}\n` +
        '\t</custom_item>\n'
    );
}

export function renderClosing(): string {
    return '\t</group_policy>\n</check_type>\n';
}

/**
 * Incremental renderer: open the envelope, append rules, close it.
 */
export class AuditEmitter {
    private readonly logger: Logger;
    private chunks: string[] = [];
    private ruleCount = 0;
    private state: 'idle' | 'open' | 'closed' = 'idle';

    constructor(logger: Logger) {
        this.logger = logger;
    }

    open(metadata: AuditMetadata): void {
        if (this.state !== 'idle') {
            throw new Error('Audit envelope already opened');
        }
        this.chunks = [renderOpening(metadata)];
        this.ruleCount = 0;
        this.state = 'open';
    }

    append(rule: AuditRule): void {
        if (this.state !== 'open') {
            throw new Error('Cannot append a rule outside an open audit envelope');
        }
        this.chunks.push(renderRule(rule));
        this.ruleCount++;
    }

    /**
     * Close the envelope and return the complete document text
     */
    close(): string {
        if (this.state !== 'open') {
            throw new Error('Cannot close an audit envelope that is not open');
        }
        this.chunks.push(renderClosing());
        this.state = 'closed';
        return this.chunks.join('');
    }

    get rulesWritten(): number {
        return this.ruleCount;
    }

    /**
     * Render a whole document in one call
     */
    render(document: AuditDocument): string {
        this.state = 'idle';
        this.open(document);
        for (const rule of document.rules) {
            this.append(rule);
        }
        return this.close();
    }

    /**
     * Render and persist a document
     * @throws WriteError if the destination cannot be created or written
     */
    async write(document: AuditDocument, destination: string, options: WriteOptions = {}): Promise<string> {
        const text = this.render(document);
        const target = path.resolve(destination);

        try {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, text, { encoding: 'utf-8', flag: options.overwrite ? 'w' : 'wx' });
        } catch (error) {
            throw new WriteError(target, error);
        }

        this.logger.info(`Wrote ${this.ruleCount} audit rule(s) to ${target}`);
        return target;
    }
}

export default AuditEmitter;
