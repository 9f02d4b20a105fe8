/**
 * Resource Index Builder Tests
 */

import { jest } from '@jest/globals';
import * as fs from 'fs';
import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResourceIndexBuilder, resolveDescription } from '../../src/core/ResourceIndexBuilder.js';
import { MissingDirectoryError, NoResourceFilesError, ResourceParseError } from '../../src/core/errors.js';
import type { Logger } from '../../src/types/index.js';

const mockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
} satisfies Logger;

const FIXTURE_DIR = path.resolve(__dirname, '../fixtures/adml');

function adml(strings: Record<string, string>): string {
    const entries = Object.entries(strings)
        .map(([id, text]) => `      <string id="${id}">${text}</string>`)
        .join('\n');
    return [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<policyDefinitionResources revision="1.0" schemaVersion="1.0">',
        '  <resources>',
        '    <stringTable>',
        entries,
        '    </stringTable>',
        '  </resources>',
        '</policyDefinitionResources>',
        '',
    ].join('\n');
}

describe('ResourceIndexBuilder', () => {
    let builder: ResourceIndexBuilder;
    let tempDir = '';

    beforeEach(() => {
        jest.clearAllMocks();
        builder = new ResourceIndexBuilder(mockLogger);
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gpo2audit-resources-'));
    });

    afterEach(() => {
        if (tempDir) {
            fs.rmSync(tempDir, { recursive: true, force: true });
        }
    });

    describe('build()', () => {
        it('should index every string table entry across the directory', async () => {
            const index = await builder.build(FIXTURE_DIR);

            expect([...index.keys()]).toEqual([
                'MACHINE.Policy.LockoutThreshold',
                'NoAutorun',
                'ScreenSaverTimeout',
                'Explain_NoAutorun',
                'USER.Policy.NoChangingWallpaper',
            ]);
            expect(index.get('Explain_NoAutorun')).toBe('This policy setting disables Autoplay & AutoRun.');
            expect(mockLogger.info).toHaveBeenCalledWith('Resource index built: 5 strings from 2 file(s)');
        });

        it('should let the lexicographically later file win for duplicate ids', async () => {
            const index = await builder.build(FIXTURE_DIR);

            expect(index.get('ScreenSaverTimeout')).toBe('Screen saver timeout');
        });

        it('should process files in name order regardless of creation order', async () => {
            fs.writeFileSync(path.join(tempDir, 'zz-second.adml'), adml({ Shared: 'from zz', OnlyZ: 'z' }));
            fs.writeFileSync(path.join(tempDir, 'aa-first.adml'), adml({ Shared: 'from aa', OnlyA: 'a' }));

            const index = await builder.build(tempDir);

            expect(index.get('Shared')).toBe('from zz');
            expect([...index.entries()]).toEqual([
                ['Shared', 'from zz'],
                ['OnlyA', 'a'],
                ['OnlyZ', 'z'],
            ]);
        });

        it('should fail with MissingDirectoryError for a missing directory', async () => {
            const missing = path.join(tempDir, 'does-not-exist');

            await expect(builder.build(missing)).rejects.toThrow(MissingDirectoryError);
            await expect(builder.build(missing)).rejects.toThrow(`Resource directory not found: ${missing}`);
        });

        it('should fail with MissingDirectoryError when the path is a file', async () => {
            const file = path.join(tempDir, 'file.adml');
            fs.writeFileSync(file, adml({ A: 'a' }));

            await expect(builder.build(file)).rejects.toThrow(MissingDirectoryError);
        });

        it('should fail with NoResourceFilesError when nothing matches the extension', async () => {
            fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'not a resource');

            await expect(builder.build(tempDir)).rejects.toThrow(NoResourceFilesError);
            await expect(builder.build(tempDir)).rejects.toThrow(`No .adml files found in resource directory: ${tempDir}`);
        });

        it('should honour a custom extension', async () => {
            fs.writeFileSync(path.join(tempDir, 'strings.xml'), adml({ Custom: 'custom text' }));

            const index = await new ResourceIndexBuilder(mockLogger, 'xml').build(tempDir);

            expect(index.get('Custom')).toBe('custom text');
        });

        it('should fail the whole build with ResourceParseError naming the broken file', async () => {
            fs.writeFileSync(path.join(tempDir, 'a-good.adml'), adml({ Good: 'fine' }));
            fs.writeFileSync(
                path.join(tempDir, 'b-broken.adml'),
                '<resources><stringTable><string id="A">Alpha</string'
            );

            await expect(builder.build(tempDir)).rejects.toThrow(ResourceParseError);
            await expect(builder.build(tempDir)).rejects.toThrow(path.join(tempDir, 'b-broken.adml'));
        });
    });

    describe('parseDocument()', () => {
        it('should only collect strings inside a string table', () => {
            const entries = builder.parseDocument(
                '<resources><string id="Outside">x</string>' +
                '<stringTable><string id="Inside">y</string><string>no id</string></stringTable></resources>',
                'inline.adml'
            );

            expect(entries).toEqual([{ id: 'Inside', text: 'y' }]);
        });

        it('should drop a leading byte-order mark and keep case-sensitive ids', () => {
            const entries = builder.parseDocument('\uFEFF' + adml({ MixedCase_Id: 'Text' }), 'bom.adml');

            expect(entries).toEqual([{ id: 'MixedCase_Id', text: 'Text' }]);
        });

        it('should report truncated markup', () => {
            const parse = () => builder.parseDocument('<resources><stringTable><string id="A">Alpha</string', 'cut.adml');

            expect(parse).toThrow(ResourceParseError);
            expect(parse).toThrow('Failed to parse resource file cut.adml (line 1');
        });

        it('should report an element that is never closed', () => {
            const parse = () => builder.parseDocument(
                '<resources><stringTable><string id="A">Alpha</stringTable></resources>',
                'open.adml'
            );

            expect(parse).toThrow(ResourceParseError);
            expect(parse).toThrow('Failed to parse resource file open.adml (line 1');
        });

        it('should reject a mismatched end tag instead of returning a partial index', () => {
            const parse = () => builder.parseDocument(
                '<resources><stringTable><string id="A">Alpha</strin></string></stringTable></resources>',
                'mismatch.adml'
            );

            expect(parse).toThrow(ResourceParseError);
            expect(parse).toThrow('Failed to parse resource file mismatch.adml (line 1');
        });

        it('should give a self-closing string empty text without swallowing its siblings', () => {
            const entries = builder.parseDocument(
                '<resources><stringTable><string id="Empty"/><string id="A">Alpha</string>' +
                '<string id="B">Beta</string></stringTable></resources>',
                'self-closing.adml'
            );

            expect(entries).toEqual([
                { id: 'Empty', text: '' },
                { id: 'A', text: 'Alpha' },
                { id: 'B', text: 'Beta' },
            ]);
        });

        it('should keep CDATA text verbatim', () => {
            const entries = builder.parseDocument(
                '<resources><stringTable><string id="A"><![CDATA[Use <b>bold</b> & more]]></string></stringTable></resources>',
                'cdata.adml'
            );

            expect(entries).toEqual([{ id: 'A', text: 'Use <b>bold</b> & more' }]);
        });

        it('should accept self-closing elements outside the string table', () => {
            const entries = builder.parseDocument(
                '<resources><stringTable><string id="A">Alpha</string></stringTable>' +
                '<presentationTable><presentation id="A"><checkBox refId="On"/></presentation></presentationTable>' +
                '</resources>',
                'self-closing.adml'
            );

            expect(entries).toEqual([{ id: 'A', text: 'Alpha' }]);
        });
    });

    describe('file access', () => {
        it('should wrap an unreadable resource file in ResourceParseError naming it', async () => {
            const file = path.join(tempDir, 'locked.adml');
            fs.writeFileSync(file, adml({ A: 'a' }));
            const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
            const readSpy = jest.spyOn(fsPromises, 'readFile').mockRejectedValue(denied);

            try {
                await expect(builder.build(tempDir)).rejects.toThrow(ResourceParseError);
                await expect(builder.build(tempDir)).rejects.toThrow(
                    `Failed to parse resource file ${file}: cannot read file: permission denied (EACCES)`
                );
            } finally {
                readSpy.mockRestore();
            }
        });
    });
});

describe('resolveDescription', () => {
    const index = new Map<string, string>([
        ['MACHINE.Policy.LockoutThreshold', 'Account lockout threshold'],
        ['USER.Policy.LockoutThreshold', 'Per-user threshold'],
    ]);

    it('should match by id suffix and return the first match', () => {
        expect(resolveDescription(index, 'LockoutThreshold')).toBe('Account lockout threshold');
    });

    it('should return undefined when nothing matches', () => {
        expect(resolveDescription(index, 'ScreenSaverTimeout')).toBeUndefined();
        expect(resolveDescription(index, '')).toBeUndefined();
    });
});
