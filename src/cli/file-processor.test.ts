import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SkippedLine } from '../types';
import type { TranscriptFile } from './file-processor';
import { SenderRegistry } from '../parsers/sender-registry';
import { InputFileError } from '../utils/errors';
import { readTranscript } from '../utils/file.utils';
import { parseChatFile, parseChatFiles } from './file-processor';

describe('file processing', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatstat-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function write(name: string, content: string | Buffer): string {
        const filePath = path.join(dir, name);
        fs.writeFileSync(filePath, content);
        return filePath;
    }

    it('parses files in argument order with one registry', () => {
        const first = write('first.txt', '1/2/23, 09:00 - Alice: a\n1/2/23, 09:01 - Bob: b\n');
        const empty = write('empty.txt', '');
        const second = write('second.txt', '1/3/23, 10:00 - Bob: c\n');
        const registry = new SenderRegistry();

        const chats = parseChatFiles([first, empty, second], registry);

        expect(chats.map(chat => chat.source)).toEqual(['first.txt', 'empty.txt', 'second.txt']);
        expect(chats.map(chat => chat.messages.length)).toEqual([2, 0, 1]);
        expect(chats[2].participantIds).toEqual([1]);
    });

    it('decodes the requested encoding', () => {
        const filePath = write('latin.txt', Buffer.from('1/2/23, 09:00 - José: olá\n', 'latin1'));
        const registry = new SenderRegistry();

        const chat = parseChatFile(filePath, registry, { encoding: 'latin1' });

        expect(registry.nameOf(0)).toBe('José');
        expect(chat.messages[0].text).toBe('olá');
    });

    it('drops a byte order mark', () => {
        const filePath = write('bom.txt', Buffer.from('\uFEFFhello', 'utf8'));

        expect(readTranscript(filePath)).toBe('hello');
    });

    it('reports skipped lines with their file', () => {
        const filePath = write('notices.txt', 'orphan\n1/2/23, 09:00 - Bob joined\n1/2/23, 09:01 - Alice: hi\n');
        const seen: Array<[TranscriptFile, SkippedLine]> = [];

        parseChatFile(filePath, new SenderRegistry(), { onSkippedLine: (file, skipped) => seen.push([file, skipped]) });

        expect(seen).toEqual([
            [{ filePath, index: 0 }, { lineNumber: 1, line: 'orphan', reason: 'orphan-continuation' }],
            [{ filePath, index: 0 }, { lineNumber: 2, line: '1/2/23, 09:00 - Bob joined', reason: 'malformed-header' }]
        ]);
    });

    it('tells repeated files apart by position', () => {
        const filePath = write('notices.txt', 'orphan\n1/2/23, 09:01 - Alice: hi\n');
        const positions: number[] = [];

        parseChatFiles([filePath, filePath], new SenderRegistry(), {
            onSkippedLine: file => positions.push(file.index)
        });

        expect(positions).toEqual([0, 1]);
    });

    it('fails on a missing file', () => {
        const missing = path.join(dir, 'missing.txt');

        expect(() => parseChatFile(missing, new SenderRegistry())).toThrow(InputFileError);
        expect(() => parseChatFile(missing, new SenderRegistry())).toThrow(`Cannot read ${missing}`);
    });

    it('fails on an unknown encoding', () => {
        const filePath = write('chat.txt', '1/2/23, 09:00 - Alice: a\n');

        expect(() => readTranscript(filePath, 'no-such-encoding'))
            .toThrow(`Cannot read ${filePath}: unknown encoding "no-such-encoding"`);
    });
});
