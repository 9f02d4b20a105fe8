/**
 * Text decoding for policy exports
 *
 * The policy-dump utility writes UTF-16LE with a byte-order mark; exports
 * that were re-saved by an editor are usually UTF-8.
 */

export type TextEncodingName = 'utf-8' | 'utf-16le' | 'utf-16be';

/**
 * Detect the encoding of a buffer from its byte-order mark
 */
export function detectEncoding(buffer: Buffer): TextEncodingName {
    if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
        return 'utf-16le';
    }
    if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
        return 'utf-16be';
    }
    return 'utf-8';
}

/**
 * Decode a buffer to a string, dropping any byte-order mark
 */
export function decodeText(buffer: Buffer): string {
    const encoding = detectEncoding(buffer);

    let text: string;
    if (encoding === 'utf-16le') {
        text = buffer.toString('utf16le');
    } else if (encoding === 'utf-16be') {
        // Node has no utf16be codec; swap byte pairs and read as LE
        const swapped = Buffer.from(buffer.subarray(0, buffer.length - (buffer.length % 2)));
        swapped.swap16();
        text = swapped.toString('utf16le');
    } else {
        text = buffer.toString('utf-8');
    }

    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
