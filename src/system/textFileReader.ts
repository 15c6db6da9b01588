import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { EndOfInputError } from '../core/errors';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Forward-only, single pass line reader.
 *
 * `readLine()` throws EndOfInputError once the input is exhausted, so callers
 * check `hasMore()` first. `close()` releases the underlying resource and may
 * be called more than once.
 */
export interface TextFileReader {
    /** File path or other description of the input, used in error messages */
    readonly source: string | undefined;
    /** Number of lines read so far */
    readonly lineNumber: number;
    hasMore(): boolean;
    readLine(): string;
    close(): void;
}

export interface TextFileReaderFactory {
    create(filePath: string): TextFileReader;
}

/**
 * Reads lines from text held in memory. Both `\r\n` and `\n` separate lines.
 */
export class StringTextReader implements TextFileReader {
    private readonly lines: string[];
    private position = 0;
    readonly source: string | undefined;

    constructor(text: string, source?: string) {
        this.lines = text.split(/\r\n|\n/);
        this.source = source;
    }

    get lineNumber(): number {
        return this.position;
    }

    hasMore(): boolean {
        return this.position < this.lines.length;
    }

    readLine(): string {
        if (!this.hasMore()) {
            throw new EndOfInputError(this.source, this.position);
        }
        return this.lines[this.position++];
    }

    close(): void {
        this.position = this.lines.length;
    }
}

/**
 * Reads a UTF-8 text file through an open descriptor, a chunk at a time.
 * Lines end at `\n` or `\r\n`; a trailing newline does not produce an empty last line.
 */
export class FileTextReader implements TextFileReader {
    private static readonly CHUNK_SIZE = 64 * 1024;

    private fd: number | undefined;
    private readonly chunk = Buffer.alloc(FileTextReader.CHUNK_SIZE);
    private readonly decoder = new StringDecoder('utf8');
    private readonly lines: string[] = [];
    private pending = '';
    private atStart = true;
    private readCount = 0;

    constructor(readonly source: string) {
        this.fd = fs.openSync(source, 'r');
    }

    get lineNumber(): number {
        return this.readCount;
    }

    hasMore(): boolean {
        this.fill();
        return this.lines.length > 0;
    }

    readLine(): string {
        this.fill();
        const line = this.lines.shift();
        if (line === undefined) {
            throw new EndOfInputError(this.source, this.readCount);
        }
        this.readCount++;
        return line;
    }

    close(): void {
        this.lines.length = 0;
        this.pending = '';
        this.closeDescriptor();
    }

    private closeDescriptor(): void {
        if (this.fd !== undefined) {
            fs.closeSync(this.fd);
            this.fd = undefined;
        }
    }

    private fill(): void {
        while (this.lines.length === 0 && this.fd !== undefined) {
            const bytesRead = fs.readSync(this.fd, this.chunk, 0, this.chunk.length, null);

            if (bytesRead === 0) {
                this.append(this.decoder.end());
                if (this.pending.length > 0) {
                    this.lines.push(stripCarriageReturn(this.pending));
                    this.pending = '';
                }
                this.closeDescriptor();
                return;
            }

            this.append(this.decoder.write(this.chunk.subarray(0, bytesRead)));
        }
    }

    private append(text: string): void {
        if (text.length === 0) {
            return;
        }

        if (this.atStart) {
            this.atStart = false;
            if (text.startsWith(BYTE_ORDER_MARK)) {
                text = text.slice(BYTE_ORDER_MARK.length);
            }
        }

        this.pending += text;

        let newline: number;
        while ((newline = this.pending.indexOf('\n')) >= 0) {
            this.lines.push(stripCarriageReturn(this.pending.slice(0, newline)));
            this.pending = this.pending.slice(newline + 1);
        }
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export class FileTextReaderFactory implements TextFileReaderFactory {
    create(filePath: string): TextFileReader {
        return new FileTextReader(filePath);
    }
}
