/**
 * File Transport
 *
 * Appends JSON lines to a file and rotates by size: `app.log` -> `app.log.1` -> ... -> `app.log.<maxFiles>`.
 * Writes are synchronous so a harness that exits right after a run loses no lines.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private currentSize = 0;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        if (this.currentSize > 0 && this.currentSize + lineSize > this.maxSize) {
            this.rotate();
        }

        fs.appendFileSync(this.filePath, line, 'utf8');
        this.currentSize += lineSize;
    }

    /**
     * Shift rotated files up by one, dropping the oldest, then move the live file to `.1`
     */
    private rotate(): void {
        const oldest = `${this.filePath}.${this.maxFiles}`;
        if (fs.existsSync(oldest)) {
            fs.unlinkSync(oldest);
        }
        for (let i = this.maxFiles - 1; i >= 1; i--) {
            const from = `${this.filePath}.${i}`;
            if (fs.existsSync(from)) {
                fs.renameSync(from, `${this.filePath}.${i + 1}`);
            }
        }
        if (fs.existsSync(this.filePath)) {
            fs.renameSync(this.filePath, `${this.filePath}.1`);
        }
        this.currentSize = 0;
    }

    getFilePath(): string {
        return this.filePath;
    }
}
