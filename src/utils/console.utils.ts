import chalk, { type ChalkInstance } from 'chalk';
import * as fs from 'fs';
import { ConsoleSink, ConsoleStyle } from '@I/index';

export interface ChalkConsoleSinkOptions {
    /** Chalk instance used for styling, defaults to the auto-detecting one */
    chalk?: ChalkInstance;
    write?: (line: string) => void;
    /** Receives the escape codes that switch the console to the clear style */
    clear?: (openCodes: string) => void;
}

const STYLE_MARKER = 'X';

function clearConsole(openCodes: string): void {
    process.stdout.write(openCodes);
    console.clear();
}

/**
 * Console sink writing through console.log, styled with chalk.
 * Every styled line carries its own closing codes, so the terminal is back
 * to its default colors once the line has been written.
 */
export class ChalkConsoleSink implements ConsoleSink {
    private readonly chalk: ChalkInstance;
    private readonly write: (line: string) => void;
    private readonly clearScreen: (openCodes: string) => void;

    constructor(options: ChalkConsoleSinkOptions = {}) {
        this.chalk = options.chalk ?? chalk;
        this.write = options.write ?? ((line) => console.log(line));
        this.clearScreen = options.clear ?? clearConsole;
    }

    writeLine(text: string, style: ConsoleStyle = {}): void {
        this.write(this.paint(text, style));
    }

    /**
     * Switches the console to the style's colors, left open, before clearing
     * so the cleared screen takes the background color
     */
    clear(style: ConsoleStyle = {}): void {
        const sample = this.paint(STYLE_MARKER, style);
        this.clearScreen(sample.slice(0, sample.indexOf(STYLE_MARKER)));
    }

    private paint(text: string, style: ConsoleStyle): string {
        let painter = this.chalk;
        if (style.background) {
            painter = painter[style.background];
        }
        if (style.foreground) {
            painter = painter[style.foreground];
        }
        return painter(text);
    }
}

const KEY_POLL_INTERVAL_MS = 20;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function sleepSync(milliseconds: number): void {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, milliseconds);
}

/**
 * Blocks the calling thread until a single key is pressed.
 * Returns immediately when stdin is not an interactive terminal.
 */
export function waitForKeyPress(): void {
    const stdin = process.stdin;
    if (!stdin.isTTY) return;

    stdin.setRawMode(true);
    try {
        const buffer = Buffer.alloc(1);
        for (;;) {
            try {
                fs.readSync(stdin.fd, buffer, 0, 1, null);
                return;
            } catch (error) {
                // libuv may leave the tty in non-blocking mode
                if (isErrnoException(error) && error.code === 'EAGAIN') {
                    sleepSync(KEY_POLL_INTERVAL_MS);
                    continue;
                }
                throw error;
            }
        }
    } finally {
        stdin.setRawMode(false);
    }
}
