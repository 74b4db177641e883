// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { PDFDocument } from 'pdf-lib';

import type { LogLevel, LogSink } from '../src/util/logger';
import { Logger } from '../src/util/logger';
import type { MediaBox, TransformablePage } from '../src/core/transform-engine';

export interface LogLine {
    level: Exclude<LogLevel, 'silent'>;
    text: string;
}

export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: LogLine[] } {
    const lines: LogLine[] = [];
    const sink: LogSink = {
        write(lvl, text) {
            lines.push({ level: lvl, text });
        },
    };
    return { logger: new Logger({ level, sink, color: false }), lines };
}

const tempDirs: string[] = [];

/**
 * Fresh directory under the OS temp dir; `removeTempDirs` deletes it.
 */
export function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-assemble-test-'));
    tempDirs.push(dir);
    return dir;
}

/**
 * Delete every directory handed out by `makeTempDir` so far. Call from
 * `afterEach`.
 */
export function removeTempDirs(): void {
    for (const dir of tempDirs.splice(0)) {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

export function touch(root: string, relPath: string, contents = ''): string {
    const filePath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents);
    return filePath;
}

/**
 * Write a PDF with one blank page per size.
 */
export async function writePdf(filePath: string, sizes: Array<[number, number]>): Promise<string> {
    const doc = await PDFDocument.create();
    for (const size of sizes) doc.addPage(size);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, await doc.save());
    return filePath;
}

export interface PageSummary {
    width: number;
    height: number;
    rotation: number;
}

export async function readPages(filePath: string): Promise<PageSummary[]> {
    const doc = await PDFDocument.load(fs.readFileSync(filePath));
    return doc.getPages().map((page) => ({
        width: page.getWidth(),
        height: page.getHeight(),
        rotation: page.getRotation().angle,
    }));
}

export type Point = [number, number];

/**
 * Page that records its content transformations as a point mapping.
 * Each new operation wraps the previous ones, like a PDF content stream.
 */
export class FakePage implements TransformablePage {
    rotation = 0;
    private map: (p: Point) => Point = (p) => p;

    constructor(private readonly box: MediaBox) {}

    getRotation(): number {
        return this.rotation;
    }

    setRotation(angle: number): void {
        this.rotation = angle;
    }

    getMediaBox(): MediaBox {
        return this.box;
    }

    scaleContent(x: number, y: number): void {
        const prev = this.map;
        this.map = (p) => {
            const [px, py] = prev(p);
            return [px * x, py * y];
        };
    }

    translateContent(x: number, y: number): void {
        const prev = this.map;
        this.map = (p) => {
            const [px, py] = prev(p);
            return [px + x, py + y];
        };
    }

    project(p: Point): Point {
        return this.map(p);
    }
}
