// test/resolve-entries.spec.ts

import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';

import { mergeOptions, resolveEntries, type PathExpanderFn } from '../src/core/resolve-entries';
import { captureLogger, makeTempDir, removeTempDirs, touch } from './helpers';

afterEach(removeTempDirs);

/**
 * Expander over a fixed map; records every call.
 */
function fakeExpander(tree: Record<string, string[]>) {
    const calls: Array<[string, boolean]> = [];
    const expand: PathExpanderFn = (target, recursive) => {
        calls.push([target, recursive]);
        return tree[target] ?? [];
    };
    return { expand, calls };
}

describe('mergeOptions', () => {
    it('appends only the options the parent lacks', () => {
        expect(mergeOptions(['a', 'b'], ['b', 'c'])).toEqual(['a', 'b', 'c']);
    });

    it('drops duplicates within the child list', () => {
        expect(mergeOptions([], ['c', 'a', 'c'])).toEqual(['c', 'a']);
    });

    it('does not mutate the inherited list', () => {
        const inherited = ['a'];
        mergeOptions(inherited, ['b']);
        expect(inherited).toEqual(['a']);
    });
});

describe('resolveEntries', () => {
    it('expands plain paths in declaration order with the inherited options', () => {
        const { expand, calls } = fakeExpander({
            'z.pdf': ['z.pdf'],
            dir: ['dir/1.pdf', 'dir/2.pdf'],
        });

        const entries = resolveEntries(['z.pdf', 'dir'], ['rotate90'], { expand });

        expect(entries).toEqual([
            { path: 'z.pdf', options: ['rotate90'] },
            { path: 'dir/1.pdf', options: ['rotate90'] },
            { path: 'dir/2.pdf', options: ['rotate90'] },
        ]);
        expect(calls).toEqual([
            ['z.pdf', false],
            ['dir', false],
        ]);
    });

    it('sorts the files of a group and merges its options', () => {
        const { expand, calls } = fakeExpander({ a: ['a'], b: ['b'] });

        const entries = resolveEntries([{ files: ['b', 'a'], options: ['b', 'c'] }], ['a', 'b'], {
            expand,
        });

        expect(entries).toEqual([
            { path: 'a', options: ['a', 'b', 'c'] },
            { path: 'b', options: ['a', 'b', 'c'] },
        ]);
        expect(calls).toEqual([
            ['a', false],
            ['b', false],
        ]);
    });

    it('keeps config order across entries while sorting inside a group', () => {
        const { expand } = fakeExpander({ m: ['m'], b: ['b'], a: ['a'], c: ['c'] });

        const entries = resolveEntries(['m', { files: ['c', 'a'] }, 'b'], [], { expand });

        expect(entries.map((e) => e.path)).toEqual(['m', 'a', 'c', 'b']);
    });

    it('expands recursively when the group carries "recursive"', () => {
        const { expand, calls } = fakeExpander({ imgs: ['imgs/x.png'] });

        resolveEntries([{ files: ['imgs'], options: ['recursive', 'flipH'] }], [], { expand });

        expect(calls).toEqual([['imgs', true]]);
    });

    it('inherits "recursive" from the parent scope', () => {
        const { expand, calls } = fakeExpander({});

        resolveEntries([{ files: ['imgs'] }], ['recursive'], { expand });

        expect(calls).toEqual([['imgs', true]]);
    });

    it('never expands plain path entries recursively', () => {
        const { expand, calls } = fakeExpander({});

        resolveEntries(['imgs'], ['recursive'], { expand });

        expect(calls).toEqual([['imgs', false]]);
    });

    it('skips malformed entries with a warning', () => {
        const { logger, lines } = captureLogger();
        const { expand } = fakeExpander({ ok: ['ok'] });

        const entries = resolveEntries([42, null, 'ok', ['nested']], [], { expand, logger });

        expect(entries).toEqual([{ path: 'ok', options: [] }]);
        expect(lines.filter((l) => l.level === 'warn').map((l) => l.text)).toEqual([
            'Skipping entry #0: expected a path or an object, got 42',
            'Skipping entry #1: expected a path or an object, got null',
            'Skipping entry #3: expected a path or an object, got ["nested"]',
        ]);
    });

    it('treats inner files strictly as path strings', () => {
        const { logger, lines } = captureLogger();
        const { expand, calls } = fakeExpander({ a: ['a'] });

        const entries = resolveEntries(
            [{ files: ['a', { files: ['b'], options: ['rotate90'] }], options: ['flipV'] }],
            [],
            { expand, logger },
        );

        expect(entries).toEqual([{ path: 'a', options: ['flipV'] }]);
        expect(calls).toEqual([['a', false]]);
        expect(lines).toContainEqual({
            level: 'warn',
            text: 'Ignoring non-string value in files of entry #0: {"files":["b"],"options":["rotate90"]}',
        });
    });

    it('produces frozen entries', () => {
        const { expand } = fakeExpander({ a: ['a'] });

        const [entry] = resolveEntries([{ files: ['a'], options: ['rotate180'] }], [], { expand });

        expect(Object.isFrozen(entry)).toBe(true);
        expect(Object.isFrozen(entry.options)).toBe(true);
    });

    it('tags every file of a directory group with exactly its options', () => {
        const root = makeTempDir();
        touch(root, 'dirX/2.pdf');
        touch(root, 'dirX/1.png');
        touch(root, 'dirX/sub/3.pdf');

        const entries = resolveEntries([{ files: [path.join(root, 'dirX')], options: ['rotate180'] }]);

        expect(entries).toEqual([
            { path: path.join(root, 'dirX', '1.png'), options: ['rotate180'] },
            { path: path.join(root, 'dirX', '2.pdf'), options: ['rotate180'] },
        ]);
    });

    it('tags every file under a recursive group, nested ones included', () => {
        const root = makeTempDir();
        touch(root, 'imgs/a.png');
        touch(root, 'imgs/sub/b.png');

        const entries = resolveEntries([
            { files: [path.join(root, 'imgs')], options: ['recursive', 'flipH'] },
        ]);

        expect(entries).toEqual([
            { path: path.join(root, 'imgs', 'a.png'), options: ['recursive', 'flipH'] },
            { path: path.join(root, 'imgs', 'sub', 'b.png'), options: ['recursive', 'flipH'] },
        ]);
    });
});
