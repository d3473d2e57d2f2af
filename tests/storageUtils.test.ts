// tests/storageUtils.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import * as fs from 'node:fs';
import * as path from 'node:path';
import { writeTextFileAtomic } from '../src/utils/storage/storageUtils.js';
import { makeTempDir, removeDir } from './helpers/fixtures.js';

describe('writeTextFileAtomic', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = makeTempDir();
    });

    afterEach(() => {
        vi.restoreAllMocks();
        removeDir(workDir);
    });

    it('should replace the target and leave no temporary file behind', async () => {
        const target = path.join(workDir, 'out.vhd');
        fs.writeFileSync(target, 'old');

        await writeTextFileAtomic(target, 'new');

        expect(fs.readFileSync(target, 'utf-8')).toBe('new');
        expect(fs.readdirSync(workDir)).toEqual(['out.vhd']);
    });

    it('should give concurrent writes to one target separate temporary files', async () => {
        const target = path.join(workDir, 'shared.vhd');

        await Promise.all([writeTextFileAtomic(target, 'first'), writeTextFileAtomic(target, 'second')]);

        expect(['first', 'second']).toContain(fs.readFileSync(target, 'utf-8'));
        expect(fs.readdirSync(workDir)).toEqual(['shared.vhd']);
    });

    it('should rethrow the write error when cleanup fails too', async () => {
        const rm = vi.spyOn(fs.promises, 'rm').mockRejectedValueOnce(new Error('cleanup failed'));

        await expect(writeTextFileAtomic(path.join(workDir, 'missing', 'out.vhd'), 'text')).rejects.toMatchObject({
            code: 'ENOENT',
        });
        expect(rm).toHaveBeenCalledOnce();
    });
});
