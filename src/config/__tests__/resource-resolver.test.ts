/**
 * Tests for local file resolution
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StaticFileProvider, resolveFileOrUrl, servableConfig } from '../resource-resolver';
import { configFromObject } from '../browser-config';
import { ResourceNotFoundError, ValidationError } from '../../utils/error-handler';

describe('resource resolver', () => {
    let rootDir: string;

    beforeEach(() => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gvwidget-'));
        fs.mkdirSync(path.join(rootDir, 'data'));
        fs.writeFileSync(path.join(rootDir, 'data', 'sample.bam'), 'bam');
        fs.writeFileSync(path.join(rootDir, 'data', 'sample.bam.bai'), 'bai');
        fs.writeFileSync(path.join(rootDir, 'data', 'my peaks.bed'), 'chr1\t1\t10\n');
    });

    afterEach(() => {
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    describe('StaticFileProvider', () => {
        it('should map files below the root onto the base URL', () => {
            const provider = new StaticFileProvider(rootDir, '/files/');
            const resource = provider.create(path.join(rootDir, 'data', 'sample.bam'));

            expect(resource.url).toBe('/files/data/sample.bam');
            expect(resource.path).toBe(path.join(rootDir, 'data', 'sample.bam'));
        });

        it('should add a missing trailing slash to the base URL', () => {
            const provider = new StaticFileProvider(rootDir, 'http://localhost:8888/files');

            expect(provider.create(path.join(rootDir, 'data', 'sample.bam')).url).toBe(
                'http://localhost:8888/files/data/sample.bam'
            );
        });

        it('should percent-encode path segments', () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            expect(provider.create(path.join(rootDir, 'data', 'my peaks.bed')).url).toBe(
                '/files/data/my%20peaks.bed'
            );
        });

        it('should reuse a resource for the same file', () => {
            const provider = new StaticFileProvider(rootDir, '/files/');
            const filePath = path.join(rootDir, 'data', 'sample.bam');

            expect(provider.create(filePath)).toBe(provider.create(filePath));
            expect(provider.list()).toHaveLength(1);
        });

        it('should serve a file whose name starts with two dots', () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            expect(provider.create(path.join(rootDir, '..data.bed')).url).toBe('/files/..data.bed');
        });

        it('should refuse the parent of the root', () => {
            const provider = new StaticFileProvider(path.join(rootDir, 'data'), '/files/');

            expect(() => provider.create(rootDir)).toThrow(ValidationError);
        });

        it('should refuse files outside the root', () => {
            const provider = new StaticFileProvider(path.join(rootDir, 'data'), '/files/');

            expect(() => provider.create(path.join(rootDir, 'other.bam'))).toThrow(
                ValidationError
            );
        });
    });

    describe('resolveFileOrUrl', () => {
        it('should return URLs unchanged', async () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            await expect(
                resolveFileOrUrl('https://example.org/sample.bam', provider)
            ).resolves.toBe('https://example.org/sample.bam');
            expect(provider.list()).toHaveLength(0);
        });

        it('should serve existing local files', async () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            await expect(
                resolveFileOrUrl(path.join(rootDir, 'data', 'sample.bam'), provider)
            ).resolves.toBe('/files/data/sample.bam');
        });

        it('should reject missing files', async () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            await expect(
                resolveFileOrUrl(path.join(rootDir, 'missing.bam'), provider)
            ).rejects.toBeInstanceOf(ResourceNotFoundError);
        });

        it('should reject directories', async () => {
            const provider = new StaticFileProvider(rootDir, '/files/');

            await expect(
                resolveFileOrUrl(path.join(rootDir, 'data'), provider)
            ).rejects.toBeInstanceOf(ResourceNotFoundError);
        });
    });

    describe('servableConfig', () => {
        it('should rewrite local track and index files without touching the original', async () => {
            const provider = new StaticFileProvider(rootDir, '/files/');
            const config = configFromObject({
                genome: 'mm10',
                tracks: [
                    {
                        url: path.join(rootDir, 'data', 'sample.bam'),
                        indexURL: path.join(rootDir, 'data', 'sample.bam.bai'),
                    },
                    { url: 'https://example.org/genes.gtf' },
                ],
            });

            const servable = await servableConfig(config, provider);

            expect(servable.tracks[0].url).toBe('/files/data/sample.bam');
            expect(servable.tracks[0].indexURL).toBe('/files/data/sample.bam.bai');
            expect(servable.tracks[1].url).toBe('https://example.org/genes.gtf');
            expect(servable.tracks[1].indexURL).toBeNull();
            expect(config.tracks[0].url).toBe(path.join(rootDir, 'data', 'sample.bam'));
        });
    });
});
