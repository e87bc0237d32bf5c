/**
 * Tests for the published package metadata
 */

import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';

const projectRoot = path.resolve(__dirname, '..', '..');

interface PackageManifest {
    license?: string;
    exports?: Record<string, { types?: string; default?: string }>;
    scripts?: Record<string, string>;
}

function readManifest(): PackageManifest {
    const parsed: PackageManifest = JSON.parse(
        fs.readFileSync(path.join(projectRoot, 'package.json'), 'utf8')
    );
    return parsed;
}

function sourceFiles(dir: string): string[] {
    return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            return sourceFiles(fullPath);
        }
        return /\.tsx?$/.test(entry.name) ? [fullPath] : [];
    });
}

describe('package metadata', () => {
    it('should point the license field at the bundled license file', () => {
        expect(readManifest().license).toBe('SEE LICENSE IN LICENSE.txt');
        expect(fs.existsSync(path.join(projectRoot, 'LICENSE.txt'))).toBe(true);
    });

    it('should list every file carrying the Elastic License header in the license file', () => {
        const licenseText = fs.readFileSync(path.join(projectRoot, 'LICENSE.txt'), 'utf8');
        const headed = sourceFiles(path.join(projectRoot, 'src'))
            .filter((file) => !file.includes(`${path.sep}__tests__${path.sep}`))
            .filter((file) => fs.readFileSync(file, 'utf8').includes('Licensed under the Elastic License 2.0'))
            .map((file) => path.relative(projectRoot, file).split(path.sep).join('/'));

        expect(headed.sort()).toEqual([
            'src/views/components/error-boundary.tsx',
            'src/views/components/standalone-entry.tsx',
        ]);
        for (const file of headed) {
            expect(licenseText).toContain(file);
        }
        expect(licenseText).toContain('Elastic License 2.0');
        expect(licenseText).toContain('MIT License');
    });

    it('should export the browser bundles built by webpack', () => {
        const manifest = readManifest();

        expect(manifest.exports?.['./widget']?.default).toBe('./dist/browser/widget.js');
        expect(manifest.exports?.['./standalone']?.default).toBe('./dist/browser/standalone.js');
        expect(manifest.scripts?.build).toBe('tsc && webpack --mode production');
        expect(fs.existsSync(path.join(projectRoot, 'webpack.config.js'))).toBe(true);
    });
});
