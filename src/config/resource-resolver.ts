/**
 * Resource Resolver
 *
 * Makes local track files reachable from the widget's browser context. URLs
 * pass through unchanged; local paths are checked and handed to a
 * ResourceProvider, which returns the URL the browser should fetch.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import type { BrowserConfig } from '../types/browser-types';
import { ResourceNotFoundError, ValidationError } from '../utils/error-handler';
import { isHref } from '../utils/format-utils';
import { logger } from '../utils/logger';
import { cloneConfig } from './browser-config';

export interface ServedResource {
    /** Absolute path of the served file */
    path: string;

    /** URL under which the browser can fetch it */
    url: string;
}

export interface ResourceProvider {
    create(absolutePath: string): ServedResource;
}

/**
 * Serves files below a root directory from a fixed base URL
 *
 * Fits notebook servers that expose the working directory on a route such as
 * `/files/`. Files outside the root cannot be served.
 */
export class StaticFileProvider implements ResourceProvider {
    private readonly resources = new Map<string, ServedResource>();

    /**
     * @param rootDir - Directory the base URL maps onto
     * @param baseUrl - URL prefix, e.g. "/files/" or "http://localhost:8888/files"
     */
    constructor(
        private readonly rootDir: string,
        private readonly baseUrl: string
    ) {}

    create(absolutePath: string): ServedResource {
        const existing = this.resources.get(absolutePath);
        if (existing) {
            return existing;
        }

        const relative = path.relative(path.resolve(this.rootDir), absolutePath);
        if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
            throw new ValidationError(
                `${absolutePath} is outside the served directory ${this.rootDir}`,
                'url'
            );
        }

        const encoded = relative.split(path.sep).map(encodeURIComponent).join('/');
        const prefix = this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`;
        const resource: ServedResource = { path: absolutePath, url: `${prefix}${encoded}` };

        this.resources.set(absolutePath, resource);
        logger.debug(`Serving ${absolutePath} at ${resource.url}`);
        return resource;
    }

    /**
     * All resources handed out so far
     */
    list(): ServedResource[] {
        return [...this.resources.values()];
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile();
    } catch {
        return false;
    }
}

/**
 * Resolve a file path or URL to a URL
 *
 * @param pathOrUrl - Local path (relative to the working directory) or http(s) URL
 * @param provider - Serves local files
 * @throws ResourceNotFoundError if a local path is not an existing file
 */
export async function resolveFileOrUrl(
    pathOrUrl: string,
    provider: ResourceProvider
): Promise<string> {
    if (isHref(pathOrUrl)) {
        return pathOrUrl;
    }

    const absolutePath = path.resolve(pathOrUrl);
    if (!(await isFile(absolutePath))) {
        throw new ResourceNotFoundError(absolutePath);
    }
    return provider.create(absolutePath).url;
}

/**
 * Copy of a config whose track files are all reachable from the browser
 */
export async function servableConfig(
    config: BrowserConfig,
    provider: ResourceProvider
): Promise<BrowserConfig> {
    const servable = cloneConfig(config);

    for (const t of servable.tracks) {
        t.url = await resolveFileOrUrl(t.url, provider);
        if (t.indexURL) {
            t.indexURL = await resolveFileOrUrl(t.indexURL, provider);
        }
    }

    return servable;
}
