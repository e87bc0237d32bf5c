/**
 * Standalone page generation
 *
 * Produces an HTML document that boots the bundled widget script outside a
 * notebook. The configuration is embedded as inert JSON and read back by the
 * standalone entry.
 */

import type { BrowserConfig } from '../types/browser-types';

/** id of the <script type="application/json"> element carrying the config */
export const CONFIG_ELEMENT_ID = 'gvwidget-config';

export interface StandaloneHtmlOptions {
    /** URL of the bundled standalone entry script */
    scriptUrl: string;

    /** Page title (default: "Genome Browser") */
    title?: string;

    /** Nonce for the Content Security Policy; generated when omitted */
    nonce?: string;
}

/**
 * Generate a random nonce for Content Security Policy
 * @returns 32-character random string
 */
export function getNonce(): string {
    let text = '';
    const possible = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
    for (let i = 0; i < 32; i++) {
        text += possible.charAt(Math.floor(Math.random() * possible.length));
    }
    return text;
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Serialize a config for embedding inside a <script> element
 *
 * `<` is escaped so track names cannot close the element early.
 */
export function serializeConfigForHtml(config: BrowserConfig): string {
    return JSON.stringify(config).replace(/</g, '\\u003c');
}

/**
 * Generate the standalone page
 */
export function getStandaloneHtml(config: BrowserConfig, options: StandaloneHtmlOptions): string {
    const nonce = options.nonce ?? getNonce();
    const title = escapeHtml(options.title ?? 'Genome Browser');
    const scriptUrl = escapeHtml(options.scriptUrl);

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta http-equiv="Content-Security-Policy"
          content="default-src 'none';
                   style-src 'unsafe-inline';
                   img-src data: blob:;
                   font-src data:;
                   script-src 'nonce-${nonce}';
                   connect-src *;">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <style>
        body, html {
            margin: 0;
            padding: 0;
            width: 100%;
            font-family: sans-serif;
        }
        #root {
            width: 100%;
        }
    </style>
</head>
<body>
    <div id="root"></div>
    <script type="application/json" id="${CONFIG_ELEMENT_ID}">${serializeConfigForHtml(config)}</script>
    <script nonce="${nonce}" type="module" src="${scriptUrl}"></script>
</body>
</html>`;
}
