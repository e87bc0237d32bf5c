/**
 * gvwidget: a scriptable genome browser for notebooks
 *
 * Kernel-side API. The browser-side module is `gvwidget/widget`.
 */

export { BrowserSession, createSession } from './state/browser-session';
export { BrowserWidget, AttachOptions } from './widget/browser-widget';
export { InProcessModel, SyncedModel, ReadableModel, ModelEvent } from './widget/synced-model';
export {
    EngineOptions,
    Teardown,
    VisualizationEngine,
    mountBrowser,
    readSnapshot,
    toEngineOptions,
} from './widget/widget-bridge';

export { track, createTrack } from './config/track-builder';
export { FORMAT_TRACK_TYPES, guessFormat, resolveTrackType } from './config/track-formats';
export { configFromObject, parseConfig, cloneConfig } from './config/browser-config';
export {
    ResourceProvider,
    ServedResource,
    StaticFileProvider,
    resolveFileOrUrl,
    servableConfig,
} from './config/resource-resolver';
export { Settings, DEFAULT_SETTINGS, loadSettings, applySettings } from './config/settings';

export * from './types/browser-types';
export * from './types/track-types';

export {
    ErrorContext,
    GvError,
    ValidationError,
    UnknownTrackFormatError,
    ResourceNotFoundError,
    formatErrorMessage,
} from './utils/error-handler';
export { logger, LogLevel } from './utils/logger';
export { getStandaloneHtml, StandaloneHtmlOptions } from './utils/standalone-html';
