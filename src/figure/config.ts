import { logger } from '../utils/logger';
import { FigureConfigError } from './errors';
import { FigureConfig } from './types';

export type FigurePluginOptions = {
    /** Wrap every image in a link to its own source. */
    imageLink?: boolean;
    /** Leave image paragraphs without a caption as plain paragraphs. */
    skipNoCaption?: boolean;
};

export const DEFAULT_FIGURE_CONFIG: FigureConfig = Object.freeze({
    imageLink: false,
    skipNoCaption: false
});

const recognizedKeys = new Set<string>(['imageLink', 'skipNoCaption']);

function readBoolean(options: object, key: keyof FigureConfig): boolean {
    const value: unknown = Reflect.get(options, key);
    if (value === undefined) {
        return DEFAULT_FIGURE_CONFIG[key];
    }
    if (typeof value !== 'boolean') {
        throw new FigureConfigError(`Figure option "${key}" must be a boolean`, {
            key,
            received: typeof value
        });
    }
    return value;
}

/**
 * Turns user options into a frozen FigureConfig. Unknown keys are ignored.
 */
export function resolveFigureConfig(options?: unknown): FigureConfig {
    if (options === undefined || options === null) {
        return DEFAULT_FIGURE_CONFIG;
    }

    if (typeof options !== 'object' || Array.isArray(options)) {
        throw new FigureConfigError('Figure options must be an object', {
            received: Array.isArray(options) ? 'array' : typeof options
        });
    }

    const ignored = Object.keys(options).filter(key => !recognizedKeys.has(key));
    if (ignored.length > 0) {
        logger.debug(`ignoring unrecognized options: ${ignored.join(', ')}`);
    }

    return Object.freeze({
        imageLink: readBoolean(options, 'imageLink'),
        skipNoCaption: readBoolean(options, 'skipNoCaption')
    });
}
