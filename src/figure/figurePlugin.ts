import type MarkdownIt from 'markdown-it';
import { logger } from '../utils/logger';
import { FigurePluginOptions, resolveFigureConfig } from './config';
import { FigureContractError } from './errors';
import {
    applyFigureReplacements,
    collectFigureReplacements,
    FIGURE_TOKEN_TYPE,
    isFigureNode
} from './nodeBuilder';
import { renderFigure } from './renderPolicy';

/**
 * markdown-it plugin: paragraphs made of leading images (plus optional
 * trailing caption text) become `<figure>` elements.
 *
 *     md.use(figurePlugin, { imageLink: true });
 */
export function figurePlugin(md: MarkdownIt, options: FigurePluginOptions = {}): void {
    const config = resolveFigureConfig(options);

    // Pushed last so linkify, typographer and text joining have already run on captions.
    md.core.ruler.push('figure', state => {
        const replacements = collectFigureReplacements(state.tokens, config, state.Token);
        if (replacements.length === 0) {
            return;
        }

        const applied = applyFigureReplacements(state.tokens, replacements);
        logger.debug(`replaced ${applied} paragraph(s) with figures`);
    });

    md.renderer.rules[FIGURE_TOKEN_TYPE] = (tokens, idx, renderOptions, env, self) => {
        const figure: unknown = tokens[idx].meta?.figure;
        if (!isFigureNode(figure)) {
            throw new FigureContractError('Figure token is missing its figure node', { index: idx });
        }

        return renderFigure(figure, config, {
            renderCaption: caption => self.renderInline(caption, renderOptions, env),
            escape: md.utils.escapeHtml,
            xhtml: renderOptions.xhtmlOut
        });
    };
}
