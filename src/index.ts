import { figurePlugin } from './figure/figurePlugin';

export { figurePlugin };
export { DEFAULT_FIGURE_CONFIG, FigurePluginOptions, resolveFigureConfig } from './figure/config';
export { FigureConfigError, FigureContractError, FigurePluginError } from './figure/errors';
export { matchFigure, trimSeparators } from './figure/figureMatcher';
export {
    applyFigureReplacements,
    collectFigureReplacements,
    createFigureNode,
    FIGURE_TOKEN_TYPE,
    FigureReplacement,
    isFigureNode
} from './figure/nodeBuilder';
export { FigureRenderContext, renderFigure, renderImage } from './figure/renderPolicy';
export { classifyInlineToken, classifyInlineTokens, partitionImages } from './figure/tokenClassifier';
export * from './figure/types';
export { createFigureMarkdownIt, DEFAULT_CONTAINERS, FigureMarkdownItOptions, renderMarkdown } from './markdown/markdownItFactory';
export { Logger, logger } from './utils/logger';
export default figurePlugin;
