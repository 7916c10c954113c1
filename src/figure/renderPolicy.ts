import { FigureContractError } from './errors';
import { FigureConfig, FigureNode, ImageDescriptor } from './types';

export type FigureRenderContext<C> = {
    /** Host inline renderer for the caption content. */
    renderCaption: (caption: C) => string;
    /** Attribute escaper, e.g. markdown-it's `utils.escapeHtml`. */
    escape: (value: string) => string;
    /** Self-close void elements (`<img ... />`). */
    xhtml?: boolean;
};

export function renderImage<C>(image: ImageDescriptor, config: FigureConfig, context: FigureRenderContext<C>): string {
    const { escape } = context;
    const title = image.title === undefined ? '' : ` title="${escape(image.title)}"`;
    const close = context.xhtml ? ' />' : '>';
    const img = `<img src="${escape(image.src)}" alt="${escape(image.alt)}"${title}${close}`;

    if (!config.imageLink) {
        return img;
    }

    return `<a href="${escape(image.src)}">${img}</a>`;
}

/**
 * Outer figure markup: one image per line in source order, then the
 * figcaption when the node has a caption.
 */
export function renderFigure<C>(node: FigureNode<C>, config: FigureConfig, context: FigureRenderContext<C>): string {
    if (node.images.length === 0) {
        throw new FigureContractError('Cannot render a figure without images');
    }

    const lines = ['<figure>'];
    for (const image of node.images) {
        lines.push(renderImage(image, config, context));
    }
    if (node.caption !== undefined) {
        lines.push(`<figcaption>${context.renderCaption(node.caption)}</figcaption>`);
    }
    lines.push('</figure>');

    return `${lines.join('\n')}\n`;
}
