import MarkdownIt from 'markdown-it';
import markdownItContainer from 'markdown-it-container';
import markdownItMark from 'markdown-it-mark';
import markdownItSub from 'markdown-it-sub';
import markdownItSup from 'markdown-it-sup';

import { FigurePluginOptions } from '../figure/config';
import { figurePlugin } from '../figure/figurePlugin';

export type FigureMarkdownItOptions = FigurePluginOptions & {
    html?: boolean;
    typographer?: boolean;
    breaks?: boolean;
    /** `::: name` blocks to enable; defaults to DEFAULT_CONTAINERS. */
    containers?: string[];
};

export const DEFAULT_CONTAINERS = ['note', 'center', 'right', 'caption'];

export function createFigureMarkdownIt(options: FigureMarkdownItOptions = {}): MarkdownIt {
    const md = new MarkdownIt({
        html: options.html ?? true,
        linkify: false,
        typographer: options.typographer ?? true,
        breaks: options.breaks ?? false
    });

    md.use(markdownItMark)
        .use(markdownItSub)
        .use(markdownItSup)
        .use(figurePlugin, {
            imageLink: options.imageLink,
            skipNoCaption: options.skipNoCaption
        });

    const containers = options.containers ?? DEFAULT_CONTAINERS;
    containers.forEach(name => {
        md.use(markdownItContainer, name);
    });

    return md;
}

export function renderMarkdown(markdown: string, md?: MarkdownIt): string {
    const renderer = md ?? createFigureMarkdownIt();
    return renderer.render(markdown ?? '');
}
