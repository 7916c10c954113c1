import { FigureContractError } from './errors';
import { matchFigure } from './figureMatcher';
import type { Token, TokenConstructor } from './markdownItTypes';
import { classifyInlineTokens } from './tokenClassifier';
import { FigureConfig, FigureNode, ImageDescriptor, NonEmptyArray } from './types';

export const FIGURE_TOKEN_TYPE = 'figure';

export type FigureReplacement = {
    /** Index of the `paragraph_open` token being replaced. */
    index: number;
    token: Token;
    figure: FigureNode<Token[]>;
};

function copyImageDescriptor(image: ImageDescriptor): ImageDescriptor {
    const copy: { src: string; alt: string; title?: string } = { src: image.src, alt: image.alt };
    if (image.title !== undefined) {
        copy.title = image.title;
    }
    return Object.freeze(copy);
}

export function createFigureNode<C>(images: readonly ImageDescriptor[], caption?: C): FigureNode<C> {
    if (images.length === 0) {
        throw new FigureContractError('A figure needs at least one image');
    }

    const [first, ...rest] = images;
    const copies: NonEmptyArray<ImageDescriptor> = [copyImageDescriptor(first), ...rest.map(copyImageDescriptor)];
    Object.freeze(copies);

    if (caption === undefined || (Array.isArray(caption) && caption.length === 0)) {
        return Object.freeze({ images: copies });
    }

    return Object.freeze({ images: copies, caption });
}

function trimmedText(source: Token, content: string, TokenClass: TokenConstructor): Token {
    const token = new TokenClass('text', '', 0);
    token.content = content;
    token.level = source.level;
    return token;
}

// Caption edges lose surrounding whitespace; edited tokens are copies so the
// paragraph's own children stay as parsed.
function prepareCaptionTokens(tokens: Token[], TokenClass: TokenConstructor): Token[] {
    const result = tokens.slice();
    const lastIndex = result.length - 1;

    const first = result[0];
    if (first.type === 'text') {
        result[0] = trimmedText(first, first.content.trimStart(), TokenClass);
    }

    const last = result[lastIndex];
    if (last.type === 'text') {
        result[lastIndex] = trimmedText(last, last.content.trimEnd(), TokenClass);
    }

    return result;
}

function isParagraphAt(tokens: readonly Token[], index: number): boolean {
    return index + 2 < tokens.length &&
        tokens[index].type === 'paragraph_open' &&
        tokens[index + 1].type === 'inline' &&
        tokens[index + 2].type === 'paragraph_close';
}

/**
 * Finds every paragraph that qualifies as a figure. Does not touch `tokens`.
 */
export function collectFigureReplacements(
    tokens: readonly Token[],
    config: FigureConfig,
    TokenClass: TokenConstructor
): FigureReplacement[] {
    const replacements: FigureReplacement[] = [];

    for (let i = 0; i < tokens.length; i += 1) {
        if (!isParagraphAt(tokens, i)) {
            continue;
        }

        const paragraph = tokens[i];
        const children = tokens[i + 1].children ?? [];
        const match = matchFigure(classifyInlineTokens(children), config);
        if (!match) {
            continue;
        }

        const caption = match.caption
            ? prepareCaptionTokens(children.slice(match.caption.start, match.caption.end), TokenClass)
            : undefined;
        const figure = createFigureNode(match.images, caption);

        const token = new TokenClass(FIGURE_TOKEN_TYPE, 'figure', 0);
        token.block = true;
        token.level = paragraph.level;
        token.map = paragraph.map ? [paragraph.map[0], paragraph.map[1]] : null;
        token.meta = { figure };

        replacements.push({ index: i, token, figure });
        i += 2;
    }

    return replacements;
}

/**
 * Swaps each paragraph triple for its figure token. Works from the end of the
 * stream so pending indexes stay valid.
 */
export function applyFigureReplacements(tokens: Token[], replacements: readonly FigureReplacement[]): number {
    const ordered = [...replacements].sort((a, b) => b.index - a.index);

    for (const replacement of ordered) {
        if (!isParagraphAt(tokens, replacement.index)) {
            throw new FigureContractError('Figure replacement no longer points at a paragraph', {
                index: replacement.index
            });
        }
        tokens.splice(replacement.index, 3, replacement.token);
    }

    return ordered.length;
}

export function isFigureNode(value: unknown): value is FigureNode<Token[]> {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    if (!('images' in value) || !Array.isArray(value.images)) {
        return false;
    }
    return !('caption' in value) || value.caption === undefined || Array.isArray(value.caption);
}
