import type { Token } from './markdownItTypes';
import { ImageDescriptor, ImageInlineToken, ImagePartition, InlineToken, NonEmptyArray } from './types';

// Plain text of an image label, the way markdown-it fills the `alt` attribute.
function labelText(children: readonly Token[] | null): string {
    if (!children) {
        return '';
    }

    let result = '';
    for (const child of children) {
        switch (child.type) {
            case 'text':
            case 'html_inline':
            case 'html_block':
                result += child.content;
                break;
            case 'image':
                result += labelText(child.children);
                break;
            case 'softbreak':
            case 'hardbreak':
                result += '\n';
                break;
            default:
                break;
        }
    }
    return result;
}

export function classifyInlineToken(token: Token): InlineToken {
    switch (token.type) {
        case 'image': {
            const image: ImageInlineToken = {
                kind: 'image',
                src: token.attrGet('src') ?? '',
                alt: labelText(token.children)
            };
            const title = token.attrGet('title');
            if (title !== null) {
                image.title = title;
            }
            return image;
        }
        case 'text':
            return { kind: 'text', content: token.content };
        case 'softbreak':
            return { kind: 'softbreak' };
        case 'hardbreak':
            return { kind: 'hardbreak' };
        default:
            return { kind: 'other', type: token.type };
    }
}

export function classifyInlineTokens(tokens: readonly Token[]): InlineToken[] {
    return tokens.map(classifyInlineToken);
}

export function isWhitespaceText(token: InlineToken): boolean {
    return token.kind === 'text' && token.content.trim() === '';
}

/**
 * Tokens allowed between images of the leading run and stripped from caption
 * edges. Empty text counts too: markdown-it leaves it around emphasis delimiters.
 */
export function isSeparator(token: InlineToken): boolean {
    return token.kind === 'softbreak' || token.kind === 'hardbreak' || isWhitespaceText(token);
}

export function describeImage(image: ImageInlineToken): ImageDescriptor {
    return image.title === undefined
        ? { src: image.src, alt: image.alt }
        : { src: image.src, alt: image.alt, title: image.title };
}

/**
 * Splits a paragraph into its leading image run and the remainder.
 * Returns null when the first significant token is not an image.
 */
export function partitionImages(tokens: readonly InlineToken[]): ImagePartition | null {
    let start = 0;
    while (start < tokens.length && isWhitespaceText(tokens[start])) {
        start += 1;
    }

    if (start >= tokens.length) {
        return null;
    }

    const first = tokens[start];
    if (first.kind !== 'image') {
        return null;
    }

    const images: NonEmptyArray<ImageInlineToken> = [first];
    let end = start + 1;

    for (let i = start + 1; i < tokens.length; i += 1) {
        const token = tokens[i];
        if (token.kind === 'image') {
            images.push(token);
            end = i + 1;
        } else if (!isSeparator(token)) {
            break;
        }
    }

    return { start, end, images };
}
