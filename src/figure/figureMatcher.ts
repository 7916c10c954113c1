import { describeImage, isSeparator, partitionImages } from './tokenClassifier';
import { FigureConfig, FigureMatch, ImageDescriptor, InlineToken, NonEmptyArray } from './types';

/**
 * Narrows `[start, end)` so it neither begins nor ends with a line break or
 * whitespace-only text.
 */
export function trimSeparators(tokens: readonly InlineToken[], start: number, end: number): [number, number] {
    let from = start;
    let to = end;

    while (from < to && isSeparator(tokens[from])) {
        from += 1;
    }
    while (to > from && isSeparator(tokens[to - 1])) {
        to -= 1;
    }

    return [from, to];
}

export function matchFigure(tokens: readonly InlineToken[], config: FigureConfig): FigureMatch | null {
    const partition = partitionImages(tokens);
    if (!partition) {
        return null;
    }

    const [captionStart, captionEnd] = trimSeparators(tokens, partition.end, tokens.length);
    const hasCaption = captionEnd > captionStart;

    if (!hasCaption && config.skipNoCaption) {
        return null;
    }

    const [first, ...rest] = partition.images;
    const images: NonEmptyArray<ImageDescriptor> = [describeImage(first), ...rest.map(describeImage)];

    if (!hasCaption) {
        return { images };
    }

    return {
        images,
        caption: {
            start: captionStart,
            end: captionEnd,
            tokens: tokens.slice(captionStart, captionEnd)
        }
    };
}
