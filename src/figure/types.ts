// Figure data types (host-agnostic). Only the classifier knows about markdown-it tokens.

export type NonEmptyArray<T> = [T, ...T[]];

export type ImageInlineToken = {
    kind: 'image';
    src: string;
    alt: string;
    title?: string;
};

export type TextInlineToken = {
    kind: 'text';
    content: string;
};

export type SoftBreakInlineToken = {
    kind: 'softbreak';
};

export type HardBreakInlineToken = {
    kind: 'hardbreak';
};

export type OtherInlineToken = {
    kind: 'other';
    type: string;
};

export type InlineToken = ImageInlineToken | TextInlineToken | SoftBreakInlineToken | HardBreakInlineToken | OtherInlineToken;

export type ImageDescriptor = {
    readonly src: string;
    readonly alt: string;
    readonly title?: string;
};

/**
 * Trimmed caption remainder of a paragraph: `[start, end)` indexes the
 * paragraph's inline tokens, `tokens` holds the classified slice.
 */
export type CaptionSpan = {
    start: number;
    end: number;
    tokens: readonly InlineToken[];
};

export type ImagePartition = {
    /** Index of the first image (leading whitespace text skipped). */
    start: number;
    /** Index right after the last image of the leading run. */
    end: number;
    images: NonEmptyArray<ImageInlineToken>;
};

export type FigureMatch = {
    images: NonEmptyArray<ImageDescriptor>;
    caption?: CaptionSpan;
};

/**
 * Structured replacement for a paragraph. `C` is whatever the host needs to
 * render the caption inline content (markdown-it tokens for the plugin).
 */
export type FigureNode<C> = {
    readonly images: Readonly<NonEmptyArray<ImageDescriptor>>;
    readonly caption?: C;
};

export type FigureConfig = {
    readonly imageLink: boolean;
    readonly skipNoCaption: boolean;
};
