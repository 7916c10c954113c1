import {
    classifyInlineToken,
    classifyInlineTokens,
    isSeparator,
    partitionImages
} from '../../figure/tokenClassifier';
import { InlineToken } from '../../figure/types';
import { inlineChildren } from '../helpers/markdownState';

const image = (src: string, alt = ''): InlineToken => ({ kind: 'image', src, alt });
const text = (content: string): InlineToken => ({ kind: 'text', content });
const softbreak: InlineToken = { kind: 'softbreak' };

describe('figure token classifier', () => {
    it('maps markdown-it image tokens to image descriptors with label text as alt', () => {
        const [token] = inlineChildren('![Picture of **Oscar**](/path/to/cat.jpg "Oscar")');

        expect(classifyInlineToken(token)).toEqual({
            kind: 'image',
            src: '/path/to/cat.jpg',
            alt: 'Picture of Oscar',
            title: 'Oscar'
        });
    });

    it('leaves title out when the image has none', () => {
        const [token] = inlineChildren('![cat](cat.jpg)');

        expect(classifyInlineToken(token)).toEqual({ kind: 'image', src: 'cat.jpg', alt: 'cat' });
    });

    it('keeps an empty source as is', () => {
        const [token] = inlineChildren('![empty]()');

        expect(classifyInlineToken(token)).toEqual({ kind: 'image', src: '', alt: 'empty' });
    });

    it('classifies text, soft breaks and other inline tokens', () => {
        const kinds = classifyInlineTokens(inlineChildren('plain\n**bold**')).map(token => token.kind);

        expect(kinds).toEqual(['text', 'softbreak', 'text', 'other', 'text', 'other', 'text']);
    });

    it('classifies hard breaks', () => {
        const kinds = classifyInlineTokens(inlineChildren('![a](a.png)\\\nnext')).map(token => token.kind);

        expect(kinds).toEqual(['image', 'hardbreak', 'text']);
    });

    it('treats soft breaks and whitespace-only text as separators', () => {
        expect(isSeparator(softbreak)).toBe(true);
        expect(isSeparator(text('  '))).toBe(true);
        expect(isSeparator(text(' a '))).toBe(false);
        expect(isSeparator(text(''))).toBe(true);
        expect(isSeparator({ kind: 'hardbreak' })).toBe(true);
        expect(isSeparator({ kind: 'other', type: 'strong_open' })).toBe(false);
    });

    it('partitions a single leading image from its caption', () => {
        const partition = partitionImages([image('a.png'), text('Caption text')]);

        expect(partition).toEqual({ start: 0, end: 1, images: [image('a.png')] });
    });

    it('collects consecutive images across soft breaks and spaces', () => {
        const tokens = [image('a'), softbreak, image('b'), text(' '), image('c'), softbreak, text('Group caption')];

        const partition = partitionImages(tokens);

        expect(partition?.images.map(img => img.src)).toEqual(['a', 'b', 'c']);
        expect(partition?.start).toBe(0);
        expect(partition?.end).toBe(5);
    });

    it('collects images separated by hard breaks', () => {
        const partition = partitionImages([image('a'), { kind: 'hardbreak' }, image('b'), text('Caption')]);

        expect(partition).toEqual({ start: 0, end: 3, images: [image('a'), image('b')] });
    });

    it('skips leading whitespace-only text', () => {
        const partition = partitionImages([text('   '), image('a.png')]);

        expect(partition).toEqual({ start: 1, end: 2, images: [image('a.png')] });
    });

    it('reports no images when the paragraph does not start with one', () => {
        expect(partitionImages([text('intro '), image('a.png')])).toBeNull();
        expect(partitionImages([text('no images at all')])).toBeNull();
        expect(partitionImages([])).toBeNull();
        expect(partitionImages([text(' ')])).toBeNull();
    });

    it('never pulls an image after caption text into the image run', () => {
        const partition = partitionImages([image('a'), text('caption'), image('b')]);

        expect(partition).toEqual({ start: 0, end: 1, images: [image('a')] });
    });
});
