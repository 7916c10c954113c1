// Companion markdown-it plugins whose own typings are missing or pinned to an
// older markdown-it release.

declare module 'markdown-it-mark' {
    import type MarkdownIt from 'markdown-it';

    function markdownItMark(md: MarkdownIt): void;
    export = markdownItMark;
}

declare module 'markdown-it-sub' {
    import type MarkdownIt from 'markdown-it';

    function markdownItSub(md: MarkdownIt): void;
    export = markdownItSub;
}

declare module 'markdown-it-sup' {
    import type MarkdownIt from 'markdown-it';

    function markdownItSup(md: MarkdownIt): void;
    export = markdownItSup;
}

declare module 'markdown-it-container' {
    import type MarkdownIt from 'markdown-it';

    type ContainerRenderRule = MarkdownIt['renderer']['rules'][string];

    type ContainerOptions = {
        marker?: string;
        validate?: (params: string, markup: string) => boolean;
        render?: ContainerRenderRule;
    };

    function markdownItContainer(md: MarkdownIt, name: string, options?: ContainerOptions): void;
    export = markdownItContainer;
}
