import type MarkdownIt from 'markdown-it';

// Host types derived from the markdown-it instance so they track whichever
// typings release is installed.

export type Token = ReturnType<MarkdownIt['parse']>[number];

type CoreRule = Parameters<MarkdownIt['core']['ruler']['push']>[1];

export type StateCore = Parameters<CoreRule>[0];

export type TokenConstructor = StateCore['Token'];
