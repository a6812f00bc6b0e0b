export const name = '@projpick/exec';

export * from './runner/runner';
export * from './selector/fzf';
export * from './tmux/client';
export * from './tmux/naming';
export * from './tmux/sessionController';
