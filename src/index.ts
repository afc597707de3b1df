export * from './dialog/index.js';
export { loadConfig, ConfigSchema, type Config } from './config/loader.js';
export { renderDialog, type DialogRenderOptions } from './tui/render.js';
export { fromTerminalKit, type TermSession, type TermWriter } from './tui/term.js';
export { createTerminalHost, type TerminalHost } from './tui/terminal-host.js';
export { runDialog, CONFIRM_LABEL, type DialogOutcome, type FieldValue, type RunDialogOptions } from './tui/run-dialog.js';
