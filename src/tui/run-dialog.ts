import { createDialog } from '../dialog/controller.js';
import { nextOf } from '../dialog/focus-ring.js';
import { escapeMarkup } from '../dialog/markup.js';
import type { Align, BackgroundColor, FieldSpec, FocusKeyBindings } from '../dialog/types.js';
import { isCancelKeyName } from './key-utils.js';
import type { TermSession } from './term.js';
import { createTerminalHost } from './terminal-host.js';

export const CONFIRM_LABEL = 'Sure?';

export interface RunDialogOptions {
  id?: string;
  title?: string;
  text: string;
  fields?: FieldSpec[];
  buttons?: string[];
  /** Buttons that turn into "Sure?" on the first press and only complete on the second. */
  confirm?: string[];
  /** Labels of fields that must be filled in before a button completes the dialog. */
  required?: string[];
  align?: Align;
  width?: number;
  height?: number;
  background?: BackgroundColor | null;
  keys?: Partial<FocusKeyBindings>;
  colorsDisabled: boolean;
}

export interface FieldValue {
  label: string;
  value: string;
}

export type DialogOutcome =
  | { kind: 'button'; label: string; index: number; fields: FieldValue[] }
  | { kind: 'cancel'; fields: FieldValue[] };

/**
 * Shows a single message box full-screen and resolves once a button completes it or it is
 * canceled (Escape, Ctrl+C).
 */
export async function runDialog(term: TermSession, options: RunDialogOptions): Promise<DialogOutcome> {
  const host = createTerminalHost(term, { colorsDisabled: options.colorsDisabled });
  const fields = options.fields ?? [];
  const confirm = new Set(options.confirm ?? []);
  const required = new Set(options.required ?? []);

  let settle: (outcome: DialogOutcome) => void = () => {};
  let fail: (error: unknown) => void = () => {};
  const outcome = new Promise<DialogOutcome>((resolve, reject) => {
    settle = resolve;
    fail = reject;
  });

  let done = false;
  const values = (): FieldValue[] => fields.map((f, i) => ({ label: f.label, value: dialog.getFieldValue(i) }));
  const finish = (result: DialogOutcome): void => {
    if (done) return;
    done = true;
    dialog.hide();
    settle(result);
  };
  const cancel = (): void => finish({ kind: 'cancel', fields: values() });

  const dialog = createDialog(host, {
    id: options.id ?? 'main',
    title: options.title,
    text: options.text,
    fields,
    buttons: options.buttons,
    align: options.align,
    width: options.width,
    height: options.height,
    background: options.background,
    keys: options.keys,
    onEsc: cancel,
    onFieldKey: (_label, index, _value, key) => {
      // Enter moves on to the next field (or the buttons), like Tab.
      if (key !== 'ENTER' && key !== 'KP_ENTER') return key;
      host.setFocus(nextOf(dialog.focusRing, { kind: 'field', index }));
      return null;
    },
    onButtonPressed: (label, index) => {
      if (confirm.has(label) && dialog.getButtonLabel(index) !== CONFIRM_LABEL) {
        dialog.setButtonLabel(index, CONFIRM_LABEL, { revertOnBlur: true });
        return;
      }

      const missing = fields.findIndex((f, i) => required.has(f.label) && !dialog.getFieldValue(i).trim());
      if (missing !== -1) {
        const label = fields[missing]?.label ?? '';
        dialog.setText(`${options.text}\n\n^r${escapeMarkup(label)} is required.^:`, true);
        host.setFocus({ kind: 'field', index: missing });
        return;
      }

      finish({ kind: 'button', label, index, fields: values() });
    },
  });

  const stopKeys = term.onKey((name) => {
    try {
      if (name === 'CTRL_C' || (host.focusedTarget() === null && isCancelKeyName(name))) {
        cancel();
        return;
      }
      host.handleKey(name);
    } catch (error) {
      fail(error);
    }
  });
  const stopResize = term.onResize(() => host.render());

  term.enter();
  try {
    dialog.show();
    return await outcome;
  } finally {
    stopKeys();
    stopResize();
    term.leave();
    term.clear();
  }
}
