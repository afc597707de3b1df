import { ButtonIndexOutOfRangeError, DialogContractError } from './errors.js';
import { buildFocusRing, formatTarget, initialFocus, nextOf, prevOf } from './focus-ring.js';
import { buildLayout, type LayoutRow } from './layout.js';
import { stripMarkup } from './markup.js';
import { IDLE, armRevert, resolveBlur, type RevertState } from './revert-state.js';
import { dialogOptimalSize, growToFit, type DialogSize } from './size.js';
import type {
  Align,
  BackgroundColor,
  Decision,
  DialogEvent,
  DialogHost,
  DialogSpec,
  DialogView,
  FieldSpec,
  FocusKeyBindings,
  FocusTarget,
  SetButtonLabelOptions,
} from './types.js';

export const DEFAULT_FOCUS_KEYS: FocusKeyBindings = {
  next: ['TAB'],
  prev: ['SHIFT_TAB'],
  escape: ['ESCAPE'],
};

const PAGE_PREFIX = 'message:';

const CONSUMED: Decision = { consumed: true };

export class DialogController implements DialogView {
  readonly title: string;
  readonly align: Align;
  readonly background: BackgroundColor | null;
  readonly fields: readonly FieldSpec[];
  readonly layout: readonly LayoutRow[];
  readonly focusRing: readonly FocusTarget[];

  // Labels as given at construction; button presses report these.
  private readonly buttons: readonly string[];
  private readonly labels: string[];
  private readonly values: string[];
  private readonly keys: FocusKeyBindings;

  private text: string;
  private size: DialogSize;
  private revert: RevertState = IDLE;
  private shown = false;

  constructor(
    private readonly host: DialogHost,
    private readonly spec: DialogSpec
  ) {
    this.fields = (spec.fields ?? []).map((f) => ({ label: f.label, isPassword: Boolean(f.isPassword) }));
    this.buttons = [...(spec.buttons ?? [])];

    if (this.fields.length > 0 && !spec.onFieldKey) {
      throw new DialogContractError(`Dialog '${spec.id}' has input fields but no onFieldKey handler`);
    }
    if (this.buttons.length > 0 && !spec.onButtonPressed) {
      throw new DialogContractError(`Dialog '${spec.id}' has buttons but no onButtonPressed handler`);
    }

    this.title = spec.title ?? '';
    this.align = spec.align ?? 'left';
    this.background = spec.background ?? null;
    this.keys = {
      next: spec.keys?.next ?? DEFAULT_FOCUS_KEYS.next,
      prev: spec.keys?.prev ?? DEFAULT_FOCUS_KEYS.prev,
      escape: spec.keys?.escape ?? DEFAULT_FOCUS_KEYS.escape,
    };
    this.labels = [...this.buttons];
    this.values = this.fields.map(() => '');
    this.layout = buildLayout(this.fields, this.buttons);
    this.focusRing = buildFocusRing(this.fields.length, this.buttons.length);
    this.text = (spec.text ?? '').trim();

    const optimal = this.optimalSize(spec.text ?? '');
    this.size = {
      width: spec.width && spec.width > 0 ? spec.width : optimal.width,
      height: spec.height && spec.height > 0 ? spec.height : optimal.height,
    };
  }

  get pageName(): string {
    return PAGE_PREFIX + this.spec.id;
  }

  get width(): number {
    return this.size.width;
  }

  get height(): number {
    return this.size.height;
  }

  get isShown(): boolean {
    return this.shown;
  }

  show(): void {
    if (this.shown) {
      throw new DialogContractError(`Dialog '${this.spec.id}' is already shown`);
    }

    const focus = !this.spec.noFocus;
    this.host.showModal(this.pageName, this, this.size.width, this.size.height, focus);
    this.shown = true;

    if (focus) {
      const first = initialFocus(this.focusRing);
      if (first) this.host.setFocus(first);
    }
  }

  hide(): void {
    if (!this.shown) return;
    this.host.hideModal(this.pageName, !this.spec.noFocus);
    this.shown = false;
    this.revert = IDLE;
  }

  /**
   * Replaces the text. With `resizeIfNeeded`, grows the dialog when the new text doesn't fit;
   * it never shrinks.
   */
  setText(text: string, resizeIfNeeded: boolean): void {
    this.text = (text ?? '').trim();

    let grew = false;
    if (resizeIfNeeded) {
      const next = growToFit(this.size, this.optimalSize(text ?? ''));
      this.size = next.size;
      grew = next.grew;
    }

    if (!this.shown) return;
    if (grew) {
      this.host.resizeModal(this.pageName, this.size.width, this.size.height);
    } else {
      this.host.requestDraw();
    }
  }

  getText(stripFormatting: boolean): string {
    return stripFormatting ? stripMarkup(this.text) : this.text;
  }

  getButtonLabel(index: number): string {
    return this.labels[this.buttonIndex(index)]!;
  }

  /**
   * Changes a button label. With `revertOnBlur`, the current label comes back once a button
   * loses focus (e.g. "Copy" -> "Copied").
   */
  setButtonLabel(index: number, label: string, opts: SetButtonLabelOptions = {}): void {
    const i = this.buttonIndex(index);
    this.revert = armRevert(this.revert, i, this.labels[i]!, Boolean(opts.revertOnBlur));
    this.labels[i] = label;
    if (this.shown) this.host.requestDraw();
  }

  getFieldValue(index: number): string {
    return this.values[this.fieldIndex(index)]!;
  }

  setFieldValue(index: number, value: string): void {
    this.values[this.fieldIndex(index)] = value;
  }

  dispatch(event: DialogEvent): Decision {
    this.checkTarget(event.target);

    switch (event.kind) {
      case 'key':
        return this.handleKey(event.target, event.key);
      case 'blur':
        this.handleBlur(event.target);
        return CONSUMED;
      case 'press':
        this.handlePress(event.target);
        return CONSUMED;
    }
  }

  private handleKey(target: FocusTarget, key: string): Decision {
    if (this.keys.escape.includes(key)) {
      this.spec.onEsc?.();
    }

    if (this.keys.next.includes(key)) {
      this.host.setFocus(nextOf(this.focusRing, target));
      return CONSUMED;
    }
    if (this.keys.prev.includes(key)) {
      this.host.setFocus(prevOf(this.focusRing, target));
      return CONSUMED;
    }

    if (target.kind === 'field' && this.spec.onFieldKey) {
      const field = this.fields[target.index]!;
      const passed = this.spec.onFieldKey(field.label, target.index, this.values[target.index]!, key);
      if (passed === null) return CONSUMED;
      return { consumed: false, key: passed };
    }

    return { consumed: false, key };
  }

  private handleBlur(target: FocusTarget): void {
    if (target.kind !== 'button') return;

    const { state, restore } = resolveBlur(this.revert);
    this.revert = state;
    if (restore) this.labels[restore.buttonIndex] = restore.label;
  }

  private handlePress(target: FocusTarget): void {
    if (target.kind !== 'button') return;
    this.spec.onButtonPressed?.(this.buttons[target.index]!, target.index);
  }

  private optimalSize(text: string): DialogSize {
    return dialogOptimalSize(this.host.screenWidth(), this.fields, text);
  }

  private buttonIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.labels.length) {
      throw new ButtonIndexOutOfRangeError(index, this.labels.length);
    }
    return index;
  }

  private fieldIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new DialogContractError(`Dialog '${this.spec.id}' has no input field #${index}`);
    }
    return index;
  }

  private checkTarget(target: FocusTarget): void {
    const count = target.kind === 'field' ? this.fields.length : this.buttons.length;
    if (!Number.isInteger(target.index) || target.index < 0 || target.index >= count) {
      throw new DialogContractError(`Dialog '${this.spec.id}' has no ${formatTarget(target)}`);
    }
  }
}

export function createDialog(host: DialogHost, spec: DialogSpec): DialogController {
  return new DialogController(host, spec);
}
