import type { LayoutRow } from './layout.js';

export type Align = 'left' | 'center' | 'right';

export const BACKGROUND_COLORS = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

export type BackgroundColor = (typeof BACKGROUND_COLORS)[number];

export interface FieldSpec {
  label: string;
  isPassword?: boolean;
}

/**
 * A focusable element, identified by its kind and position rather than by reference.
 */
export type FocusTarget = { kind: 'field'; index: number } | { kind: 'button'; index: number };

export interface FocusKeyBindings {
  next: readonly string[];
  prev: readonly string[];
  escape: readonly string[];
}

export type DialogEvent =
  | { kind: 'key'; target: FocusTarget; key: string }
  | { kind: 'blur'; target: FocusTarget }
  | { kind: 'press'; target: FocusTarget };

/**
 * Result of dispatching an event. An unconsumed key carries the key the host should apply its
 * default handling to, which a field callback may have replaced.
 */
export type Decision = { consumed: true } | { consumed: false; key: string };

/**
 * Called for every key on an input field except the focus keys. Return the key (the same one or
 * a different one) to let default handling run, or null to swallow it.
 */
export type FieldKeyHandler = (label: string, index: number, value: string, key: string) => string | null;

export type ButtonPressHandler = (label: string, index: number) => void;

export interface DialogSpec {
  /** Names the modal page, so several message boxes can be stacked. */
  id: string;
  title?: string;
  text: string;
  fields?: FieldSpec[];
  buttons?: string[];
  /** Defaults to 'left'. */
  align?: Align;
  /** 0 or absent means "compute the optimal size". */
  width?: number;
  height?: number;
  background?: BackgroundColor | null;
  noFocus?: boolean;
  keys?: Partial<FocusKeyBindings>;

  onEsc?: () => void;
  /** Required when there are input fields. */
  onFieldKey?: FieldKeyHandler;
  /** Required when there are buttons. */
  onButtonPressed?: ButtonPressHandler;
}

/**
 * What a host needs to draw a dialog and feed it events.
 */
export interface DialogView {
  readonly title: string;
  readonly align: Align;
  readonly background: BackgroundColor | null;
  readonly fields: readonly FieldSpec[];
  readonly layout: readonly LayoutRow[];
  getText(stripFormatting: boolean): string;
  getButtonLabel(index: number): string;
  getFieldValue(index: number): string;
  setFieldValue(index: number, value: string): void;
  dispatch(event: DialogEvent): Decision;
}

/**
 * The runtime that displays dialogs: screen queries, the modal page primitives and focus.
 */
export interface DialogHost {
  screenWidth(): number;
  showModal(name: string, view: DialogView, width: number, height: number, focus: boolean): void;
  hideModal(name: string, restoreFocus: boolean): void;
  resizeModal(name: string, width: number, height: number): void;
  setFocus(target: FocusTarget): void;
  /** Repaint after a state change made outside of an event handler. */
  requestDraw(): void;
}

export interface SetButtonLabelOptions {
  /** Restore the previous label once the button loses focus. */
  revertOnBlur?: boolean;
}
