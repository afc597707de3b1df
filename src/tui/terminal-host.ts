import { sameTarget } from '../dialog/focus-ring.js';
import { placeModal } from '../dialog/layout.js';
import type { DialogHost, DialogView, FocusTarget } from '../dialog/types.js';
import { isActivateKeyName } from './key-utils.js';
import { renderDialog } from './render.js';
import type { TermWriter } from './term.js';
import { applyTextInputKey, createTextInput, type TextInputState } from './text-input.js';

interface ModalPage {
  name: string;
  view: DialogView;
  width: number;
  height: number;
  /** False for pages shown without focus: they are drawn but never receive keys. */
  takesFocus: boolean;
  focused: FocusTarget | null;
  inputs: Map<number, TextInputState>;
}

export interface TerminalHost extends DialogHost {
  /** Routes a terminal-kit key name to the focused element of the topmost dialog. */
  handleKey(name: string): void;
  render(): void;
  readonly pageNames: readonly string[];
  focusedTarget(): FocusTarget | null;
}

/**
 * A modal page stack drawn with terminal-kit markup. The last shown page is drawn on top; keys go
 * to the topmost page that was shown with focus.
 */
export function createTerminalHost(term: TermWriter, options: { colorsDisabled: boolean }): TerminalHost {
  const pages: ModalPage[] = [];

  function focusPage(): ModalPage | null {
    for (let i = pages.length - 1; i >= 0; i--) {
      const page = pages[i];
      if (page?.takesFocus) return page;
    }
    return null;
  }

  function inputState(page: ModalPage, index: number): TextInputState {
    const value = page.view.getFieldValue(index);
    const state = page.inputs.get(index);
    // The value may have been replaced through the controller since the last edit.
    if (state && state.value === value) return state;
    const fresh = createTextInput(value);
    page.inputs.set(index, fresh);
    return fresh;
  }

  function render(): void {
    term.clear();
    let cursor: { x: number; y: number } | null = null;

    const active = focusPage();
    for (const page of pages) {
      const frame = placeModal(term.width, term.height, page.width, page.height);
      const pageCursor = renderDialog(term, page.view, frame, {
        colorsDisabled: options.colorsDisabled,
        focused: page === active ? page.focused : null,
        fieldCursor: (index) => inputState(page, index).cursor,
      });
      if (page === active) cursor = pageCursor;
    }

    term.styleReset();
    if (cursor) {
      term.moveTo(cursor.x, cursor.y);
      term.setCursorVisible(true);
    } else {
      term.setCursorVisible(false);
    }
  }

  function applyDefault(page: ModalPage, target: FocusTarget, key: string): void {
    if (target.kind === 'button') {
      if (isActivateKeyName(key)) page.view.dispatch({ kind: 'press', target });
      return;
    }

    const result = applyTextInputKey(inputState(page, target.index), key);
    if (!result) return;
    page.inputs.set(target.index, result.state);
    if (result.didChangeValue) page.view.setFieldValue(target.index, result.state.value);
  }

  return {
    get pageNames(): readonly string[] {
      return pages.map((p) => p.name);
    },

    screenWidth(): number {
      return term.width;
    },

    showModal(name, view, width, height, focus): void {
      const existing = pages.findIndex((p) => p.name === name);
      if (existing !== -1) pages.splice(existing, 1);

      // The page that had focus keeps its target, so it can get it back when this one is hidden.
      const covered = focus ? focusPage() : null;
      if (covered?.focused) covered.view.dispatch({ kind: 'blur', target: covered.focused });

      pages.push({ name, view, width, height, takesFocus: focus, focused: null, inputs: new Map() });
      render();
    },

    hideModal(name, restoreFocus): void {
      const index = pages.findIndex((p) => p.name === name);
      if (index === -1) return;
      const hadFocus = pages[index] === focusPage();
      pages.splice(index, 1);

      // Without restoreFocus the page underneath stays unfocused until someone calls setFocus.
      const next = focusPage();
      if (hadFocus && !restoreFocus && next) next.focused = null;
      render();
    },

    resizeModal(name, width, height): void {
      const page = pages.find((p) => p.name === name);
      if (!page) return;
      page.width = width;
      page.height = height;
      render();
    },

    setFocus(target): void {
      const page = focusPage();
      if (!page) return;

      const previous = page.focused;
      page.focused = target;
      if (previous && !sameTarget(previous, target)) {
        page.view.dispatch({ kind: 'blur', target: previous });
      }
      render();
    },

    requestDraw(): void {
      render();
    },

    handleKey(name: string): void {
      const page = focusPage();
      const target = page?.focused;
      if (!page || !target) return;

      const decision = page.view.dispatch({ kind: 'key', target, key: name });
      // A callback may have hidden the dialog or moved focus.
      if (!decision.consumed && focusPage() === page && page.focused && sameTarget(page.focused, target)) {
        applyDefault(page, target, decision.key);
      }
      render();
    },

    render,

    focusedTarget(): FocusTarget | null {
      return focusPage()?.focused ?? null;
    },
  };
}
