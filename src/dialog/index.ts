export { createDialog, DialogController, DEFAULT_FOCUS_KEYS } from './controller.js';
export { ButtonIndexOutOfRangeError, DialogContractError } from './errors.js';
export { buildFocusRing, initialFocus, nextOf, prevOf, sameTarget } from './focus-ring.js';
export { buildLayout, buttonCellWidth, layoutButtonRow, placeModal, contentRect } from './layout.js';
export type { ButtonCell, LayoutRow, Rect } from './layout.js';
export { escapeMarkup, stripMarkup, wrapMarkupLine } from './markup.js';
export { IDLE, armRevert, resolveBlur } from './revert-state.js';
export type { LabelRestore, RevertState } from './revert-state.js';
export {
  BASE_EXTRA_HEIGHT,
  EXTRA_WIDTH,
  dialogOptimalSize,
  fieldBlockHeight,
  growToFit,
  optimalSize,
} from './size.js';
export type { DialogSize } from './size.js';
export { estimatedLineCount, maxLineLength } from './text-metrics.js';
export { BACKGROUND_COLORS } from './types.js';
export type {
  Align,
  BackgroundColor,
  ButtonPressHandler,
  Decision,
  DialogEvent,
  DialogHost,
  DialogSpec,
  DialogView,
  FieldKeyHandler,
  FieldSpec,
  FocusKeyBindings,
  FocusTarget,
  SetButtonLabelOptions,
} from './types.js';
