export type screenPoint = {
  x: number;
  y: number;
};

export type popupPosition = {
  left: number;
  top: number;
};

/**
 * Window-level operations of the popup host. Cursor coordinates are device
 * pixels; `moveTo` takes coordinates in the popup's own units.
 */
export type popupSurface = {
  getCursorPosition: () => screenPoint | null;
  // Scale factor of the display under `point`, or null when unknown.
  getScaleFactorAt: (point: screenPoint) => number | null;
  moveTo: (position: popupPosition) => void;
  show: () => void;
  activate: () => void;
  focusInput: () => void;
  hide: () => void;
};
