import type { popupPosition, screenPoint } from "../contracts/PopupSurface.js";

/**
 * Maps a device-pixel cursor position into popup units using the scale of
 * the display the cursor is on. An unknown or invalid scale maps 1:1.
 */
export const convertCursorPosition = (
  cursor: screenPoint,
  scaleFactor: number | null
): popupPosition => {
  const scale = scaleFactor !== null && Number.isFinite(scaleFactor) && scaleFactor > 0
    ? scaleFactor
    : 1;

  return {
    left: cursor.x / scale,
    top: cursor.y / scale
  };
};
