import type { hostWindow, nativeHotkeyApi } from "./HostWindow.js";
import type { popupSurface } from "./PopupSurface.js";

export type overlayHost = {
  window: hostWindow;
  hotkeyApi: nativeHotkeyApi;
  surface: popupSurface;
  executablePath?: string;
};
