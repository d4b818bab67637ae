import "dotenv/config";
import type { overlayHost } from "./contracts/OverlayHost.js";
import { readOverlayConfig } from "./config/ReadOverlayConfig.js";
import { HotkeyBridge } from "./hotkey/HotkeyBridge.js";
import { parseAccelerator } from "./hotkey/HotkeyChord.js";
import { createOverlayLogger, type overlayLogger } from "./logging/OverlayLogger.js";
import { PopupController } from "./popup/PopupController.js";
import { loadVocabulary } from "./vocabulary/LoadVocabulary.js";
import { resolveVocabularyPath } from "./vocabulary/VocabularyPath.js";

export type { overlayHost } from "./contracts/OverlayHost.js";
export type { hostWindow, nativeHotkeyApi, windowMessage, windowHandle } from "./contracts/HostWindow.js";
export type { popupPosition, popupSurface, screenPoint } from "./contracts/PopupSurface.js";
export type { overlayConfig } from "./config/ReadOverlayConfig.js";
export type { overlayLogger, overlayLogLevel } from "./logging/OverlayLogger.js";
export type { popupState, popupVisibility } from "./popup/popupSlice.js";
export { readOverlayConfig } from "./config/ReadOverlayConfig.js";
export { HotkeyBridge } from "./hotkey/HotkeyBridge.js";
export { formatChord, parseAccelerator } from "./hotkey/HotkeyChord.js";
export { createOverlayLogger } from "./logging/OverlayLogger.js";
export { PopupController } from "./popup/PopupController.js";
export { lookupTranslation } from "./popup/LookupTranslation.js";
export { findFuzzyMatch } from "./fuzzy/FindFuzzyMatch.js";
export { normalizeForFuzzy } from "./fuzzy/NormalizeForFuzzy.js";
export { editDistance } from "./fuzzy/EditDistance.js";
export { isSimilar } from "./fuzzy/IsSimilar.js";
export { loadVocabulary } from "./vocabulary/LoadVocabulary.js";
export { VocabularyStore } from "./vocabulary/VocabularyStore.js";

export type vocabularyOverlay = {
  controller: PopupController;
  hasHotkey: boolean;
};

/**
 * Loads the vocabulary next to the executable, registers the toggle hotkey on
 * the host window and returns the running controller. Call
 * `controller.shutdown()` when the host window closes.
 */
export const createVocabularyOverlay = (
  host: overlayHost,
  env: NodeJS.ProcessEnv = process.env,
  logger?: overlayLogger
): vocabularyOverlay => {
  const config = readOverlayConfig(env);
  const overlayLogger = logger ?? createOverlayLogger(config.logLevel);

  const { store } = loadVocabulary(resolveVocabularyPath(host.executablePath), overlayLogger);
  const controller = new PopupController({
    vocabulary: store,
    hotkeys: new HotkeyBridge(host.window, host.hotkeyApi, overlayLogger),
    surface: host.surface,
    logger: overlayLogger,
    hotkeyId: config.hotkeyId,
    hotkeyChord: parseAccelerator(config.hotkeyAccelerator),
    resultPrefix: config.resultPrefix
  });

  const hasHotkey = controller.start();
  return { controller, hasHotkey };
};
