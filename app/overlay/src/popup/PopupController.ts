import type { popupSurface } from "../contracts/PopupSurface.js";
import type { HotkeyBridge } from "../hotkey/HotkeyBridge.js";
import type { hotkeyChord } from "../hotkey/HotkeyChord.js";
import type { overlayLogger } from "../logging/OverlayLogger.js";
import type { VocabularyStore } from "../vocabulary/VocabularyStore.js";
import { convertCursorPosition } from "./ConvertCursorPosition.js";
import { lookupTranslation } from "./LookupTranslation.js";
import {
  inputCleared,
  lookupCompleted,
  popupHidden,
  popupShown,
  selectIsVisible,
  type popupState
} from "./popupSlice.js";
import { createPopupStore, type popupStore } from "./popupStore.js";

export type popupControllerOptions = {
  vocabulary: VocabularyStore;
  hotkeys: HotkeyBridge;
  surface: popupSurface;
  logger: overlayLogger;
  hotkeyId: number;
  hotkeyChord: hotkeyChord;
  resultPrefix: string;
};

/**
 * Drives the popup: toggles it from the global hotkey, hides it on focus loss
 * or Escape and keeps the result text in step with the input.
 */
export class PopupController {
  readonly store: popupStore;
  private readonly options: popupControllerOptions;
  private isHotkeyRegistered = false;
  private isShutDown = false;

  constructor(options: popupControllerOptions) {
    this.options = options;
    this.store = createPopupStore();
  }

  getState(): popupState {
    return this.store.getState();
  }

  get isVisible(): boolean {
    return selectIsVisible(this.getState());
  }

  /**
   * Registers the toggle hotkey. Returns false when the chord could not be
   * claimed; the popup still works when shown by other means.
   */
  start(): boolean {
    if (this.isShutDown || this.isHotkeyRegistered) {
      return this.isHotkeyRegistered;
    }

    const { hotkeys, hotkeyChord, hotkeyId } = this.options;
    this.isHotkeyRegistered = hotkeys.registerGlobal(hotkeyChord, hotkeyId, () => this.toggle());
    if (!this.isHotkeyRegistered) {
      this.options.logger.warn("Vocabulary popup has no global hotkey.");
    }
    return this.isHotkeyRegistered;
  }

  toggle(): void {
    if (this.isVisible) {
      this.hide();
    } else {
      this.show();
    }
  }

  show(): void {
    if (this.isShutDown) {
      return;
    }

    const { surface } = this.options;
    const cursor = surface.getCursorPosition();
    const position = cursor ? convertCursorPosition(cursor, surface.getScaleFactorAt(cursor)) : null;

    this.store.dispatch(popupShown(position));
    if (position) {
      surface.moveTo(position);
    }
    surface.show();
    surface.activate();
    surface.focusInput();
  }

  hide(): void {
    if (!this.isVisible) {
      return;
    }
    // State first: the host may report focus loss while the window hides.
    this.store.dispatch(popupHidden());
    this.options.surface.hide();
  }

  handleDeactivated(): void {
    this.hide();
  }

  /**
   * Returns true when the key was consumed by the popup.
   */
  handleKey(key: string): boolean {
    if (!this.isVisible) {
      return false;
    }

    if (key === "Escape") {
      this.hide();
      return true;
    }

    if (key === "Enter") {
      this.store.dispatch(inputCleared());
      return true;
    }

    return false;
  }

  handleTextChanged(text: string): void {
    if (!this.isVisible) {
      return;
    }

    const { vocabulary, resultPrefix } = this.options;
    this.store.dispatch(
      lookupCompleted({
        inputText: text,
        resultText: lookupTranslation(vocabulary, text, resultPrefix)
      })
    );
  }

  shutdown(): void {
    if (this.isShutDown) {
      return;
    }

    this.hide();
    if (this.isHotkeyRegistered) {
      this.options.hotkeys.unregisterGlobal(this.options.hotkeyId);
      this.isHotkeyRegistered = false;
    }
    this.isShutDown = true;
  }
}
