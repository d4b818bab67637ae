import type {
  hostWindow,
  nativeHotkeyApi,
  windowMessage,
  windowMessageHook
} from "../contracts/HostWindow.js";
import type { overlayLogger } from "../logging/OverlayLogger.js";
import { formatChord, MOD_NOREPEAT, WM_HOTKEY, type hotkeyChord } from "./HotkeyChord.js";

export type hotkeyRegistration = {
  id: number;
  chord: hotkeyChord;
  callback: () => void;
};

/**
 * Owns the system-wide hotkeys registered against one host window and routes
 * their `WM_HOTKEY` messages back to the registering callback.
 */
export class HotkeyBridge {
  private readonly registrations = new Map<number, hotkeyRegistration>();
  private isHookAttached = false;

  constructor(
    private readonly window: hostWindow,
    private readonly api: nativeHotkeyApi,
    private readonly logger: overlayLogger
  ) {}

  registerGlobal(chord: hotkeyChord, id: number, callback: () => void): boolean {
    const label = formatChord(chord);
    if (this.registrations.has(id)) {
      this.logger.warn(`Hotkey id ${id} is already registered, ignoring ${label}.`);
      return false;
    }

    let registered: boolean;
    try {
      registered = this.api.registerHotKey(
        this.window.handle,
        id,
        chord.modifiers | MOD_NOREPEAT,
        chord.virtualKey
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Registering hotkey ${label} failed: ${message}`);
      return false;
    }

    if (!registered) {
      this.logger.warn(`Hotkey ${label} is already claimed, continuing without it.`);
      return false;
    }

    this.registrations.set(id, { id, chord, callback });
    this.attachHook();
    this.logger.info(`Registered hotkey ${label} (id ${id}).`);
    return true;
  }

  unregisterGlobal(id: number): boolean {
    const registration = this.registrations.get(id);
    if (!registration) {
      return false;
    }

    this.registrations.delete(id);
    if (this.registrations.size === 0) {
      this.detachHook();
    }

    try {
      const released = this.api.unregisterHotKey(this.window.handle, id);
      if (!released) {
        this.logger.warn(`Hotkey id ${id} was not released by the system.`);
      }
      return released;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Unregistering hotkey id ${id} failed: ${message}`);
      return false;
    }
  }

  isRegistered(id: number): boolean {
    return this.registrations.has(id);
  }

  dispose(): void {
    for (const id of Array.from(this.registrations.keys())) {
      this.unregisterGlobal(id);
    }
  }

  private readonly handleMessage: windowMessageHook = (message: windowMessage): boolean => {
    if (message.message !== WM_HOTKEY) {
      return false;
    }

    // The window may carry hotkeys registered by other code.
    const registration = this.registrations.get(message.wParam);
    if (!registration) {
      return false;
    }

    registration.callback();
    return true;
  };

  private attachHook(): void {
    if (this.isHookAttached) {
      return;
    }
    this.window.addHook(this.handleMessage);
    this.isHookAttached = true;
  }

  private detachHook(): void {
    if (!this.isHookAttached) {
      return;
    }
    this.window.removeHook(this.handleMessage);
    this.isHookAttached = false;
  }
}
