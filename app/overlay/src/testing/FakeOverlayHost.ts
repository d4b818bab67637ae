import { vi } from "vitest";
import type {
  hostWindow,
  nativeHotkeyApi,
  windowMessage,
  windowMessageHook
} from "../contracts/HostWindow.js";
import type { overlayHost } from "../contracts/OverlayHost.js";
import type { popupSurface, screenPoint } from "../contracts/PopupSurface.js";
import { MOD_NOREPEAT, WM_HOTKEY } from "../hotkey/HotkeyChord.js";
import type { overlayLogger } from "../logging/OverlayLogger.js";

type registeredHotkey = {
  modifiers: number;
  virtualKey: number;
};

export const chordKey = (modifiers: number, virtualKey: number): string => {
  return `${modifiers & ~MOD_NOREPEAT}:${virtualKey}`;
};

/**
 * In-process stand-in for the host window, the system hotkey table and the
 * popup window.
 */
export class FakeOverlayHost implements overlayHost {
  readonly hooks: windowMessageHook[] = [];
  readonly registeredHotkeys = new Map<number, registeredHotkey>();
  // Chords held by other processes.
  readonly claimedChords = new Set<string>();
  readonly surfaceCalls: string[] = [];
  cursor: screenPoint | null = { x: 300, y: 150 };
  scaleFactor: number | null = 1.5;
  executablePath?: string;

  readonly window: hostWindow = {
    handle: 0x1234,
    addHook: (hook) => {
      this.hooks.push(hook);
    },
    removeHook: (hook) => {
      const index = this.hooks.indexOf(hook);
      if (index >= 0) {
        this.hooks.splice(index, 1);
      }
    }
  };

  readonly hotkeyApi: nativeHotkeyApi = {
    registerHotKey: (_handle, id, modifiers, virtualKey) => {
      if (this.registeredHotkeys.has(id) || this.claimedChords.has(chordKey(modifiers, virtualKey))) {
        return false;
      }
      this.registeredHotkeys.set(id, { modifiers, virtualKey });
      return true;
    },
    unregisterHotKey: (_handle, id) => this.registeredHotkeys.delete(id)
  };

  readonly surface: popupSurface = {
    getCursorPosition: () => this.cursor,
    getScaleFactorAt: () => this.scaleFactor,
    moveTo: (position) => {
      this.surfaceCalls.push(`moveTo ${position.left},${position.top}`);
    },
    show: () => {
      this.surfaceCalls.push("show");
    },
    activate: () => {
      this.surfaceCalls.push("activate");
    },
    focusInput: () => {
      this.surfaceCalls.push("focusInput");
    },
    hide: () => {
      this.surfaceCalls.push("hide");
    }
  };

  dispatch(message: windowMessage): boolean {
    for (const hook of [...this.hooks]) {
      if (hook(message)) {
        return true;
      }
    }
    return false;
  }

  pressHotkey(id: number): boolean {
    return this.dispatch({ message: WM_HOTKEY, wParam: id, lParam: 0 });
  }
}

export const createTestLogger = () => {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies overlayLogger;
};
