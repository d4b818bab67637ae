export type windowHandle = number | bigint;

export type windowMessage = {
  message: number;
  wParam: number;
  lParam: number;
};

/**
 * Returns true when the message was handled and should not reach other hooks.
 */
export type windowMessageHook = (message: windowMessage) => boolean;

export type hostWindow = {
  handle: windowHandle;
  addHook: (hook: windowMessageHook) => void;
  removeHook: (hook: windowMessageHook) => void;
};

export type nativeHotkeyApi = {
  registerHotKey: (
    handle: windowHandle,
    id: number,
    modifiers: number,
    virtualKey: number
  ) => boolean;
  unregisterHotKey: (handle: windowHandle, id: number) => boolean;
};
