export const MOD_ALT = 0x0001;
export const MOD_CONTROL = 0x0002;
export const MOD_SHIFT = 0x0004;
export const MOD_WIN = 0x0008;
export const MOD_NOREPEAT = 0x4000;

export const WM_HOTKEY = 0x0312;

const VK_SPACE = 0x20;
const VK_F1 = 0x70;

export type hotkeyChord = {
  modifiers: number;
  virtualKey: number;
};

const modifierFlags: Record<string, number | undefined> = {
  control: MOD_CONTROL,
  ctrl: MOD_CONTROL,
  shift: MOD_SHIFT,
  alt: MOD_ALT,
  super: MOD_WIN,
  win: MOD_WIN,
  meta: MOD_WIN
};

const modifierNames: Array<[number, string]> = [
  [MOD_CONTROL, "Control"],
  [MOD_SHIFT, "Shift"],
  [MOD_ALT, "Alt"],
  [MOD_WIN, "Super"]
];

const parseKey = (key: string): number | null => {
  const upper = key.toUpperCase();
  if (/^[A-Z0-9]$/.test(upper)) {
    return upper.charCodeAt(0);
  }
  if (upper === "SPACE") {
    return VK_SPACE;
  }

  const functionKey = /^F([1-9]|1[0-9]|2[0-4])$/.exec(upper);
  if (functionKey) {
    return VK_F1 + Number(functionKey[1]) - 1;
  }
  return null;
};

const formatKey = (virtualKey: number): string => {
  if (virtualKey === VK_SPACE) {
    return "Space";
  }
  if (virtualKey >= VK_F1 && virtualKey < VK_F1 + 24) {
    return `F${virtualKey - VK_F1 + 1}`;
  }
  return String.fromCharCode(virtualKey);
};

/**
 * Parses accelerators such as "Control+Shift+V": any number of modifiers
 * followed by exactly one key.
 */
export const parseAccelerator = (accelerator: string): hotkeyChord => {
  const parts = accelerator
    .split("+")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  const key = parts.pop();
  if (!key) {
    throw new Error(`Accelerator "${accelerator}" has no key.`);
  }

  let modifiers = 0;
  for (const part of parts) {
    const flag = modifierFlags[part.toLowerCase()];
    if (flag === undefined) {
      throw new Error(`Unknown modifier "${part}" in accelerator "${accelerator}".`);
    }
    modifiers |= flag;
  }

  const virtualKey = parseKey(key);
  if (virtualKey === null) {
    throw new Error(`Unsupported key "${key}" in accelerator "${accelerator}".`);
  }

  return { modifiers, virtualKey };
};

export const formatChord = (chord: hotkeyChord): string => {
  const names = modifierNames
    .filter(([flag]) => (chord.modifiers & flag) !== 0)
    .map(([, name]) => name);
  return [...names, formatKey(chord.virtualKey)].join("+");
};
