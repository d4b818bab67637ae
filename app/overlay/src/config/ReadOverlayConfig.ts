import { overlayLogLevels, type overlayLogLevel } from "../logging/OverlayLogger.js";

export type overlayConfig = {
  hotkeyId: number;
  hotkeyAccelerator: string;
  logLevel: overlayLogLevel;
  resultPrefix: string;
};

export const DEFAULT_HOTKEY_ID = 9000;
export const DEFAULT_HOTKEY_ACCELERATOR = "Control+Shift+V";
export const DEFAULT_RESULT_PREFIX = "→ ";

// Ids above 0xBFFF are reserved for shared DLLs.
const MAX_HOTKEY_ID = 0xbfff;

const normalizeEnvValue = (value: string | undefined): string | null => {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
};

const parseHotkeyId = (value: string | undefined): number => {
  const normalized = normalizeEnvValue(value);
  if (!normalized) {
    return DEFAULT_HOTKEY_ID;
  }

  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_HOTKEY_ID) {
    throw new Error(`OVERLAY_HOTKEY_ID must be an integer between 0 and ${MAX_HOTKEY_ID}.`);
  }
  return parsed;
};

const isLogLevel = (value: string): value is overlayLogLevel => {
  return overlayLogLevels.some((level) => level === value);
};

const parseLogLevel = (value: string | undefined): overlayLogLevel => {
  const normalized = normalizeEnvValue(value)?.toLowerCase();
  if (!normalized) {
    return "info";
  }
  if (!isLogLevel(normalized)) {
    throw new Error(`OVERLAY_LOG_LEVEL must be one of: ${overlayLogLevels.join(", ")}.`);
  }
  return normalized;
};

export const readOverlayConfig = (env: NodeJS.ProcessEnv = process.env): overlayConfig => {
  // The prefix keeps its own whitespace; only an unset variable falls back.
  const resultPrefix = env.OVERLAY_RESULT_PREFIX ?? DEFAULT_RESULT_PREFIX;

  return {
    hotkeyId: parseHotkeyId(env.OVERLAY_HOTKEY_ID),
    hotkeyAccelerator: DEFAULT_HOTKEY_ACCELERATOR,
    logLevel: parseLogLevel(env.OVERLAY_LOG_LEVEL),
    resultPrefix
  };
};
