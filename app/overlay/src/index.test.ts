import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MOD_CONTROL, MOD_SHIFT } from "./hotkey/HotkeyChord.js";
import { createVocabularyOverlay } from "./index.js";
import { chordKey, createTestLogger, FakeOverlayHost } from "./testing/FakeOverlayHost.js";

describe("createVocabularyOverlay", () => {
  let directory: string;
  let host: FakeOverlayHost;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "vocab-overlay-"));
    host = new FakeOverlayHost();
    host.executablePath = path.join(directory, "overlay");
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it("loads the vocabulary beside the executable and answers the hotkey", () => {
    fs.writeFileSync(path.join(directory, "vocabulary.txt"), "katze = cat\n", "utf8");

    const { controller, hasHotkey } = createVocabularyOverlay(host, {}, createTestLogger());
    expect(hasHotkey).toBe(true);

    host.pressHotkey(9000);
    controller.handleTextChanged("cat");

    expect(controller.getState()).toMatchObject({ visibility: "visible", resultText: "→ katze" });
    controller.shutdown();
    expect(host.registeredHotkeys.size).toBe(0);
  });

  it("falls back to the built-in vocabulary", () => {
    const { controller } = createVocabularyOverlay(host, {}, createTestLogger());

    controller.show();
    controller.handleTextChanged("apfel");

    expect(controller.getState().resultText).toBe("→ Apple");
  });

  it("applies the configured hotkey id and result prefix", () => {
    const { controller } = createVocabularyOverlay(
      host,
      { OVERLAY_HOTKEY_ID: "1234", OVERLAY_RESULT_PREFIX: "= " },
      createTestLogger()
    );

    expect(host.registeredHotkeys.has(1234)).toBe(true);
    host.pressHotkey(1234);
    controller.handleTextChanged("apple");

    expect(controller.getState().resultText).toBe("= Apfel");
  });

  it("reports a missing hotkey without failing", () => {
    host.claimedChords.add(chordKey(MOD_CONTROL | MOD_SHIFT, 0x56));

    const { controller, hasHotkey } = createVocabularyOverlay(host, {}, createTestLogger());

    expect(hasHotkey).toBe(false);
    controller.toggle();
    expect(controller.isVisible).toBe(true);
  });
});
