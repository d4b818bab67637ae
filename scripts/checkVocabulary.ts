import "dotenv/config";
import * as path from "node:path";
import { readOverlayConfig } from "../app/overlay/src/config/ReadOverlayConfig.js";
import { createOverlayLogger } from "../app/overlay/src/logging/OverlayLogger.js";
import { lookupTranslation } from "../app/overlay/src/popup/LookupTranslation.js";
import { loadVocabulary } from "../app/overlay/src/vocabulary/LoadVocabulary.js";
import { resolveVocabularyPath } from "../app/overlay/src/vocabulary/VocabularyPath.js";
import { parseCheckVocabularyArgs } from "./CheckVocabularyArgs.js";

const main = (): void => {
  const args = parseCheckVocabularyArgs(process.argv.slice(2));
  const config = readOverlayConfig();
  const logger = createOverlayLogger(config.logLevel);
  const resourcePath = args.file ? path.resolve(args.file) : resolveVocabularyPath();

  const { store, source, skippedLines } = loadVocabulary(resourcePath, logger);
  console.log(`Source: ${source} (${resourcePath})`);
  console.log(`Keys: ${store.size}`);
  if (skippedLines.length > 0) {
    console.log(`Skipped lines: ${skippedLines.join(", ")}`);
  }

  if (args.lookup !== null) {
    const result = lookupTranslation(store, args.lookup, config.resultPrefix);
    console.log(result ? `${args.lookup} ${result}` : `${args.lookup}: no match`);
  }

  if (source === "unreadable") {
    process.exitCode = 1;
  }
};

main();
