/**
 * Shared test helpers
 */

import { translateDocument } from "../modules";
import { Logger, Tracker } from "../utils";
import type {
  ConversionContext,
  ConverterConfig,
  DocumentConfig,
  TranslationConfig,
} from "../types";

export const TEST_CONFIG: ConverterConfig = {
  input: { encoding: "utf-8" },
  document: { standalone: false, documentClass: "article", packages: [] },
  translation: {
    unknownDirectives: "comment",
    latchScope: "directive",
    defaultListStyle: "itemize",
  },
  logging: { level: "error", showProgress: false },
};

export function createTestContext(
  translation: Partial<TranslationConfig> = {},
  document: Partial<DocumentConfig> = {},
): ConversionContext {
  return {
    config: {
      ...TEST_CONFIG,
      document: { ...TEST_CONFIG.document, ...document },
      translation: { ...TEST_CONFIG.translation, ...translation },
    },
    tracker: new Tracker(),
    logger: new Logger("error"),
  };
}

/**
 * Translate `source` body-only and return the output with the context used
 */
export function translate(
  source: string,
  translation: Partial<TranslationConfig> = {},
  document: Partial<DocumentConfig> = {},
): { output: string; ctx: ConversionContext } {
  const ctx = createTestContext(translation, document);
  return { output: translateDocument(source, ctx), ctx };
}
