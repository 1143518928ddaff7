/**
 * shell extractor: builds the extraction prompt, runs it through the
 * configured LLM command, parses the answer into a draft.
 */

import { ResultAsync } from "neverthrow";
import { buildExtractionPrompt, parseExtractionOutput } from "../prompts/extract.js";
import { executeShellLLM, type ShellAdapterOptions } from "./shell.js";
import type { ExtractionError, Extractor } from "./index.js";

export function createShellExtractor(options: ShellAdapterOptions): Extractor {
  return {
    extract(message, context) {
      const prompt = buildExtractionPrompt(message, context.records, context.today);

      return ResultAsync.fromPromise(
        executeShellLLM(prompt, options),
        (e: unknown): ExtractionError => ({
          _tag: "extract.run",
          message: e instanceof Error ? e.message : String(e),
        }),
      ).andThen((output) => parseExtractionOutput(output, message));
    },
  };
}
