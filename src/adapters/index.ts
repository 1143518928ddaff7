/**
 * commit adapters: I/O boundaries for the commit machine.
 * per INJECT AT THE BOUNDARY: interfaces declared here, implementations wrap
 * real I/O and tests swap in deterministic doubles.
 */

import type { ResultAsync } from "neverthrow";
import type { IsoDate } from "../dates.js";
import type { EventDraft, EventRecord } from "../schema.js";
import type { ExtractionParseError } from "../prompts/extract.js";

export type ExtractionError = { _tag: "extract.run"; message: string } | ExtractionParseError;

export interface ExtractionContext {
  today: IsoDate;
  records: readonly EventRecord[];
}

export interface Extractor {
  extract(message: string, context: ExtractionContext): ResultAsync<EventDraft, ExtractionError>;
}
