/**
 * Interfaces of the external collaborators the engine consumes.
 *
 * @module pipeline/collaborators
 */

import type { InputDocument, InstructionStageId } from "./types";

export type { ReferenceTaxonomy } from "./taxonomy";

export interface ExtractionResult {
  text: string;
  pageQuality: number[];
  pageCount: number;
}

export interface DocumentExtractor {
  extract(document: InputDocument): Promise<ExtractionResult>;
}

export interface InstructionSet {
  stageId: InstructionStageId;
  profile: string;
  /** Opaque to the engine. */
  text: string;
  version: string;
  contentHash: string;
}

export interface InstructionSource {
  load(stageId: InstructionStageId, profile: string): Promise<InstructionSet>;
}
