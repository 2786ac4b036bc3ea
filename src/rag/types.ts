export interface Passage {
  readonly id: string;
  readonly text: string;
  readonly sourceDocument: string;
  readonly sequenceIndex: number;
}

export type EmbeddingVector = number[];

export interface ExtractedDocument {
  source: string;
  filePath: string;
  pages: PageContent[];
}

export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface RetrievedPassage {
  passage: Passage;
  score: number;
}

/** Descending by score, at most k entries. */
export type RetrievalResult = RetrievedPassage[];

export interface DocumentRecord {
  source: string;
  passageCount: number;
  ingestedAt: string;
}

/** The metadata half of a persisted index generation. */
export interface IndexMetadata {
  version: 1;
  embeddingModel: string;
  dimension: number;
  passages: Passage[];
  documents: DocumentRecord[];
}

export type IngestMode = "create" | "append";

export interface ConversationTurn {
  userId: string;
  messageText: string;
  replyText: string;
  timestamp: string;
}
