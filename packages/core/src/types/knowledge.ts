// Knowledge base domain types

// One indexed chunk; sequenceId equals its id in the vector index
export interface ChunkMetadata {
  sequenceId: number;
  documentId: string;
  title: string;
  chunkText: string;
  category: string;
  tags: string[];
  chunkIndex: number;
  active: boolean;
  createdAt: string;
}

export interface DocumentInput {
  title: string;
  content: string;
  category?: string;
  tags?: string[];
  // Generated when absent
  documentId?: string;
}

export interface AddedDocument {
  documentId: string;
  chunkCount: number;
  sequenceIds: number[];
}

export interface RelevantChunk {
  sequenceId: number;
  title: string;
  chunkText: string;
  category: string;
  distance: number;
}

export interface KnowledgeBaseStats {
  totalChunks: number;
  activeChunks: number;
  totalIndexed: number;
  // Active chunks per category
  categories: Record<string, number>;
  embeddingDimension: number;
}

export interface DirectoryLoadSummary {
  added: number;
  failed: number;
}
