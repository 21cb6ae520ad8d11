import { readFile, readdir, access } from 'node:fs/promises';
import { join, extname, basename } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ok, err, type Result, Mutex, createLogger, toError } from '@mailpilot/utils';
import type { Embedder } from '../ports.js';
import { callWithTimeout } from '../bounded-call.js';
import type {
  AddedDocument,
  ChunkMetadata,
  DirectoryLoadSummary,
  DocumentInput,
  KnowledgeBaseStats,
  RelevantChunk,
} from '../types/knowledge.js';
import { Chunker } from './chunker.js';
import { VectorStore, VectorStoreErrorCode } from './vector-store.js';
import { writeFileAtomic } from './atomic-write.js';

const logger = createLogger({ service: 'knowledge-base' });

export const KnowledgeBaseErrorCode = {
  ...VectorStoreErrorCode,
  EMPTY_DOCUMENT: 'EMPTY_DOCUMENT',
  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  COUNT_MISMATCH: 'COUNT_MISMATCH',
  CORRUPT_METADATA: 'CORRUPT_METADATA',
  PERSIST_FAILED: 'PERSIST_FAILED',
} as const;
export type KnowledgeBaseErrorCode =
  (typeof KnowledgeBaseErrorCode)[keyof typeof KnowledgeBaseErrorCode];

export interface KnowledgeBaseError {
  code: KnowledgeBaseErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export const INDEX_FILE = 'index.bin';
export const METADATA_FILE = 'chunks.json';
const METADATA_VERSION = 1;

const chunkMetadataSchema = z.object({
  sequenceId: z.number().int().nonnegative(),
  documentId: z.string(),
  title: z.string(),
  chunkText: z.string(),
  category: z.string(),
  tags: z.array(z.string()),
  chunkIndex: z.number().int().nonnegative(),
  active: z.boolean(),
  createdAt: z.string(),
});

const metadataFileSchema = z.object({
  version: z.literal(METADATA_VERSION),
  dimension: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  chunks: z.array(chunkMetadataSchema),
});

// Seed files under a knowledge directory
const seedDocumentSchema = z.object({
  title: z.string().min(1),
  content: z.string(),
  category: z.string().optional(),
  tags: z.array(z.string()).optional(),
});
const seedFileSchema = z.union([seedDocumentSchema, z.array(seedDocumentSchema)]);

export interface KnowledgeBaseOptions {
  rootPath: string;
  dimension: number;
  embedder: Embedder;
  chunker?: Chunker;
  // Deadline for each embedding call
  timeoutMs?: number;
}

const interactionDocumentId = (emailId: string): string => `email-context:${emailId}`;

const fileExists = async (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false
  );

/**
 * Chunked documents indexed by embedding. The vector index and the chunk
 * metadata are kept as a pair under `rootPath`; chunk `sequenceId` is the
 * vector's id in the index.
 *
 * Deactivation only hides chunks from search. Their vectors stay in the
 * index and keep taking space until the store is rebuilt.
 */
export class KnowledgeBase {
  readonly dimension: number;
  private store: VectorStore;
  private chunks: ChunkMetadata[] = [];
  private readonly embedder: Embedder;
  private readonly chunker: Chunker;
  private readonly timeoutMs: number;
  private readonly rootPath: string;
  private readonly io = new Mutex();
  // Serializes mutations from the in-memory change through its save
  private readonly writer = new Mutex();

  constructor(options: KnowledgeBaseOptions) {
    this.rootPath = options.rootPath;
    this.dimension = options.dimension;
    this.embedder = options.embedder;
    this.chunker = options.chunker ?? new Chunker();
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.store = new VectorStore(options.dimension);
  }

  private get indexPath(): string {
    return join(this.rootPath, INDEX_FILE);
  }

  private get metadataPath(): string {
    return join(this.rootPath, METADATA_FILE);
  }

  /**
   * Load the persisted pair. With neither file present the base starts
   * empty; with only one, or with counts that disagree, nothing is loaded.
   * The index is written before the metadata, so an index holding more
   * vectors than the metadata lists is a save that never completed: the
   * unlisted tail is dropped.
   */
  async open(): Promise<Result<void, KnowledgeBaseError>> {
    return this.io.runExclusive(async () => {
      const [hasIndex, hasMetadata] = await Promise.all([
        fileExists(this.indexPath),
        fileExists(this.metadataPath),
      ]);

      if (!hasIndex && !hasMetadata) {
        logger.info({ rootPath: this.rootPath }, 'No persisted knowledge base, starting empty');
        return ok(undefined);
      }
      if (!hasIndex || !hasMetadata) {
        return err({
          code: KnowledgeBaseErrorCode.COUNT_MISMATCH,
          message: `Found ${hasIndex ? INDEX_FILE : METADATA_FILE} without its pair`,
          details: { rootPath: this.rootPath },
        });
      }

      const metadata = await this.readMetadata();
      if (!metadata.ok) {
        return metadata;
      }

      const store = new VectorStore(this.dimension);
      const loaded = await store.load(this.indexPath);
      if (!loaded.ok) {
        return loaded;
      }

      const { count, chunks } = metadata.value;
      if (chunks.length === count && store.totalCount > count) {
        logger.warn(
          { indexed: store.totalCount, listed: count },
          'Dropping index vectors left by an interrupted save'
        );
        store.truncate(count);
      }
      if (store.totalCount !== count || chunks.length !== count) {
        return err({
          code: KnowledgeBaseErrorCode.COUNT_MISMATCH,
          message: `Index holds ${store.totalCount} vectors, metadata lists ${chunks.length} of ${count}`,
          details: { indexed: store.totalCount, listed: chunks.length, declared: count },
        });
      }
      if (!chunks.every((chunk, position) => chunk.sequenceId === position)) {
        return err({
          code: KnowledgeBaseErrorCode.CORRUPT_METADATA,
          message: 'Chunk sequence ids do not match their index positions',
        });
      }

      this.store = store;
      this.chunks = chunks;
      logger.info({ chunks: count }, 'Knowledge base loaded');
      return ok(undefined);
    });
  }

  /**
   * Chunk, embed and index a document. Every chunk is embedded before
   * anything is inserted, so a failed embedding leaves the base untouched;
   * a failed save undoes the insert.
   */
  async addDocument(input: DocumentInput): Promise<Result<AddedDocument, KnowledgeBaseError>> {
    return this.index(input, false);
  }

  /**
   * Re-index a document under the same id. The new chunks are embedded
   * first; the old ones are hidden only once the new ones are in.
   */
  async replaceDocument(
    documentId: string,
    input: Omit<DocumentInput, 'documentId'>
  ): Promise<Result<AddedDocument, KnowledgeBaseError>> {
    return this.index({ ...input, documentId }, true);
  }

  private async index(
    input: DocumentInput,
    replace: boolean
  ): Promise<Result<AddedDocument, KnowledgeBaseError>> {
    if (input.content.trim().length === 0) {
      return err({
        code: KnowledgeBaseErrorCode.EMPTY_DOCUMENT,
        message: `Document '${input.title}' has no content`,
      });
    }

    const documentId = input.documentId ?? randomUUID();
    const log = logger.child({ documentId });
    const pieces = this.chunker.split(input.content);

    const vectors: number[][] = [];
    for (const [chunkIndex, piece] of pieces.entries()) {
      const vector = await this.embed(piece);
      if (!vector.ok) {
        log.warn({ chunkIndex, code: vector.error.code }, 'Embedding failed, document not added');
        return err({ ...vector.error, details: { ...vector.error.details, documentId, chunkIndex } });
      }
      vectors.push(vector.value);
    }

    return this.writer.runExclusive(async (): Promise<Result<AddedDocument, KnowledgeBaseError>> => {
      // Vectors without metadata are never returned by search, so the new
      // chunks only become visible once the pair is saved
      const firstId = this.store.totalCount;
      const added = this.store.addBatch(vectors);
      if (!added.ok) {
        return added;
      }
      const createdAt = new Date().toISOString();
      const next: ChunkMetadata[] = this.chunks.map((chunk) =>
        replace && chunk.documentId === documentId ? { ...chunk, active: false } : chunk
      );
      next.push(
        ...pieces.map((chunkText, chunkIndex) => ({
          sequenceId: firstId + chunkIndex,
          documentId,
          title: input.title,
          chunkText,
          category: input.category ?? 'general',
          tags: input.tags ?? [],
          chunkIndex,
          active: true,
          createdAt,
        }))
      );

      const persisted = await this.persist(next);
      if (!persisted.ok) {
        this.store.truncate(firstId);
        log.warn({ code: persisted.error.code }, 'Save failed, document not added');
        return err({ ...persisted.error, details: { documentId } });
      }
      this.chunks = next;

      log.info({ title: input.title, chunkCount: pieces.length, replace }, 'Document indexed');
      return ok({ documentId, chunkCount: pieces.length, sequenceIds: added.value });
    });
  }

  /**
   * Active chunks nearest to `query`, nearest first. Provider failures
   * degrade to no results.
   */
  async searchRelevant(query: string, topK = 5): Promise<RelevantChunk[]> {
    if (query.trim().length === 0 || topK <= 0 || this.store.totalCount === 0) {
      return [];
    }

    const vector = await this.embed(query);
    if (!vector.ok) {
      logger.warn({ code: vector.error.code, error: vector.error.message }, 'Search embedding failed');
      return [];
    }

    // Over-fetch by the number of hidden vectors so topK active ones survive the filter
    const inactive = this.store.totalCount - this.countActive();
    const hits = this.store.search(vector.value, topK + inactive);
    if (!hits.ok) {
      logger.warn({ error: hits.error.message }, 'Vector search failed');
      return [];
    }

    const results: RelevantChunk[] = [];
    for (const hit of hits.value) {
      const chunk = this.chunks[hit.id];
      if (!chunk?.active) {
        continue;
      }
      results.push({
        sequenceId: chunk.sequenceId,
        title: chunk.title,
        chunkText: chunk.chunkText,
        category: chunk.category,
        distance: hit.distance,
      });
      if (results.length === topK) {
        break;
      }
    }
    return results;
  }

  formatContext(results: readonly RelevantChunk[]): string {
    if (results.length === 0) {
      return '';
    }
    let context = 'Relevant information:\n\n';
    for (const result of results) {
      context += `From '${result.title}':\n${result.chunkText}\n\n`;
    }
    return context;
  }

  async deactivateDocument(title: string): Promise<Result<number, KnowledgeBaseError>> {
    return this.deactivateWhere((chunk) => chunk.title === title);
  }

  async deactivateDocumentById(documentId: string): Promise<Result<number, KnowledgeBaseError>> {
    return this.deactivateWhere((chunk) => chunk.documentId === documentId);
  }

  /**
   * Index a handled message and its reply so later replies can draw on it.
   * The document id is derived from `emailId`; see `hasInteraction`.
   */
  async addInteraction(
    emailId: string,
    subject: string,
    body: string,
    response: string
  ): Promise<Result<AddedDocument, KnowledgeBaseError>> {
    return this.addDocument({
      documentId: interactionDocumentId(emailId),
      title: `Email Context: ${subject}`,
      content: `Subject: ${subject}\n\nBody: ${body}\n\nResponse: ${response}`,
      category: 'email_context',
      tags: ['email', 'context'],
    });
  }

  // True once the exchange has been indexed, even if later deactivated
  hasInteraction(emailId: string): boolean {
    const documentId = interactionDocumentId(emailId);
    return this.chunks.some((chunk) => chunk.documentId === documentId);
  }

  /**
   * Seed from a directory: each `.txt` file becomes a document titled by its
   * name; each `.json` file holds one `{ title, content }` document or an
   * array of them. Other files are ignored.
   */
  async loadFromDirectory(dir: string): Promise<Result<DirectoryLoadSummary, KnowledgeBaseError>> {
    let entries: string[];
    try {
      entries = (await readdir(dir)).sort();
    } catch (error) {
      return err({
        code: KnowledgeBaseErrorCode.IO_ERROR,
        message: toError(error).message,
        details: { dir },
      });
    }

    const summary: DirectoryLoadSummary = { added: 0, failed: 0 };
    for (const fileName of entries) {
      const extension = extname(fileName).toLowerCase();
      if (extension !== '.txt' && extension !== '.json') {
        continue;
      }

      const documents = await this.readSeedFile(join(dir, fileName), fileName, extension);
      if (!documents.ok) {
        logger.warn({ fileName, error: documents.error.message }, 'Skipping unreadable seed file');
        summary.failed++;
        continue;
      }

      for (const document of documents.value) {
        const added = await this.addDocument(document);
        if (added.ok) {
          summary.added++;
        } else {
          logger.warn({ fileName, title: document.title, code: added.error.code }, 'Seed document failed');
          summary.failed++;
        }
      }
    }

    logger.info({ dir, ...summary }, 'Knowledge directory loaded');
    return ok(summary);
  }

  getStats(): KnowledgeBaseStats {
    const categories: Record<string, number> = {};
    for (const chunk of this.chunks) {
      if (chunk.active) {
        categories[chunk.category] = (categories[chunk.category] ?? 0) + 1;
      }
    }
    return {
      totalChunks: this.chunks.length,
      activeChunks: this.countActive(),
      totalIndexed: this.store.totalCount,
      categories,
      embeddingDimension: this.dimension,
    };
  }

  private countActive(): number {
    return this.chunks.reduce((count, chunk) => count + (chunk.active ? 1 : 0), 0);
  }

  private async deactivateWhere(
    predicate: (chunk: ChunkMetadata) => boolean
  ): Promise<Result<number, KnowledgeBaseError>> {
    return this.writer.runExclusive(async (): Promise<Result<number, KnowledgeBaseError>> => {
      let deactivated = 0;
      for (const chunk of this.chunks) {
        if (chunk.active && predicate(chunk)) {
          chunk.active = false;
          deactivated++;
        }
      }
      if (deactivated === 0) {
        return ok(0);
      }

      // The chunks stay hidden in memory even when the save fails
      const persisted = await this.persist();
      return persisted.ok ? ok(deactivated) : persisted;
    });
  }

  private async embed(text: string): Promise<Result<number[], KnowledgeBaseError>> {
    const result = await callWithTimeout(() => this.embedder.embed(text), this.timeoutMs, 'embedding');
    if (!result.ok) {
      return err({
        code: KnowledgeBaseErrorCode.EMBEDDING_FAILED,
        message: result.error.message,
        details: { timedOut: result.error.timedOut, providerCode: result.error.providerCode },
      });
    }
    if (result.value.length !== this.dimension) {
      return err({
        code: KnowledgeBaseErrorCode.DIMENSION_MISMATCH,
        message: `Embedding has dimension ${result.value.length}, expected ${this.dimension}`,
      });
    }
    return ok(result.value);
  }

  // Both files are snapshotted synchronously. The index goes first; `open`
  // drops index vectors the metadata does not list yet.
  private async persist(
    chunks: readonly ChunkMetadata[] = this.chunks
  ): Promise<Result<void, KnowledgeBaseError>> {
    const index = this.store.encode();
    const metadata = JSON.stringify({
      version: METADATA_VERSION,
      dimension: this.dimension,
      count: chunks.length,
      chunks,
    });

    return this.io.runExclusive(async () => {
      try {
        await writeFileAtomic(this.indexPath, index);
        await writeFileAtomic(this.metadataPath, metadata);
        return ok(undefined);
      } catch (error) {
        logger.error({ error: toError(error).message }, 'Failed to persist knowledge base');
        return err({
          code: KnowledgeBaseErrorCode.PERSIST_FAILED,
          message: toError(error).message,
        });
      }
    });
  }

  private async readMetadata(): Promise<
    Result<z.infer<typeof metadataFileSchema>, KnowledgeBaseError>
  > {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.metadataPath, 'utf-8'));
    } catch (error) {
      return err({
        code: KnowledgeBaseErrorCode.CORRUPT_METADATA,
        message: `Unreadable ${METADATA_FILE}: ${toError(error).message}`,
      });
    }

    const parsed = metadataFileSchema.safeParse(raw);
    if (!parsed.success) {
      return err({
        code: KnowledgeBaseErrorCode.CORRUPT_METADATA,
        message: `Invalid ${METADATA_FILE}`,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    if (parsed.data.dimension !== this.dimension) {
      return err({
        code: KnowledgeBaseErrorCode.DIMENSION_MISMATCH,
        message: `Metadata has dimension ${parsed.data.dimension}, expected ${this.dimension}`,
      });
    }
    return ok(parsed.data);
  }

  private async readSeedFile(
    path: string,
    fileName: string,
    extension: string
  ): Promise<Result<DocumentInput[], Error>> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      return err(toError(error));
    }

    if (extension === '.txt') {
      return ok([
        { title: basename(fileName, extname(fileName)), content: text, category: 'file', tags: [fileName] },
      ]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return err(toError(error));
    }
    const parsed = seedFileSchema.safeParse(raw);
    if (!parsed.success) {
      return err(new Error(`Not a knowledge document: ${parsed.error.issues[0]?.message ?? 'invalid'}`));
    }

    const documents = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    return ok(
      documents.map((document) => ({
        title: document.title,
        content: document.content,
        category: document.category ?? 'json',
        tags: document.tags ?? [],
      }))
    );
  }
}
