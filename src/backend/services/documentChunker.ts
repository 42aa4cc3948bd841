/**
 * Document Chunker Service
 *
 * Splits document text into overlapping windows of words for embedding and
 * retrieval.
 *
 * HOW IT WORKS:
 * 1. Split the text on whitespace into word tokens
 * 2. Take chunkSize words starting at position 0
 * 3. Move the window start forward by (chunkSize - chunkOverlap) words
 * 4. Stop once a window reaches the last word
 *
 * The overlap means a sentence that straddles a boundary appears whole in at
 * least one chunk as long as it is shorter than the overlap.
 */

/**
 * Configuration for the chunking process. Sizes are in words.
 */
export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 400,
  chunkOverlap: 80,
};

/**
 * Raised for a configuration that would never advance the window.
 */
export class ChunkingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkingError';
  }
}

/**
 * Checks that a chunking configuration makes progress.
 *
 * @throws ChunkingError when sizes are not integers, size < 1,
 *         overlap < 0 or overlap >= size
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ChunkingError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ChunkingError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ChunkingError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Splits text into overlapping word windows.
 *
 * Pure and deterministic. Empty or whitespace-only input gives [].
 * Words inside a chunk are joined with single spaces, so original line
 * breaks and runs of whitespace are not preserved.
 */
export function chunkText(
  text: string,
  chunkSize: number = DEFAULT_CHUNKING_CONFIG.chunkSize,
  chunkOverlap: number = DEFAULT_CHUNKING_CONFIG.chunkOverlap
): string[] {
  validateChunkingConfig({ chunkSize, chunkOverlap });

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return [];
  }

  const stride = chunkSize - chunkOverlap;
  const chunks: string[] = [];
  let start = 0;

  while (start < words.length) {
    const end = start + chunkSize;
    chunks.push(words.slice(start, end).join(' '));
    if (end >= words.length) {
      break;
    }
    start += stride;
  }

  return chunks;
}

/**
 * Holds the active chunking configuration for the ingestion service.
 *
 * The configuration can be changed at runtime through updateConfig, which
 * validates before applying so a bad update leaves the old values in place.
 */
export class DocumentChunker {
  private config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    const merged = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    validateChunkingConfig(merged);
    this.config = merged;
  }

  chunk(text: string): string[] {
    return chunkText(text, this.config.chunkSize, this.config.chunkOverlap);
  }

  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  updateConfig(update: Partial<ChunkingConfig>): ChunkingConfig {
    const next = { ...this.config, ...update };
    validateChunkingConfig(next);
    this.config = next;
    return this.getConfig();
  }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
  return new DocumentChunker(config);
}
