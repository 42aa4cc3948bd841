/**
 * Document Loader Service
 *
 * Reads supported files from disk into plain text for chunking.
 *
 * Different formats (Markdown, plain text, PDF) store text differently, so
 * each format has its own parser behind a shared interface. The loader picks
 * the parser from the file extension and knows how to expand directories.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DocumentType, LoadedDocument } from '../../shared/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('documentLoader');

/**
 * File extensions the loader can read, lower-case with the leading dot.
 */
export const SUPPORTED_EXTENSIONS: readonly string[] = ['.md', '.markdown', '.txt', '.pdf'];

/**
 * Raised when asked to load a file whose extension has no parser.
 */
export class UnsupportedFormatError extends Error {
  constructor(public readonly extension: string, public readonly filePath: string) {
    super(`Unsupported file type: ${extension || '(none)'} (${filePath})`);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Raised when a supported file cannot be turned into text.
 */
export class DocumentLoadError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'DocumentLoadError';
  }
}

/**
 * Interface for document parsers.
 * Each supported format implements this interface.
 */
export interface DocumentParser {
  parse(input: Buffer): Promise<string>;
}

/**
 * Parses Markdown documents.
 *
 * Headers, lists and code blocks are kept since the LLM reads Markdown well.
 * Images are reduced to their alt text and horizontal rules are dropped.
 */
export class MarkdownParser implements DocumentParser {
  async parse(input: Buffer): Promise<string> {
    return input
      .toString('utf-8')
      .replace(/\r\n/g, '\n')
      .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
      .replace(/^[-*_]{3,}\s*$/gm, '')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}

/**
 * Parses plain text documents.
 */
export class PlainTextParser implements DocumentParser {
  async parse(input: Buffer): Promise<string> {
    return input.toString('utf-8').replace(/\r\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
  }
}

/**
 * Parses PDF documents using pdf-parse.
 *
 * PDFs are laid out for rendering, not reading, so text order can be off for
 * multi-column layouts. Scanned pages without a text layer yield nothing.
 */
export class PdfParser implements DocumentParser {
  async parse(input: Buffer): Promise<string> {
    try {
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(input);
      return pdf.text.trim();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DocumentLoadError(`Failed to parse PDF: ${message}`, error instanceof Error ? error : undefined);
    }
  }
}

const parsers: Record<DocumentType, DocumentParser> = {
  markdown: new MarkdownParser(),
  text: new PlainTextParser(),
  pdf: new PdfParser(),
};

export function getParser(type: DocumentType): DocumentParser {
  return parsers[type];
}

/**
 * Detects document type from a filename's extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentType(filename: string): DocumentType | undefined {
  switch (path.extname(filename).toLowerCase()) {
    case '.md':
    case '.markdown':
      return 'markdown';
    case '.txt':
      return 'text';
    case '.pdf':
      return 'pdf';
    default:
      return undefined;
  }
}

export function isSupportedFile(filename: string): boolean {
  return detectDocumentType(filename) !== undefined;
}

/**
 * Reads one file into text.
 *
 * @throws UnsupportedFormatError for an extension without a parser
 */
export async function loadFile(filePath: string): Promise<string> {
  const type = detectDocumentType(filePath);
  if (!type) {
    throw new UnsupportedFormatError(path.extname(filePath).toLowerCase(), filePath);
  }

  const buffer = await fs.promises.readFile(filePath);
  return getParser(type).parse(buffer);
}

/**
 * Recursively lists supported files under a directory. Entries are sorted
 * by name at every level, so paths come out ordered component by component
 * (`sub/x.md` before `sub-a.md`).
 */
async function listSupportedFiles(directory: string): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await listSupportedFiles(fullPath)));
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      found.push(fullPath);
    }
  }

  return found;
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Expands input paths into loaded documents.
 *
 * A file is loaded directly (and must have a supported extension); a
 * directory contributes every supported file beneath it in lexicographic
 * path order. Paths that do not exist are skipped with a warning; any other
 * failure to stat a path is thrown.
 */
export async function gatherDocuments(paths: string[]): Promise<LoadedDocument[]> {
  const documents: LoadedDocument[] = [];

  for (const inputPath of paths) {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(inputPath);
    } catch (error) {
      if (!isMissingPathError(error)) {
        throw error;
      }
      logger.warn(`Path does not exist, skipping: ${inputPath}`);
      continue;
    }

    if (stats.isDirectory()) {
      for (const filePath of await listSupportedFiles(inputPath)) {
        documents.push({ path: filePath, text: await loadFile(filePath) });
      }
    } else {
      documents.push({ path: inputPath, text: await loadFile(inputPath) });
    }
  }

  return documents;
}
