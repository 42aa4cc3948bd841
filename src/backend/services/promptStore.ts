/**
 * Prompt Store
 *
 * Holds the system prompt and the RAG instruction prefix. Both are read from
 * text files once at construction and served from memory afterwards; an
 * update writes the file and swaps the in-memory copy, so the next request
 * sees it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('promptStore');

/**
 * Read side used by the RAG pipeline.
 */
export interface IPromptProvider {
  getSystemPrompt(): string;
  getRagPrompt(): string;
}

export interface PromptStoreConfig {
  systemPromptPath: string;
  ragPromptPath: string;
}

export interface PromptUpdate {
  systemPrompt?: string;
  ragPrompt?: string;
}

export interface Prompts {
  systemPrompt: string;
  ragPrompt: string;
}

export class PromptStore implements IPromptProvider {
  private systemPrompt: string;
  private ragPrompt: string;

  constructor(private readonly config: PromptStoreConfig) {
    this.systemPrompt = readPromptFile(config.systemPromptPath);
    this.ragPrompt = readPromptFile(config.ragPromptPath);
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  getRagPrompt(): string {
    return this.ragPrompt;
  }

  getPrompts(): Prompts {
    return { systemPrompt: this.systemPrompt, ragPrompt: this.ragPrompt };
  }

  /**
   * Writes the given prompts to their files. Omitted prompts are untouched.
   */
  async updatePrompts(update: PromptUpdate): Promise<Prompts> {
    if (update.systemPrompt !== undefined) {
      await writePromptFile(this.config.systemPromptPath, update.systemPrompt);
      this.systemPrompt = update.systemPrompt;
      logger.info('System prompt updated');
    }
    if (update.ragPrompt !== undefined) {
      await writePromptFile(this.config.ragPromptPath, update.ragPrompt);
      this.ragPrompt = update.ragPrompt;
      logger.info('RAG prompt updated');
    }
    return this.getPrompts();
  }
}

/**
 * A missing file reads as an empty prompt.
 */
function readPromptFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Prompt file not found, using an empty prompt: ${filePath}`);
    return '';
  }
  return fs.readFileSync(filePath, 'utf-8');
}

async function writePromptFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export function createPromptStore(config: PromptStoreConfig): PromptStore {
  return new PromptStore(config);
}
