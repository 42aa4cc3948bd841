/**
 * RAG Pipeline Tests
 *
 * Uses a real exact vector store with a keyword embedder, so retrieval
 * behaves the way it does in production while staying deterministic.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RAGStreamEvent } from '../../../shared/types';
import { LLMError, LLMErrorCode } from '../../clients/llmClient';
import { ExactVectorStore } from '../exactVectorStore';
import {
  RAGPipeline,
  RAGPipelineError,
  RAGPipelineErrorCode,
  REFUSAL_MESSAGE,
  createRAGPipeline,
  mergeRetrievalOptions,
} from '../ragPipeline';
import { KeywordEmbedder, ScriptedLLM, StaticPrompts } from './fakes';

async function collect(stream: AsyncIterable<RAGStreamEvent>): Promise<RAGStreamEvent[]> {
  const events: RAGStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe('RAGPipeline', () => {
  let dir: string;
  let embedder: KeywordEmbedder;
  let store: ExactVectorStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rag-'));
    embedder = new KeywordEmbedder();
    store = new ExactVectorStore({
      dimension: 3,
      indexPath: path.join(dir, 'index.bin'),
      metadataPath: path.join(dir, 'index_meta.json'),
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function indexDeployGuide(): Promise<void> {
    await store.add(
      ['Run nexa deploy --env prod.', 'To deploy, set NEXA_ENV first.', 'Billing runs monthly.'],
      [
        [1, 0, 0],
        [1, 0, 0],
        [0, 1, 0],
      ],
      [
        { id: 'chunk-1', documentName: 'deploy.md' },
        { id: 'chunk-2', documentName: 'deploy.md' },
        { id: 'chunk-3', documentName: 'billing.md' },
      ]
    );
  }

  describe('generate', () => {
    it('should refuse without calling the LLM when the store is empty', async () => {
      const llm = new ScriptedLLM();
      const pipeline = createRAGPipeline(embedder, store, llm, new StaticPrompts());

      const result = await pipeline.generate('How do I deploy Nexa?');

      expect(result).toEqual({
        answer: 'I can only help with questions related to Nexa. This information is not available in the documentation.',
        sources: [],
      });
      expect(llm.calls).toEqual([]);
    });

    it('should refuse when nothing reaches the threshold', async () => {
      await indexDeployGuide();
      const llm = new ScriptedLLM();
      const pipeline = createRAGPipeline(embedder, store, llm, new StaticPrompts());

      // The keyword embedder maps this query to the z axis, which scores 0 everywhere
      const result = await pipeline.generate('What is the weather?');

      expect(result).toEqual({ answer: REFUSAL_MESSAGE, sources: [] });
      expect(llm.calls).toEqual([]);
    });

    it('should answer from retrieved context with distinct sources', async () => {
      await indexDeployGuide();
      const llm = new ScriptedLLM({ answer: 'Run nexa deploy.' });
      const pipeline = createRAGPipeline(embedder, store, llm, new StaticPrompts());

      const result = await pipeline.generate('How do I deploy Nexa?');

      expect(result).toEqual({ answer: 'Run nexa deploy.', sources: ['deploy.md'] });
    });

    it('should send the system prompt and the assembled user prompt', async () => {
      await indexDeployGuide();
      const llm = new ScriptedLLM();
      const pipeline = createRAGPipeline(
        embedder,
        store,
        llm,
        new StaticPrompts('SYSTEM', 'RAG RULES')
      );

      await pipeline.generate('How do I deploy Nexa?');

      expect(llm.calls).toEqual([
        {
          systemPrompt: 'SYSTEM',
          prompt:
            'RAG RULES\n' +
            'Context:\nRun nexa deploy --env prod.\n---\nTo deploy, set NEXA_ENV first.\n\n' +
            'User question: How do I deploy Nexa?\n' +
            'Answer concisely using only the context.',
        },
      ]);
    });

    it('should report "unknown" for hits without a document name', async () => {
      await store.add(['deploy notes'], [[1, 0, 0]], [{}]);
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());

      expect((await pipeline.generate('deploy?')).sources).toEqual(['unknown']);
    });

    it('should list sources in ranked order', async () => {
      await store.add(
        ['deploy a', 'deploy b', 'deploy c'],
        [
          [0.5, 0, 0],
          [1, 0, 0],
          [0.75, 0, 0],
        ],
        [{ documentName: 'low.md' }, { documentName: 'high.md' }, { documentName: 'mid.md' }]
      );
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());

      expect((await pipeline.generate('deploy?')).sources).toEqual(['high.md', 'mid.md', 'low.md']);
    });

    it('should reject empty and whitespace queries before embedding', async () => {
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());

      await expect(pipeline.generate('   ')).rejects.toBeInstanceOf(RAGPipelineError);
      await expect(pipeline.generate('')).rejects.toMatchObject({
        code: RAGPipelineErrorCode.INVALID_QUERY,
      });
      expect(embedder.queries).toEqual([]);
    });

    it('should propagate LLM failures unchanged', async () => {
      await indexDeployGuide();
      const failure = new LLMError('Model "mistral" not found', LLMErrorCode.MODEL_NOT_FOUND);
      const pipeline = createRAGPipeline(
        embedder,
        store,
        new ScriptedLLM({ failure }),
        new StaticPrompts()
      );

      await expect(pipeline.generate('deploy?')).rejects.toBe(failure);
    });
  });

  describe('generateStream', () => {
    it('should emit sources, contexts, tokens, then done', async () => {
      await indexDeployGuide();
      const pipeline = createRAGPipeline(
        embedder,
        store,
        new ScriptedLLM({ tokens: ['Run ', 'nexa ', 'deploy.'] }),
        new StaticPrompts()
      );

      const events = await collect(pipeline.generateStream('How do I deploy Nexa?'));

      expect(events).toEqual([
        { type: 'sources', data: ['deploy.md'] },
        {
          type: 'contexts',
          data: [
            { document: 'deploy.md', chunkId: 'chunk-1', text: 'Run nexa deploy --env prod.', score: 1 },
            { document: 'deploy.md', chunkId: 'chunk-2', text: 'To deploy, set NEXA_ENV first.', score: 1 },
          ],
        },
        { type: 'token', data: 'Run ' },
        { type: 'token', data: 'nexa ' },
        { type: 'token', data: 'deploy.' },
        { type: 'done', data: '' },
      ]);
    });

    it('should stream the refusal without contexts when nothing is retrieved', async () => {
      const llm = new ScriptedLLM();
      const pipeline = createRAGPipeline(embedder, store, llm, new StaticPrompts());

      const events = await collect(pipeline.generateStream('How do I deploy Nexa?'));

      expect(events).toEqual([
        { type: 'sources', data: [] },
        { type: 'token', data: REFUSAL_MESSAGE },
        { type: 'done', data: '' },
      ]);
      expect(llm.calls).toEqual([]);
    });

    it('should truncate context previews and round scores', async () => {
      const longText = `deploy ${'x'.repeat(600)}`;
      await store.add([longText], [[0.123456, 0, 0]], [{ id: 'long', documentName: 'long.md' }]);
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts(), {
        similarityThreshold: 0.1,
      });

      const events = await collect(pipeline.generateStream('deploy?'));
      const contexts = events.find((event) => event.type === 'contexts');

      expect(contexts?.type).toBe('contexts');
      if (contexts?.type === 'contexts') {
        expect(contexts.data[0].text).toBe(longText.slice(0, 500));
        expect(contexts.data[0].score).toBe(0.123);
      }
    });

    it('should end with the LLM error after the tokens already sent', async () => {
      await indexDeployGuide();
      const failure = new LLMError('Stream timed out', LLMErrorCode.TIMEOUT);
      const pipeline = createRAGPipeline(
        embedder,
        store,
        new ScriptedLLM({ tokens: ['partial'], failure }),
        new StaticPrompts()
      );

      const seen: string[] = [];
      await expect(
        (async () => {
          for await (const event of pipeline.generateStream('deploy?')) {
            seen.push(event.type);
          }
        })()
      ).rejects.toBe(failure);
      expect(seen).toEqual(['sources', 'contexts', 'token']);
    });

    it('should close the LLM stream when the consumer stops early', async () => {
      await indexDeployGuide();
      const llm = new ScriptedLLM({ tokens: ['Run ', 'nexa ', 'deploy.'] });
      const pipeline = createRAGPipeline(embedder, store, llm, new StaticPrompts());

      const seen: string[] = [];
      for await (const event of pipeline.generateStream('How do I deploy?')) {
        seen.push(event.type);
        if (event.type === 'token') {
          break;
        }
      }

      expect(seen).toEqual(['sources', 'contexts', 'token']);
      expect(llm.tokensYielded).toBe(1);
      expect(llm.streamsClosed).toBe(1);
    });

    it('should never open the LLM stream when the consumer stops after contexts', async () => {
      await indexDeployGuide();
      const llm = new ScriptedLLM();
      const stream = createRAGPipeline(embedder, store, llm, new StaticPrompts()).generateStream('deploy?');

      expect((await stream.next()).value).toMatchObject({ type: 'sources' });
      expect((await stream.next()).value).toMatchObject({ type: 'contexts' });
      expect(await stream.return(undefined)).toEqual({ done: true, value: undefined });

      expect(await stream.next()).toEqual({ done: true, value: undefined });
      expect(llm.calls).toEqual([]);
      expect(llm.tokensYielded).toBe(0);
    });

    it('should reject an invalid query on the first iteration', async () => {
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());
      await expect(collect(pipeline.generateStream('\n\t'))).rejects.toMatchObject({
        code: RAGPipelineErrorCode.INVALID_QUERY,
      });
    });

    it('should retrieve afresh on every call', async () => {
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());

      await collect(pipeline.generateStream('deploy?'));
      await indexDeployGuide();
      const events = await collect(pipeline.generateStream('deploy?'));

      expect(events[0]).toEqual({ type: 'sources', data: ['deploy.md'] });
      expect(embedder.queries).toEqual(['deploy?', 'deploy?']);
    });
  });

  describe('retrieval options', () => {
    it('should default to topK 4 and threshold 0.35', () => {
      const pipeline = new RAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());
      expect(pipeline.getRetrievalOptions()).toEqual({ topK: 4, similarityThreshold: 0.35 });
    });

    it('should limit hits to topK', async () => {
      await indexDeployGuide();
      const pipeline = createRAGPipeline(embedder, store, new ScriptedLLM(), new StaticPrompts());
      pipeline.updateRetrievalOptions({ topK: 1 });

      const events = await collect(pipeline.generateStream('deploy?'));
      const contexts = events.find((event) => event.type === 'contexts');
      expect(contexts?.data).toHaveLength(1);
    });

    it('should reject invalid values', () => {
      expect(() => mergeRetrievalOptions({ topK: 4, similarityThreshold: 0.35 }, { topK: 0 })).toThrow(RangeError);
      expect(() =>
        mergeRetrievalOptions({ topK: 4, similarityThreshold: 0.35 }, { similarityThreshold: Number.NaN })
      ).toThrow(RangeError);
    });
  });
});
