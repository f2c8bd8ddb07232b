import { resolveAuthorizationContext } from '../services/AuthorizationContextResolver';
import { assembleContext } from '../services/RetrievalService';
import { Role, ScoredChunk } from '../types';
import { GenerationUnavailableError, InputError } from '../utils/errors';
import { buildHarness } from './helpers/fakes';

function scored(text: string, score: number): ScoredChunk {
  return {
    id: `${text}::chunk::0`,
    score,
    metadata: {
      owner_id: 'alice',
      document_id: text,
      source_filename: `${text}.txt`,
      text,
      chunk_index: 0,
      ingested_at: 0
    }
  };
}

describe('RetrievalService', () => {
  let harness: ReturnType<typeof buildHarness>;
  const alice = resolveAuthorizationContext(Role.Standard, 'alice');
  const bob = resolveAuthorizationContext(Role.Standard, 'bob');
  const admin = resolveAuthorizationContext(Role.Privileged, 'root');

  beforeEach(async () => {
    harness = buildHarness();
    await harness.ingestion.ingest({
      text: 'Quarterly revenue rose twelve percent.',
      uploader: { userId: 'alice' },
      filename: 'q3.txt',
      documentId: 'doc-alice'
    });
    await harness.ingestion.ingest({
      text: 'Notes from the hiking trip.',
      uploader: { userId: 'carol' },
      filename: 'trip.txt',
      documentId: 'doc-carol'
    });
  });

  it('answers a standard user from their own documents only', async () => {
    const result = await harness.retrieval.query('What was the revenue change?', alice);

    expect(result.answer).toBe('answer to: What was the revenue change?');
    expect(result.chunksSearched).toBe(1);
    expect(result.sourceChunks).toHaveLength(1);
    expect(result.sourceChunks[0]).toMatchObject({
      documentId: 'doc-alice',
      ownerId: 'alice',
      sourceFilename: 'q3.txt',
      chunkIndex: 0,
      text: 'Quarterly revenue rose twelve percent.'
    });
    expect(harness.generator.requests).toEqual([
      { question: 'What was the revenue change?', context: 'Quarterly revenue rose twelve percent.' }
    ]);
  });

  it('still generates with an empty context when nothing is in scope', async () => {
    const result = await harness.retrieval.query('What was the revenue change?', bob);

    expect(result).toEqual({
      answer: 'answer to: What was the revenue change?',
      sourceChunks: [],
      chunksSearched: 0
    });
    expect(harness.generator.requests).toEqual([{ question: 'What was the revenue change?', context: '' }]);
  });

  it('searches across owners for the privileged role', async () => {
    const result = await harness.retrieval.query('revenue', admin);

    expect(result.chunksSearched).toBe(2);
    expect(new Set(result.sourceChunks.map(c => c.ownerId))).toEqual(new Set(['alice', 'carol']));
    expect(result.sourceChunks[0].documentId).toBe('doc-alice');
  });

  it('hands the predicate to the store untouched', async () => {
    const search = jest.spyOn(harness.store, 'search');

    await harness.retrieval.query('revenue', alice, 3);

    expect(search).toHaveBeenCalledWith(expect.any(Array), { kind: 'owner', ownerId: 'alice' }, 3);
  });

  it('caps top_k at the configured maximum', async () => {
    const search = jest.spyOn(harness.store, 'search');

    await harness.retrieval.query('revenue', admin, 100);

    expect(search).toHaveBeenCalledWith(expect.any(Array), { kind: 'all' }, 20);
  });

  it('rejects an empty question or invalid top_k', async () => {
    await expect(harness.retrieval.query('   ', alice)).rejects.toThrow(InputError);
    await expect(harness.retrieval.query('revenue', alice, 0)).rejects.toThrow(InputError);
    await expect(harness.retrieval.query('revenue', alice, 2.5)).rejects.toThrow(InputError);
    expect(harness.generator.requests).toEqual([]);
  });

  it('propagates generation failures after retrying', async () => {
    harness.generator.failure = new GenerationUnavailableError('model down');

    await expect(harness.retrieval.query('revenue', alice)).rejects.toThrow(GenerationUnavailableError);
    expect(harness.generator.requests).toHaveLength(2);
  });
});

describe('assembleContext', () => {
  it('joins chunks in order until the budget is used', () => {
    const chunks = [scored('aaaa', 0.9), scored('bbbb', 0.8), scored('cccc', 0.7)];

    const { context, used } = assembleContext(chunks, 15);

    expect(context).toBe('aaaa\n\n---\n\nbbbb');
    expect(used.map(c => c.metadata.text)).toEqual(['aaaa', 'bbbb']);
  });

  it('truncates a first chunk that is larger than the budget', () => {
    const { context, used } = assembleContext([scored('aaaa', 0.9), scored('bb', 0.5)], 2);

    expect(context).toBe('aa');
    expect(used).toHaveLength(1);
  });

  it('returns an empty context for no chunks', () => {
    expect(assembleContext([], 100)).toEqual({ context: '', used: [] });
  });
});
