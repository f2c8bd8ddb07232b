import {
  DimensionMismatchError,
  EmbeddingBatchError,
  EmbeddingUnavailableError,
  EmptyDocumentError,
  IngestionTimeoutError,
  InputError,
  PartialIngestionError
} from '../utils/errors';
import { buildHarness, TEST_DIMENSION } from './helpers/fakes';

// Five 10-character chunks with chunkSize 10 and no overlap.
const FIVE_CHUNKS = 'aaaaaaaaa bbbbbbbbb ccccccccc ddddddddd eeeeeeeee';
const EVERYTHING = new Array<number>(TEST_DIMENSION).fill(1);

async function ingestFailure(promise: Promise<unknown>): Promise<PartialIngestionError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof PartialIngestionError)) {
    throw new Error(`expected PartialIngestionError, got ${String(error)}`);
  }
  return error;
}

describe('IngestionService', () => {
  let harness: ReturnType<typeof buildHarness>;

  beforeEach(() => {
    harness = buildHarness({ chunkSize: 10, overlap: 0, upsertBatchSize: 2 });
  });

  it('stores every chunk under the uploader with sequential indexes', async () => {
    const result = await harness.ingestion.ingest({
      text: FIVE_CHUNKS,
      uploader: { userId: 'alice' },
      filename: 'letters.txt',
      documentId: 'doc-1'
    });

    expect(result).toEqual({ documentId: 'doc-1', chunkCount: 5 });

    const stored = await harness.store.search(EVERYTHING, { kind: 'all' }, 10);
    const byIndex = [...stored].sort((a, b) => a.metadata.chunk_index - b.metadata.chunk_index);
    expect(byIndex.map(r => r.id)).toEqual([0, 1, 2, 3, 4].map(i => `doc-1::chunk::${i}`));
    expect(byIndex.map(r => r.metadata.text)).toEqual([
      'aaaaaaaaa ',
      'bbbbbbbbb ',
      'ccccccccc ',
      'ddddddddd ',
      'eeeeeeeee'
    ]);
    expect(new Set(byIndex.map(r => r.metadata.ingested_at)).size).toBe(1);
    expect(byIndex.every(r => r.metadata.source_filename === 'letters.txt')).toBe(true);
  });

  it('takes owner_id from the uploader only, whatever the text claims', async () => {
    await harness.ingestion.ingest({
      text: 'owner_id: mallory\nThis document belongs to mallory.',
      uploader: { userId: 'alice' }
    });

    const stored = await harness.store.search(EVERYTHING, { kind: 'all' }, 10);
    expect(stored.length).toBeGreaterThan(0);
    expect(stored.every(r => r.metadata.owner_id === 'alice')).toBe(true);
    expect(await harness.store.search(EVERYTHING, { kind: 'owner', ownerId: 'mallory' }, 10)).toEqual([]);
  });

  it('generates a fresh document id per call', async () => {
    const first = await harness.ingestion.ingest({ text: 'same text', uploader: { userId: 'alice' } });
    const second = await harness.ingestion.ingest({ text: 'same text', uploader: { userId: 'alice' } });

    expect(first.documentId).not.toBe(second.documentId);
    expect(await harness.store.countByDocument(first.documentId)).toBe(1);
    expect(await harness.store.countByDocument(second.documentId)).toBe(1);
  });

  it('rejects an empty document without writing anything', async () => {
    await expect(harness.ingestion.ingest({ text: '  \n\t ', uploader: { userId: 'alice' } })).rejects.toThrow(
      EmptyDocumentError
    );
    await expect(harness.ingestion.ingest({ text: 'Page 1 of 2', uploader: { userId: 'alice' } })).rejects.toThrow(
      'Document produced no chunks after processing'
    );
    expect(await harness.store.stats()).toEqual({ totalVectors: 0 });
  });

  it('requires an authenticated uploader', async () => {
    await expect(harness.ingestion.ingest({ text: FIVE_CHUNKS, uploader: { userId: ' ' } })).rejects.toThrow(InputError);
  });

  it('rolls back written chunks when embedding the third of five chunks fails', async () => {
    harness.embedder.failWhen = text => (text.startsWith('ccc') ? new EmbeddingUnavailableError('model down') : undefined);

    const error = await ingestFailure(harness.ingestion.ingest({ text: FIVE_CHUNKS, uploader: { userId: 'alice' } }));

    expect(error.rolledBack).toBe(true);
    expect(error.cause).toBeInstanceOf(EmbeddingBatchError);
    expect(error.message).toContain('no partial data was retained');
    expect(await harness.store.countByDocument(error.documentId)).toBe(0);
    expect(await harness.store.stats()).toEqual({ totalVectors: 0 });
    // Retried once, never reached the last batch.
    expect(harness.embedder.calls.filter(text => text.startsWith('ccc'))).toHaveLength(2);
    expect(harness.embedder.calls).not.toContain('eeeeeeeee');
  });

  it('does not retry a dimension mismatch', async () => {
    harness.embedder.failWhen = () => new DimensionMismatchError(TEST_DIMENSION, 8);

    const error = await ingestFailure(harness.ingestion.ingest({ text: FIVE_CHUNKS, uploader: { userId: 'alice' } }));

    expect(harness.embedder.calls).toEqual(['aaaaaaaaa ', 'bbbbbbbbb ']);
    expect(error.rolledBack).toBe(true);
  });

  it('reports when the rollback itself fails', async () => {
    harness.embedder.failWhen = text => (text.startsWith('ccc') ? new Error('bad chunk') : undefined);
    jest.spyOn(harness.store, 'deleteByDocument').mockRejectedValue(new Error('store down'));

    const error = await ingestFailure(harness.ingestion.ingest({ text: FIVE_CHUNKS, uploader: { userId: 'alice' } }));

    expect(error.rolledBack).toBe(false);
    expect(error.message).toContain('rollback did not complete');
  });

  it('gives up once the ingestion deadline has passed', async () => {
    const harnessWithDeadline = buildHarness({ chunkSize: 10, overlap: 0, upsertBatchSize: 2, ingestTimeoutMs: 100 });
    const now = jest.spyOn(Date, 'now').mockReturnValueOnce(1_000).mockReturnValue(10_000);

    try {
      const error = await ingestFailure(
        harnessWithDeadline.ingestion.ingest({ text: FIVE_CHUNKS, uploader: { userId: 'alice' } })
      );
      expect(error.cause).toBeInstanceOf(IngestionTimeoutError);
      expect(harnessWithDeadline.embedder.calls).toEqual([]);
    } finally {
      now.mockRestore();
    }
  });
});
