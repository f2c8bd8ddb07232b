import { PineconeChunkIndex } from '../services/PineconeChunkIndex';
import { ChunkMetadata } from '../types';
import { StoreUnavailableError } from '../utils/errors';

const mockIndex = {
  upsert: jest.fn(),
  query: jest.fn(),
  deleteMany: jest.fn(),
  describeIndexStats: jest.fn()
};

jest.mock('@pinecone-database/pinecone', () => ({
  Pinecone: jest.fn().mockImplementation(() => ({ index: () => mockIndex }))
}));

const metadata: ChunkMetadata = {
  owner_id: 'alice',
  document_id: 'doc-1',
  source_filename: 'q3.txt',
  text: 'Revenue rose.',
  chunk_index: 0,
  ingested_at: 1000
};

describe('PineconeChunkIndex', () => {
  let index: PineconeChunkIndex;

  beforeEach(() => {
    for (const fn of Object.values(mockIndex)) fn.mockReset();
    index = new PineconeChunkIndex('test-secret', 'documents', 3);
  });

  it('sends records with their metadata', async () => {
    await index.upsert([{ id: 'doc-1::chunk::0', vector: [1, 2, 3], metadata }]);

    expect(mockIndex.upsert).toHaveBeenCalledWith([{ id: 'doc-1::chunk::0', values: [1, 2, 3], metadata }]);
  });

  it('sends the filter with the query', async () => {
    mockIndex.query.mockResolvedValue({ matches: [{ id: 'doc-1::chunk::0', score: 0.9, metadata }] });

    const results = await index.query({ vector: [1, 0, 0], topK: 3, filter: { owner_id: { $eq: 'alice' } } });

    expect(mockIndex.query).toHaveBeenCalledWith({
      vector: [1, 0, 0],
      topK: 3,
      includeMetadata: true,
      includeValues: false,
      filter: { owner_id: { $eq: 'alice' } }
    });
    expect(results).toEqual([{ id: 'doc-1::chunk::0', score: 0.9, metadata }]);
  });

  it('omits the filter for unrestricted queries', async () => {
    mockIndex.query.mockResolvedValue({ matches: [] });

    await index.query({ vector: [1, 0, 0], topK: 3 });

    expect(mockIndex.query).toHaveBeenCalledWith({ vector: [1, 0, 0], topK: 3, includeMetadata: true, includeValues: false });
  });

  it('deletes and counts by filter', async () => {
    mockIndex.query.mockResolvedValue({ matches: [{ id: 'a', score: 0 }, { id: 'b', score: 0 }] });
    const filter = { document_id: { $eq: 'doc-1' } };

    await index.deleteWhere(filter);
    const remaining = await index.countWhere(filter);

    expect(mockIndex.deleteMany).toHaveBeenCalledWith(filter);
    expect(remaining).toBe(2);
    expect(mockIndex.query).toHaveBeenCalledWith({
      vector: [1, 0, 0],
      topK: 10000,
      filter,
      includeMetadata: false,
      includeValues: false
    });
  });

  it('reports connection failures as a retryable outage', async () => {
    mockIndex.query.mockRejectedValue(Object.assign(new Error('socket hang up'), { name: 'PineconeConnectionError' }));

    await expect(index.query({ vector: [1, 0, 0], topK: 3 })).rejects.toThrow(StoreUnavailableError);
  });

  it('does not mark request errors as retryable', async () => {
    mockIndex.query.mockRejectedValue(new Error('Vector dimension 3 does not match the dimension of the index 768'));

    const error = await index.query({ vector: [1, 0, 0], topK: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ message: 'Pinecone query failed: Vector dimension 3 does not match the dimension of the index 768' });
  });
});
