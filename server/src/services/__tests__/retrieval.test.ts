import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetrievalService } from '../retrieval';
import { EmbeddingService } from '../embedding';
import {
  FakeEmbeddingModel,
  InMemoryStyleStore,
  letterVector,
  quietLogger,
} from '../../__tests__/helpers/fakes';

const DIMENSIONS = 8;

describe('RetrievalService', () => {
  let store: InMemoryStyleStore;
  let embeddings: EmbeddingService;
  let retrieval: RetrievalService;

  const addExample = (contactId: string, triggerText: string, replyText: string): void => {
    store.rows.push({ contactId, triggerText, replyText, embedding: letterVector(triggerText, DIMENSIONS) });
  };

  beforeEach(() => {
    store = new InMemoryStyleStore();
    embeddings = new EmbeddingService(
      { loader: () => Promise.resolve(new FakeEmbeddingModel(DIMENSIONS)), dimensions: DIMENSIONS },
      quietLogger()
    );
    retrieval = new RetrievalService(embeddings, store, quietLogger(), {
      enabled: true,
      globalContactId: 'global',
    });
  });

  it("should return the contact's own examples, most similar first", async () => {
    addExample('priya', 'kya kar rha h', 'kuch nhi');
    addExample('priya', 'zzz', 'so ja');
    addExample('global', 'kya kar rha h', 'global reply');

    const examples = await retrieval.retrieve('priya', 'kya kar rha h', 2);

    expect(examples.map((e) => e.replyText)).toEqual(['kuch nhi', 'so ja']);
    expect(examples[0].similarity).toBeCloseTo(1);
  });

  it('should fall back to the global collection when the contact has no examples', async () => {
    addExample('global', 'kya kar rha h', 'kuch nhi yaar');
    addExample('global', 'khana khaya', 'haan');

    const fallback = await retrieval.retrieve('new-contact', 'kya kar rha', 2);
    const direct = await retrieval.retrieve('global', 'kya kar rha', 2);

    expect(fallback).toEqual(direct);
    expect(fallback).toHaveLength(2);
  });

  it('should query the global collection only once for the global contact', async () => {
    const match = vi.spyOn(store, 'match');
    await retrieval.retrieve('global', 'hello', 3);
    expect(match).toHaveBeenCalledTimes(1);
  });

  it('should return no examples when the store fails', async () => {
    vi.spyOn(store, 'match').mockRejectedValue(new Error('connection refused'));
    await expect(retrieval.retrieve('priya', 'hi', 3)).resolves.toEqual([]);
  });

  it('should return no examples when embedding fails', async () => {
    vi.spyOn(embeddings, 'embed').mockRejectedValue(new Error('embedding server down'));
    await expect(retrieval.retrieve('priya', 'hi', 3)).resolves.toEqual([]);
  });

  it('should skip the search when disabled', async () => {
    addExample('priya', 'hi', 'hello');
    const disabled = new RetrievalService(embeddings, store, quietLogger(), {
      enabled: false,
      globalContactId: 'global',
    });
    const embed = vi.spyOn(embeddings, 'embed');

    await expect(disabled.retrieve('priya', 'hi', 3)).resolves.toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });
});
