import { describe, it, expect, vi } from 'vitest';
import { EmbeddingService } from '../embedding';
import { EmbeddingError } from '../../utils/errors';
import { FakeEmbeddingModel, quietLogger } from '../../__tests__/helpers/fakes';
import type { EmbeddingModel } from '../../types/index';

describe('EmbeddingService', () => {
  it('should initialise the model once for concurrent first calls', async () => {
    const model = new FakeEmbeddingModel(4);
    const loader = vi.fn(() => Promise.resolve<EmbeddingModel>(model));
    const service = new EmbeddingService({ loader, dimensions: 4 }, quietLogger());

    await Promise.all([service.embed('hi'), service.embed('hello'), service.getModel()]);

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should retry initialisation after a failure', async () => {
    const model = new FakeEmbeddingModel(4);
    const loader = vi
      .fn<() => Promise<EmbeddingModel>>()
      .mockRejectedValueOnce(new Error('server not ready'))
      .mockResolvedValue(model);
    const service = new EmbeddingService({ loader, dimensions: 4 }, quietLogger());

    await expect(service.embed('hi')).rejects.toThrow('server not ready');
    await expect(service.embed('hi')).resolves.toEqual([1, 0, 0, 1]);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('should embed in batches and report progress', async () => {
    const model = new FakeEmbeddingModel(4);
    const service = new EmbeddingService(
      { loader: () => Promise.resolve(model), dimensions: 4 },
      quietLogger()
    );
    const progress: Array<[number, number]> = [];

    const vectors = await service.embedBatch(['a', 'b', 'c', 'd', 'e'], 2, (done, total) =>
      progress.push([done, total])
    );

    expect(vectors).toHaveLength(5);
    expect(model.calls).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(progress).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('should not load the model for an empty batch', async () => {
    const loader = vi.fn(() => Promise.resolve<EmbeddingModel>(new FakeEmbeddingModel(4)));
    const service = new EmbeddingService({ loader, dimensions: 4 }, quietLogger());

    await expect(service.embedBatch([])).resolves.toEqual([]);
    expect(loader).not.toHaveBeenCalled();
  });

  it('should reject vectors of the wrong dimension', async () => {
    const service = new EmbeddingService(
      { loader: () => Promise.resolve(new FakeEmbeddingModel(3)), dimensions: 4 },
      quietLogger()
    );

    await expect(service.embed('hi')).rejects.toBeInstanceOf(EmbeddingError);
  });
});
