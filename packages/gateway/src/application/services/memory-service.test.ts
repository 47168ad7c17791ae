import 'reflect-metadata';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryService } from './memory-service.js';
import { SqliteMemoryRepository } from '../../infrastructure/repositories/sqlite-memory-repository.js';
import { AppError } from '../../domain/errors/app-error.js';
import { makeConfig, makeContainer } from '../../testing/fixtures.js';

describe('MemoryService', () => {
  let memory: MemoryService;

  beforeEach(() => {
    const container = makeContainer(
      makeConfig({
        history: { lastN: 2 },
        retrieval: { maxDocChars: 50, maxTotalChars: 100 },
      }),
    );
    memory = container.resolve(MemoryService);
  });

  afterEach(() => {
    memory.close();
  });

  it('should reject documents over the size limit with a 413', async () => {
    const error = await memory
      .upsertDoc({ docId: 'big', title: '', content: 'x'.repeat(51), tags: '' })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.statusCode).toBe(413);
  });

  it('should prune the corpus back under its ceiling after an upsert', async () => {
    const upsert = (docId: string) =>
      memory.upsertDoc({ docId, title: '', content: 'y'.repeat(40), tags: '' });

    expect(await upsert('d1')).toEqual({ docId: 'd1', prunedDocs: 0 });
    expect(await upsert('d2')).toEqual({ docId: 'd2', prunedDocs: 0 });
    expect(await upsert('d3')).toEqual({ docId: 'd3', prunedDocs: 1 });
    expect(await memory.stats()).toEqual({ available: true, docs: 2, totalChars: 80 });
  });

  it('should keep only the last turns verbatim and fold the rest', async () => {
    await memory.recordTurn('s1', 'penny', 'first question', 'first answer');
    await memory.recordTurn('s1', 'penny', 'second question', 'second answer');

    expect(await memory.getChatContext('s1', 'penny')).toEqual({
      summary: 'user: first question | assistant: first answer',
      messages: [
        { role: 'user', content: 'second question' },
        { role: 'assistant', content: 'second answer' },
      ],
    });
  });

  it('should never fail a touch', async () => {
    const container = makeContainer();
    const service = container.resolve(MemoryService);
    vi.spyOn(container.resolve(SqliteMemoryRepository), 'touchSession').mockRejectedValue(
      new Error('database is locked'),
    );
    await expect(service.touch('s1')).resolves.toBeUndefined();
    service.close();
  });

  it('should report an idle sweep', async () => {
    await memory.touch('s1');
    expect(await memory.sweep()).toEqual({ expiredSessions: 0, prunedDocs: 0 });
  });
});
