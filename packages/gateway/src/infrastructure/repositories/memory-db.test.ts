import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryDB, parseMarkdownSections, toFtsQuery } from './memory-db.js';

const DAY_MS = 86_400_000;

describe('MemoryDB', () => {
  let clock: number;
  let db: MemoryDB;

  const open = (options: { maxSummaryChars?: number } = {}) =>
    new MemoryDB(':memory:', { now: () => clock, dedupeWindowSeconds: 300, ...options });

  beforeEach(() => {
    clock = 1_000_000;
    db = open();
  });

  afterEach(() => {
    db.close();
  });

  describe('chat history', () => {
    it('should drop a repeated message inside the dedupe window', () => {
      expect(db.addChatMessage('s1', 'domino', 'user', 'lights on')).toBe(true);
      clock += 500;
      expect(db.addChatMessage('s1', 'domino', 'user', 'lights on ')).toBe(false);
      clock += 400_000;
      expect(db.addChatMessage('s1', 'domino', 'user', 'lights on')).toBe(true);

      expect(db.getChatContext('s1', 'domino', 10, 10_000).messages).toEqual([
        { role: 'user', content: 'lights on' },
        { role: 'user', content: 'lights on' },
      ]);
    });

    it('should ignore blank messages', () => {
      expect(db.addChatMessage('s1', 'domino', 'user', '   ')).toBe(false);
    });

    it('should drop the oldest messages to fit the character budget', () => {
      db.addChatMessage('s1', 'penny', 'user', 'aaaa');
      db.addChatMessage('s1', 'penny', 'user', 'bbbb');
      db.addChatMessage('s1', 'penny', 'user', 'cccc');

      expect(db.getChatContext('s1', 'penny', 10, 9).messages.map((m) => m.content)).toEqual([
        'bbbb',
        'cccc',
      ]);
    });

    it('should fold trimmed messages into the digest', () => {
      ['m1', 'm2', 'm3', 'm4', 'm5'].forEach((content, i) => {
        db.addChatMessage('s1', 'jimmy', i % 2 === 0 ? 'user' : 'assistant', content);
      });

      db.trimHistory('s1', 'jimmy', 2);

      expect(db.getChatContext('s1', 'jimmy', 10, 10_000)).toEqual({
        summary: 'user: m1 | assistant: m2 | user: m3',
        messages: [
          { role: 'assistant', content: 'm4' },
          { role: 'user', content: 'm5' },
        ],
      });
    });

    it('should keep only the tail of a digest that outgrows its limit', () => {
      db.close();
      db = open({ maxSummaryChars: 20 });
      ['m1', 'm2', 'm3', 'm4'].forEach((content, i) => {
        db.addChatMessage('s1', 'jimmy', i % 2 === 0 ? 'user' : 'assistant', content);
      });

      db.trimHistory('s1', 'jimmy', 1);

      expect(db.getChatContext('s1', 'jimmy', 10, 10_000).summary).toBe('stant: m2 | user: m3');
    });

    it('should clear every thread of a session', () => {
      db.addChatMessage('s1', 'domino', 'user', 'hi');
      db.addChatMessage('s1', 'penny', 'user', 'hi');
      db.clearHistory('s1');
      expect(db.getChatContext('s1', 'domino', 10, 10_000).messages).toEqual([]);
      expect(db.getChatContext('s1', 'penny', 10, 10_000).messages).toEqual([]);
    });
  });

  describe('sessions', () => {
    it('should expire idle sessions together with their history', () => {
      db.touchSession('old');
      db.addChatMessage('old', 'domino', 'user', 'hi');
      clock += 31 * DAY_MS;
      db.touchSession('new');

      expect(db.expireStaleSessions(30)).toBe(1);
      expect(db.getSession('old')).toBeNull();
      expect(db.getSession('new')).toEqual({ createdAt: clock, lastSeen: clock });
      expect(db.getChatContext('old', 'domino', 10, 10_000).messages).toEqual([]);
    });
  });

  describe('promoted state', () => {
    beforeEach(() => {
      db.seedPromotedState({ timezone: 'UTC', ttsOverrides: { domino: 'auto', penny: 'auto' } });
    });

    it('should merge nested maps one level deep', () => {
      const merged = db.patchPromotedState({ ttsOverrides: { penny: 'fish' } });
      expect(merged.ttsOverrides).toEqual({ domino: 'auto', penny: 'fish' });
      expect(merged.timezone).toBe('UTC');
      expect(db.getPromotedState()).toEqual(merged);
    });

    it('should leave the document unchanged for an empty patch', () => {
      const before = db.getPromotedState();
      expect(db.patchPromotedState({})).toEqual(before);
    });

    it('should not reseed a populated store', () => {
      expect(db.seedPromotedState({ timezone: 'America/Chicago' })).toBe(false);
      expect(db.getPromotedState().timezone).toBe('UTC');
    });
  });

  describe('retrieval corpus', () => {
    it('should rank matching documents', () => {
      db.upsertRetrievalDoc('lights', 'Lights', 'The office lights use the Hue bridge', '');
      db.upsertRetrievalDoc('garden', 'Garden', 'Sprinklers run at dawn', '');

      const hits = db.queryRetrieval('office lights?', 3);
      expect(hits.map((h) => h.docId)).toEqual(['lights']);
      expect(hits[0].updatedAt).toBe(clock);
    });

    it('should prune oldest documents first', () => {
      for (const docId of ['d1', 'd2', 'd3']) {
        db.upsertRetrievalDoc(docId, '', 'x'.repeat(100), '');
        clock += 1000;
      }

      expect(db.pruneRetrievalToMaxChars(250)).toBe(1);
      expect(db.retrievalStats()).toEqual({ available: true, docs: 2, totalChars: 200 });
      expect(db.deleteRetrievalDoc('d1')).toBe(false);
      expect(db.deleteRetrievalDoc('d2')).toBe(true);
    });

    it('should replace only the manually synced notes', () => {
      db.upsertRetrievalDoc('keep', 'Keep', 'unrelated', 'source:api');

      expect(db.syncFromMarkdown('# Lights\nHue bridge\n# Garden\nSprinklers')).toBe(2);
      expect(db.retrievalStats().docs).toBe(3);

      expect(db.syncFromMarkdown('# Only\ntext')).toBe(1);
      expect(db.retrievalStats().docs).toBe(2);
      expect(db.purgeRetrieval()).toBe(2);
    });
  });

  it('should quote query tokens', () => {
    expect(toFtsQuery("Hey, what's up? hey")).toBe('"hey" OR "what" OR "s" OR "up"');
    expect(toFtsQuery('?!')).toBe('');
  });

  it('should split markdown on headings', () => {
    expect(parseMarkdownSections('intro\n# A\none\n\n# Empty\n# B\ntwo')).toEqual([
      { title: 'General', content: 'intro' },
      { title: 'A', content: 'one' },
      { title: 'B', content: 'two' },
    ]);
  });
});
