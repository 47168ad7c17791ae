/**
 * @file packages/shared/src/protocol.test.ts
 * @description Tests for request parsing and event serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  AskRequestSchema,
  RetrievalUpsertRequestSchema,
  serializeBroadcastFrame,
  serializeSseEvent,
} from './protocol.js';
import { PromotedStateSchema } from './types.js';

describe('Protocol', () => {
  describe('AskRequestSchema', () => {
    it('should default the persona selector to auto', () => {
      const req = AskRequestSchema.parse({ text: 'lights on' });
      expect(req.persona).toBe('auto');
      expect(req.noAudio).toBe(false);
    });

    it('should reject blank text', () => {
      const result = AskRequestSchema.safeParse({ persona: 'penny', text: '   ' });
      expect(result.success).toBe(false);
    });

    it('should default context extensions to an empty map', () => {
      const req = AskRequestSchema.parse({ text: 'hi', context: { room: 'office' } });
      expect(req.context).toEqual({ room: 'office', extensions: {} });
    });
  });

  describe('serializeSseEvent', () => {
    it('should serialize a message event without the type in the data', () => {
      const block = serializeSseEvent({
        type: 'message',
        persona: 'penny',
        reply: 'Hello Lyfe.',
        actions: [],
      });
      expect(block).toBe(
        'event: message\ndata: {"persona":"penny","reply":"Hello Lyfe.","actions":[]}\n\n',
      );
    });

    it('should serialize keepalives as comments', () => {
      expect(serializeSseEvent({ type: 'keepalive' })).toBe(': keep-alive\n\n');
    });

    it('should unwrap memory payloads', () => {
      const block = serializeSseEvent({
        type: 'memory',
        memory: {
          eventId: 'e1',
          eventTs: 1,
          kind: 'promoted_state',
          mode: 'suggested',
          source: 'auto_promote',
          appliedAt: null,
        },
      });
      expect(block).toBe(
        'event: memory\ndata: {"eventId":"e1","eventTs":1,"kind":"promoted_state","mode":"suggested","source":"auto_promote","appliedAt":null}\n\n',
      );
    });

    it('should serialize the terminal event', () => {
      expect(serializeSseEvent({ type: 'done', persona: 'collective' })).toBe(
        'event: done\ndata: {"persona":"collective"}\n\n',
      );
    });
  });

  describe('serializeBroadcastFrame', () => {
    it('should serialize a hello frame', () => {
      expect(serializeBroadcastFrame({ type: 'hello', subscribers: 2 })).toBe(
        '{"type":"hello","subscribers":2}',
      );
    });
  });

  describe('RetrievalUpsertRequestSchema', () => {
    it('should default title and tags', () => {
      const req = RetrievalUpsertRequestSchema.parse({ docId: 'notes-1', content: 'Body' });
      expect(req).toEqual({ docId: 'notes-1', title: '', content: 'Body', tags: '' });
    });
  });

  describe('PromotedStateSchema', () => {
    it('should keep unknown fields', () => {
      const state = PromotedStateSchema.parse({ timezone: 'UTC', favouriteColour: 'teal' });
      expect(state).toEqual({ timezone: 'UTC', favouriteColour: 'teal' });
    });
  });
});
