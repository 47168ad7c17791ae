/**
 * @file packages/gateway/src/domain/logic/persona-pipeline.ts
 * @description One target's path from user text to sanitized reply.
 */

import { inject, singleton } from 'tsyringe';
import type {
  Action,
  ChatContext,
  PromotedState,
  RequestContext,
  RetrievalHit,
  ToneTag,
} from '@chorus/shared';
import { Logger } from '../../logger.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { BackendRegistry } from '../../infrastructure/llm/backend-registry.js';
import { MemoryService } from '../../application/services/memory-service.js';
import { PersonaRegistry } from '../personas/persona-registry.js';
import { AppError, errorMessage } from '../errors/app-error.js';
import { isClockQuestion } from './text-classifiers.js';
import {
  cleanReplyText,
  extractActions,
  extractToneTag,
  speechText,
  stripDiagnosticTails,
} from './reply-sanitizer.js';
import {
  buildMemoryBlock,
  buildRetrievalBlock,
  buildTimeBlock,
  clockReply,
  composeSystemPrompt,
  readClock,
  renderChatContext,
} from './prompt-builder.js';

export interface PipelineRequest {
  sessionId: string;
  promoted: PromotedState;
  context?: RequestContext;
}

export interface PipelineResult {
  persona: string;
  reply: string;
  actions: Action[];
  tone?: ToneTag;
  /** Text for speech synthesis; keeps the tone tag. */
  speech: string;
}

const EMPTY_CONTEXT: ChatContext = { summary: '', messages: [] };

@singleton()
export class PersonaPipeline {
  private now: () => Date = () => new Date();

  constructor(
    @inject(PersonaRegistry) private personas: PersonaRegistry,
    @inject(BackendRegistry) private backends: BackendRegistry,
    @inject(MemoryService) private memory: MemoryService,
    @inject(ConfigService) private config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {}

  useClock(now: () => Date): this {
    this.now = now;
    return this;
  }

  /**
   * Clock questions are answered locally. Everything else builds the
   * prompt, calls the persona's backend and sanitizes the reply. History
   * writes never fail the run; backend errors do.
   */
  async run(persona: string, text: string, request: PipelineRequest): Promise<PipelineResult> {
    const definition = this.personas.get(persona);
    if (!definition) throw new AppError(`Unknown persona '${persona}'`, 400);
    const name = definition.name;

    if (isClockQuestion(text)) {
      const reply = clockReply(readClock(request.promoted.timezone, this.now()));
      await this.guardStore('record clock turn', name, request.sessionId, () =>
        this.memory.recordTurn(request.sessionId, name, text, reply),
      );
      return { persona: name, reply, actions: [], speech: reply };
    }

    const chat =
      (await this.guardStore('load chat context', name, request.sessionId, () =>
        this.memory.getChatContext(request.sessionId, name),
      )) ?? EMPTY_CONTEXT;
    const notes = await this.retrievedNotes(text, request.promoted);

    const systemPrompt = composeSystemPrompt(definition.systemPrompt, [
      buildTimeBlock(readClock(request.promoted.timezone, this.now())),
      buildMemoryBlock(request.promoted),
      buildRetrievalBlock(text, notes, this.config.get('retrieval').maxInjectChars),
      renderChatContext(chat),
    ]);

    // Recorded after the context is read so the current turn is not echoed twice.
    await this.guardStore('record user turn', name, request.sessionId, () =>
      this.memory.recordUserMessage(request.sessionId, name, text),
    );

    const raw = await this.backends.get(definition.backend).generate({
      systemPrompt,
      userText: text,
      context: request.context,
      model: definition.model,
      temperature: definition.temperature,
    });

    const { text: withoutActions, actions } = extractActions(raw);
    const { removed } = stripDiagnosticTails(withoutActions);
    if (removed.length > 0) {
      this.logger.info(
        { persona: name, removed: removed.map((r) => r.slice(0, 400)) },
        'Stripped debug context from reply',
      );
    }
    const { tone, text: reply } = extractToneTag(cleanReplyText(withoutActions));

    await this.guardStore('record reply', name, request.sessionId, () =>
      this.memory.recordReply(request.sessionId, name, reply),
    );

    return { persona: name, reply, actions, tone, speech: speechText(reply, tone) };
  }

  private async retrievedNotes(text: string, promoted: PromotedState): Promise<RetrievalHit[]> {
    if (!promoted.retrievalEnabled || !this.memory.retrievalAvailable()) return [];
    return this.memory.notesForPrompt(text);
  }

  private async guardStore<T>(
    operation: string,
    persona: string,
    sessionId: string,
    fn: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fn();
    } catch (err) {
      this.logger.warn({ persona, sessionId, err: errorMessage(err) }, `Memory store: ${operation} failed`);
      return undefined;
    }
  }
}
