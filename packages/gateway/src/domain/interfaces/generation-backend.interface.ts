import type { RequestContext } from '@chorus/shared';

export interface GenerationRequest {
  systemPrompt: string;
  userText: string;
  context?: RequestContext;
  model?: string;
  temperature?: number;
}

/**
 * A language-generation backend. Implementations throw `BackendError`
 * when they are not configured or the upstream call fails.
 */
export interface GenerationBackend {
  readonly name: string;
  isConfigured(): boolean;
  generate(request: GenerationRequest): Promise<string>;
}
