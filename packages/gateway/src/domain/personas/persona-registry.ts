/**
 * @file packages/gateway/src/domain/personas/persona-registry.ts
 * @description Closed set of configured personas, looked up by name or alias.
 */

import type { HubConfig, PersonaDefinition } from '@chorus/shared';
import { AppError } from '../errors/app-error.js';

/**
 * Word-level view of the registry used by the text classifiers.
 */
export interface PersonaLexicon {
  /** Every name and alias, lowercased. */
  terms(): string[];
  /** Maps a name or alias to the canonical persona name. */
  canonical(term: string): string | undefined;
}

/**
 * Encapsulates persona registry behavior.
 */
export class PersonaRegistry implements PersonaLexicon {
  private readonly byTerm = new Map<string, PersonaDefinition>();

  constructor(
    private readonly personas: PersonaDefinition[],
    private readonly defaultName: string,
  ) {
    for (const persona of personas) {
      for (const term of [persona.name, ...persona.aliases]) {
        const key = term.trim().toLowerCase();
        const existing = this.byTerm.get(key);
        if (existing && existing.name !== persona.name) {
          throw new AppError(
            `Persona term '${key}' is claimed by both '${existing.name}' and '${persona.name}'`,
            500,
            false,
          );
        }
        this.byTerm.set(key, persona);
      }
    }
    if (!this.byTerm.has(defaultName.toLowerCase())) {
      throw new AppError(`Default persona '${defaultName}' is not configured`, 500, false);
    }
  }

  static fromConfig(config: HubConfig): PersonaRegistry {
    return new PersonaRegistry(config.personas, config.defaultPersona);
  }

  /** Personas in configured order. */
  list(): PersonaDefinition[] {
    return [...this.personas];
  }

  names(): string[] {
    return this.personas.map((p) => p.name);
  }

  get(nameOrAlias: string): PersonaDefinition | undefined {
    return this.byTerm.get(nameOrAlias.trim().toLowerCase());
  }

  defaultPersona(): PersonaDefinition {
    const persona = this.get(this.defaultName);
    if (!persona) {
      throw new AppError(`Default persona '${this.defaultName}' is not configured`, 500, false);
    }
    return persona;
  }

  terms(): string[] {
    return [...this.byTerm.keys()];
  }

  canonical(term: string): string | undefined {
    return this.get(term)?.name;
  }
}
