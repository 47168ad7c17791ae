/**
 * @file packages/gateway/src/infrastructure/actions/home-assistant-executor.ts
 * @description Executes `ha_call_service` actions against the Home Assistant REST API.
 */

import type { Action, HubConfig } from '@chorus/shared';
import type {
  ActionExecutor,
  ActionOutcome,
} from '../../domain/interfaces/action-executor.interface.js';
import { errorMessage } from '../../domain/errors/app-error.js';
import { Logger } from '../../logger.js';

export const HA_CALL_SERVICE = 'ha_call_service';

type HomeAssistantSettings = HubConfig['homeAssistant'];

interface ServiceCall {
  url: string;
  body: Record<string, unknown>;
}

/**
 * Maps an action to its service call, or explains why it cannot be made.
 */
export function toServiceCall(baseUrl: string, action: Action): ServiceCall | string {
  if (action.type !== HA_CALL_SERVICE) return `unsupported action type '${action.type}'`;

  const { service, entity_id: entityId, service_data: serviceData } = action.data;
  if (typeof service !== 'string' || !service || typeof entityId !== 'string' || !entityId) {
    return 'service and entity_id are required';
  }
  const dot = service.indexOf('.');
  if (dot <= 0 || dot === service.length - 1) return `bad service format '${service}'`;

  const body: Record<string, unknown> = { entity_id: entityId };
  if (typeof serviceData === 'object' && serviceData !== null && !Array.isArray(serviceData)) {
    Object.assign(body, serviceData);
  }
  return {
    url: `${baseUrl.replace(/\/+$/, '')}/api/services/${service.slice(0, dot)}/${service.slice(dot + 1)}`,
    body,
  };
}

export class HomeAssistantExecutor implements ActionExecutor {
  constructor(
    private readonly settings: HomeAssistantSettings,
    private readonly logger: Logger,
  ) {}

  isEnabled(): boolean {
    return Boolean(this.settings.baseUrl && this.settings.token);
  }

  async execute(actions: Action[]): Promise<ActionOutcome[]> {
    const baseUrl = this.settings.baseUrl;
    if (!baseUrl || !this.settings.token || actions.length === 0) return [];

    const outcomes: ActionOutcome[] = [];
    for (const action of actions) {
      const call = toServiceCall(baseUrl, action);
      if (typeof call === 'string') {
        this.logger.debug({ action: action.type, reason: call }, 'Skipped action');
        outcomes.push({ action, status: 'skipped', detail: call });
        continue;
      }
      try {
        const res = await fetch(call.url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.settings.token}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(call.body),
          signal: AbortSignal.timeout(this.settings.timeoutMs),
        });
        if (!res.ok) throw new Error(`HTTP ${res.status}`);
        outcomes.push({ action, status: 'ok' });
      } catch (err) {
        const detail = `${String(action.data.service)} on ${String(action.data.entity_id)}: ${errorMessage(err)}`;
        this.logger.warn({ detail }, 'Home Assistant call failed');
        outcomes.push({ action, status: 'failed', detail });
      }
    }
    return outcomes;
  }
}
