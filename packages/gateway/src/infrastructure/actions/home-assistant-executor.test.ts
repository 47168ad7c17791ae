import { describe, it, expect, vi, afterEach } from 'vitest';
import { HomeAssistantExecutor, toServiceCall } from './home-assistant-executor.js';
import { silentLogger } from '../../testing/fixtures.js';

const lightOn = {
  type: 'ha_call_service',
  data: { service: 'light.turn_on', entity_id: 'light.office', service_data: { brightness: 128 } },
};
const fanOff = {
  type: 'ha_call_service',
  data: { service: 'switch.turn_off', entity_id: 'switch.fan' },
};

describe('toServiceCall', () => {
  it('should build the service url and body', () => {
    expect(toServiceCall('http://ha.local:8123/', lightOn)).toEqual({
      url: 'http://ha.local:8123/api/services/light/turn_on',
      body: { entity_id: 'light.office', brightness: 128 },
    });
  });

  it('should explain why an action cannot be called', () => {
    expect(toServiceCall('http://ha.local', { type: 'play_music', data: {} })).toBe(
      "unsupported action type 'play_music'",
    );
    expect(
      toServiceCall('http://ha.local', {
        type: 'ha_call_service',
        data: { service: 'lighton', entity_id: 'light.office' },
      }),
    ).toBe("bad service format 'lighton'");
  });
});

describe('HomeAssistantExecutor', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should do nothing when not configured', async () => {
    const executor = new HomeAssistantExecutor({ timeoutMs: 1000 }, silentLogger());
    expect(executor.isEnabled()).toBe(false);
    expect(await executor.execute([lightOn])).toEqual([]);
  });

  it('should report each call independently', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce({ ok: true, status: 200 })
      .mockResolvedValueOnce({ ok: false, status: 500 });
    vi.stubGlobal('fetch', fetchMock);
    const executor = new HomeAssistantExecutor(
      { baseUrl: 'http://ha.local:8123', token: 'test-secret', timeoutMs: 1000 },
      silentLogger(),
    );

    const outcomes = await executor.execute([lightOn, fanOff, { type: 'noop', data: {} }]);

    expect(outcomes.map((o) => o.status)).toEqual(['ok', 'failed', 'skipped']);
    expect(outcomes[1].detail).toBe('switch.turn_off on switch.fan: HTTP 500');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      'http://ha.local:8123/api/services/light/turn_on',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ entity_id: 'light.office', brightness: 128 }),
      }),
    );
  });
});
