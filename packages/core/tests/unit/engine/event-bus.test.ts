import { describe, expect, it, vi } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { WorkflowEvent } from '../../../src/types/events.js';
import type { Logger } from '../../../src/utils/logger.js';

function makeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('EventBus', () => {
  it('stamps an empty timestamp', () => {
    const bus = new EventBus();
    const received: WorkflowEvent[] = [];
    bus.on('event', (e) => received.push(e));

    bus.emitEvent({ type: 'handler.notify', runId: 'run_1', message: 'hi', timestamp: '' });

    const [event] = received;
    expect(event.type).toBe('handler.notify');
    expect(event.type === 'handler.notify' && event.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('keeps an existing timestamp', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on('event', listener);
    const event: WorkflowEvent = { type: 'handler.notify', runId: 'run_1', message: 'hi', timestamp: '2024-01-01T00:00:00.000Z' };
    bus.emitEvent(event);
    expect(listener).toHaveBeenCalledWith(event);
  });

  it('logs a throwing listener instead of propagating', () => {
    const logger = makeLogger();
    const bus = new EventBus(logger);
    bus.on('event', () => {
      throw new Error('listener broke');
    });

    expect(() =>
      bus.emitEvent({ type: 'step.output', runId: 'run_1', stepName: 's', stdout: 'x' }),
    ).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith('Event listener failed on step.output: listener broke');
  });
});
