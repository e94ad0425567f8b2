// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { WorkflowEvent } from '../types/events.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

interface EventBusEvents {
  event: (event: WorkflowEvent) => void;
}

/**
 * Typed event bus for workflow engine events.
 * A listener that throws is logged and does not interrupt the run.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  constructor(protected readonly logger?: Logger) {
    super();
  }

  /** Emit a typed event, stamping `timestamp` when the event has an empty one. */
  emitEvent(event: WorkflowEvent): void {
    const stamped =
      'timestamp' in event && !event.timestamp
        ? { ...event, timestamp: new Date().toISOString() }
        : event;
    try {
      this.emit('event', stamped);
    } catch (err) {
      this.logger?.warn(`Event listener failed on ${event.type}: ${errorMessage(err)}`);
    }
  }
}
