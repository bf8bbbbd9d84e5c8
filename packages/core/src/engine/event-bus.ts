// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { ChatEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: ChatEvent) => void;
}

/**
 * Typed event bus between the interaction loop and whatever renders it.
 * Listeners run synchronously, in emit order.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: ChatEvent): void {
    this.emit('event', event);
  }
}
