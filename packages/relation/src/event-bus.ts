/**
 * Sequential host event bus
 *
 * Delivers notifications to subscribed handlers one at a time: each event
 * is handled to completion, by every handler, before the next one starts.
 */

import { EventEmitter } from 'eventemitter3';
import { createChildLogger, isFatalError, wrapError, type ScrapeLinkError } from '@scrapelink/shared';
import { isRelationEvent, type HostEvent, type HostEventHandler } from './types.js';

export interface RelationEventBusEvents {
  'event:handled': (event: HostEvent) => void;
  'event:failed': (event: HostEvent, error: ScrapeLinkError) => void;
}

export class RelationEventBus extends EventEmitter<RelationEventBusEvents> {
  private handlers: HostEventHandler[] = [];
  private queue: HostEvent[] = [];
  private draining: Promise<void> | null = null;
  private logger = createChildLogger({ component: 'RelationEventBus' });

  /**
   * Register a handler. Returns a function that unregisters it.
   */
  subscribe(handler: HostEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((registered) => registered !== handler);
    };
  }

  /**
   * Queue an event. Resolves once the queue has drained, including any
   * events published while this one was being handled.
   */
  publish(event: HostEvent): Promise<void> {
    this.queue.push(event);
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  get pending(): number {
    return this.queue.length;
  }

  private async drain(): Promise<void> {
    let event = this.queue.shift();
    while (event) {
      await this.deliver(event);
      event = this.queue.shift();
    }
  }

  private async deliver(event: HostEvent): Promise<void> {
    for (const handler of [...this.handlers]) {
      try {
        await handler.handle(event);
      } catch (error) {
        const relationName = isRelationEvent(event) ? event.relationName : undefined;
        const wrapped = wrapError(error, { relationName });
        // One failed notification must not block the ones queued behind it
        const details = { kind: event.kind, relationName, code: wrapped.code, error: wrapped.message };
        if (isFatalError(wrapped)) {
          this.logger.fatal(details, 'Event handler failed on a setup error');
        } else {
          this.logger.error(details, 'Event handler failed');
        }
        this.emit('event:failed', event, wrapped);
      }
    }
    this.emit('event:handled', event);
  }
}
