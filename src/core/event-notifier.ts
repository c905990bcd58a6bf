import { EventEmitter } from 'events';
import { EcosystemEvent, EventNotifier } from '../types';

export const GLOBAL_CHANNEL = 'global:character_events';

export function ecosystemChannel(ecosystem_id: string): string {
  return `ecosystem:${ecosystem_id}:events`;
}

export type EcosystemListener = (event: EcosystemEvent) => void;

/**
 * In-process pub/sub. Every event (interactions and relationship type
 * changes) goes to its ecosystem channel and to the global monitoring
 * channel; a broker-backed notifier can replace it behind the EventNotifier
 * interface.
 */
export class EcosystemEventBus extends EventEmitter implements EventNotifier {
  notify(ecosystem_id: string, event: EcosystemEvent): void {
    this.emit(ecosystemChannel(ecosystem_id), event);
    this.emit(GLOBAL_CHANNEL, event);
  }

  subscribe(ecosystem_id: string, listener: EcosystemListener): () => void {
    const channel = ecosystemChannel(ecosystem_id);
    this.on(channel, listener);
    return () => {
      this.off(channel, listener);
    };
  }

  subscribeAll(listener: EcosystemListener): () => void {
    this.on(GLOBAL_CHANNEL, listener);
    return () => {
      this.off(GLOBAL_CHANNEL, listener);
    };
  }
}

export class NoopNotifier implements EventNotifier {
  notify(): void {
    // nothing subscribed
  }
}
