import type { Listener, Unsubscribe } from '../types';
import type { EngineLogChannel, EngineLogger } from './engine-messages';
import { silentLogger } from './engine-messages';

/**
 * Ordered observer list. Listeners run in registration order; a listener
 * that throws is reported and the remaining listeners still run.
 */
export class EventChannel<E extends { type: string }> {
    private listeners: Listener<E>[] = [];

    constructor(
        private readonly channel: EngineLogChannel = 'SYSTEM',
        private readonly logger: EngineLogger = silentLogger
    ) { }

    subscribe(listener: Listener<E>): Unsubscribe {
        this.listeners = [...this.listeners, listener];
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    emit(event: E): void {
        // subscribe/unsubscribe replace the array, so this walk is stable.
        const snapshot = this.listeners;
        for (const listener of snapshot) {
            try {
                listener(event);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                this.logger.log('CRITICAL', this.channel, `Listener for ${event.type} threw: ${reason}`);
            }
        }
    }

    get size(): number {
        return this.listeners.length;
    }
}
