import { EventEmitter } from 'events';
import { IEventSink } from './interfaces/event-interface';
import { LifecycleEvent } from './models';

type EventOf<T extends LifecycleEvent['type']> = Extract<LifecycleEvent, { type: T }>;

/**
 * In-process multicast of lifecycle events
 */
export class EventHub implements IEventSink {
    private readonly emitter = new EventEmitter();

    publish(event: LifecycleEvent): void {
        this.emitter.emit(event.type, event);
    }

    /**
     * Returns a function that removes the listener
     */
    subscribe<T extends LifecycleEvent['type']>(type: T, listener: (event: EventOf<T>) => void): () => void {
        this.emitter.on(type, listener);
        return () => {
            this.emitter.off(type, listener);
        };
    }
}
