import { LifecycleEvent } from '../models';

/**
 * Fire-and-forget sink for lifecycle events
 */
export interface IEventSink {
    publish(event: LifecycleEvent): void;
}
