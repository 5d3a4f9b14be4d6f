import { EventEmitter } from 'events';
import type { DispatchResult, FilledSlot, OpenSlot } from '@cancelfill/shared-types';
import type { CancelFillError, DispatchError } from './errors';

type Events = {
    'slot-filled': (slot: FilledSlot) => void;
    'slot-unfilled': (slot: OpenSlot) => void;
    'dispatch-failed': (result: DispatchResult, failures: DispatchError[]) => void;
    'store-error': (error: CancelFillError, context: { operation: string; slotId?: string }) => void;
};

export class EngineEventEmitter extends EventEmitter {
    emit<T extends keyof Events>(event: T, ...args: Parameters<Events[T]>) {
        return super.emit(event, ...args);
    }

    on<T extends keyof Events>(event: T, listener: Events[T]) {
        return super.on(event, listener);
    }

    off<T extends keyof Events>(event: T, listener: Events[T]) {
        return super.off(event, listener);
    }
}

export const engineEvents = new EngineEventEmitter();
