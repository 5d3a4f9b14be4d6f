import type { EngineConfig } from '../config/engine-config';
import type { NotificationChannel } from '../channels/notification-channel';
import type { DocumentStore } from '../store/document-store';
import { createEngineRecords, type EngineRecords } from '../store/record-collection';
import { engineEvents, type EngineEventEmitter } from '../utils/error-emitter';
import { systemClock, type Clock } from '../utils/date-utils';
import { BackgroundTasks } from './background-tasks';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface NotificationChannels {
    sms: NotificationChannel;
    email: NotificationChannel;
}

/**
 * Everything a service call needs. The context holds collaborators only; all
 * engine state lives in the store.
 */
export interface EngineContext {
    store: DocumentStore;
    records: EngineRecords;
    config: EngineConfig;
    channels: NotificationChannels;
    clock: Clock;
    sleep: Sleep;
    events: EngineEventEmitter;
    background: BackgroundTasks;
}

export interface EngineContextOptions {
    store: DocumentStore;
    config: EngineConfig;
    channels: NotificationChannels;
    clock?: Clock;
    sleep?: Sleep;
    events?: EngineEventEmitter;
}

export function createEngineContext(options: EngineContextOptions): EngineContext {
    return {
        store: options.store,
        records: createEngineRecords(options.store),
        config: options.config,
        channels: options.channels,
        clock: options.clock ?? systemClock,
        sleep: options.sleep ?? realSleep,
        events: options.events ?? engineEvents,
        background: new BackgroundTasks(),
    };
}
