import { EventEmitter } from "node:events";

import type { LifecycleChangedEvent, PresenceChangedEvent } from "@/types";

export type EngineEventMap = {
    "lifecycle.changed": LifecycleChangedEvent;
    "presence.changed": PresenceChangedEvent;
};

export type EngineEventType = keyof EngineEventMap;

export type EngineEvent = {
    [TType in EngineEventType]: {
        type: TType;
        payload: EngineEventMap[TType];
        timestamp: string;
    };
}[EngineEventType];

export type EngineEventListener = (event: EngineEvent) => void;

/**
 * In-process fan-out of engine events. Listeners run synchronously in emit order.
 */
export class EngineEventBus {
    private readonly emitter = new EventEmitter();

    constructor() {
        this.emitter.setMaxListeners(0);
    }

    onEvent(listener: EngineEventListener): () => void {
        this.emitter.on("event", listener);
        return () => {
            this.emitter.off("event", listener);
        };
    }

    emit<TType extends EngineEventType>(type: TType, payload: EngineEventMap[TType]): void {
        this.emitter.emit("event", { type, payload, timestamp: new Date().toISOString() });
    }
}
