export type SignalChannelKind = 'serial' | 'broker';

/**
 * A single notification to the companion system. Built at the dispatch
 * site and discarded once sent.
 */
export interface OutboundSignal {
    channel: SignalChannelKind;
    payload: string;
    // Broker only; the channel's configured topic is used when absent.
    topic?: string;
}

export interface ISignalChannel {
    readonly name: string;
    readonly kind: SignalChannelKind;
    start(): Promise<void>;
    stop(): Promise<void>;
    isConnected(): boolean;
    /**
     * Resolves `true` once the payload has been handed to the transport.
     * Implementations may reject; the dispatcher catches and classifies.
     */
    send(payload: string, topic?: string): Promise<boolean>;
}
