/**
 * Overlay datagram receiver with drain-to-latest semantics.
 * @module wire/receiver
 */
import {createSocket, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import {toTransportError} from '../core/errors';
import {MAX_RECEIVE, OVERLAY_PORT} from './constants';

/** Configuration for a datagram receiver. */
export type DatagramReceiverConfiguration = {
    /** UDP port to bind to. Defaults to 7777. */
    port?: number;
    /** Local IPv4 address to bind to. Defaults to `0.0.0.0`. */
    iface?: string;
    /** Allow multiple applications to bind to same UDP port. */
    reuseAddr?: boolean;
};

/** Source metadata of a received datagram. */
export type DatagramMeta = {
    sourceAddress: string;
    sourcePort: number;
    length: number;
};

/** Events emitted by DatagramReceiver. */
export interface DatagramReceiverEvents {
    /** Every datagram, before drain-to-latest. */
    datagram: [DatagramMeta];
    /** Socket errors after bind (`RECEIVE_FAILED`). */
    error: [Error];
}

/** Where the runtime pulls datagrams from. */
export type DatagramSource = {
    /** Bind. Rejects with `BIND_FAILED`. */
    listen(): Promise<void>;
    /**
     * Wait until a datagram is buffered or the timeout elapses.
     * @returns `true` when a datagram is available.
     */
    waitForDatagram(timeoutMs: number): Promise<boolean>;
    /** Take the most recent datagram, discarding the ones before it. */
    takeLatest(): Buffer | undefined;
    close(): Promise<void>;
};

/** Receive counters. */
export type ReceiverCounters = {
    received: number;
    /** Datagrams replaced by a newer one before being taken. */
    dropped: number;
};

/**
 * Receives overlay datagrams over UDP. Only the newest datagram is kept
 * between two `takeLatest` calls.
 */
export class DatagramReceiver extends EventEmitter<DatagramReceiverEvents> implements DatagramSource {
    private readonly socket: Socket;
    private readonly port: number;
    private readonly iface: string;
    private latest: Buffer | undefined;
    private waiter: ((ready: boolean) => void) | undefined;
    private timer: NodeJS.Timeout | undefined;
    private listening = false;
    private closed = false;
    private readonly counters: ReceiverCounters = {received: 0, dropped: 0};

    /**
     * Create a receiver. The socket is bound by `listen`.
     * @param config Socket configuration.
     */
    constructor({port = OVERLAY_PORT, iface = '0.0.0.0', reuseAddr = false}: DatagramReceiverConfiguration = {}) {
        super();
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new RangeError(`UDP port must be 0-65535, got ${port}`);
        }
        this.port = port;
        this.iface = iface;
        this.socket = createSocket({type: 'udp4', reuseAddr});

        this.socket.on('message', (msg, rinfo) => {
            this.counters.received++;
            if (this.latest) this.counters.dropped++;
            this.latest = msg.length > MAX_RECEIVE ? msg.subarray(0, MAX_RECEIVE) : msg;
            this.emit('datagram', {sourceAddress: rinfo.address, sourcePort: rinfo.port, length: msg.length});
            this.wake(true);
        });
    }

    public listen(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onBindError = (err: Error) => {
                reject(toTransportError('BIND_FAILED', err, {port: this.port, iface: this.iface}));
            };
            this.socket.once('error', onBindError);
            this.socket.bind({port: this.port, address: this.iface}, () => {
                this.socket.off('error', onBindError);
                this.socket.on('error', (err) => this.emit('error', toTransportError('RECEIVE_FAILED', err)));
                this.listening = true;
                resolve();
            });
        });
    }

    public waitForDatagram(timeoutMs: number): Promise<boolean> {
        if (this.latest) return Promise.resolve(true);
        if (this.closed) return Promise.resolve(false);
        this.wake(false);
        return new Promise<boolean>((resolve) => {
            this.waiter = resolve;
            this.timer = setTimeout(() => this.wake(false), Math.max(0, timeoutMs));
        });
    }

    public takeLatest(): Buffer | undefined {
        const latest = this.latest;
        this.latest = undefined;
        return latest;
    }

    /** `true` once bound. */
    public isListening(): boolean {
        return this.listening;
    }

    public stats(): ReceiverCounters {
        return {...this.counters};
    }

    /** Close the socket and release a pending wait. */
    public close(): Promise<void> {
        if (this.closed) return Promise.resolve();
        this.closed = true;
        this.wake(false);
        return new Promise<void>((resolve) => {
            this.socket.close(() => resolve());
        });
    }

    private wake(ready: boolean): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter?.(ready);
    }
}
