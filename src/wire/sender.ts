/**
 * Overlay datagram sender.
 * @module wire/sender
 */
import {createSocket, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import {toTransportError} from '../core/errors';
import {OVERLAY_PORT} from './constants';
import {buildDatagram, type DatagramOptions} from './packet';

export type OverlaySenderConfiguration = {
    /** Destination host. Defaults to `127.0.0.1`. */
    host?: string;
    /** Destination UDP port. Defaults to 7777. */
    port?: number;
    /** Local interface/bind address. */
    bindAddress?: string;
    /** Enable socket broadcast mode. */
    broadcast?: boolean;
};

export interface OverlaySenderEvents {
    /** Low-level socket errors. */
    error: [Error];
}

/** Sends overlay datagrams to a running overlay. */
export class OverlaySender extends EventEmitter<OverlaySenderEvents> {
    private readonly socket: Socket;
    private readonly config: OverlaySenderConfiguration;

    /**
     * Create an overlay sender.
     * @param config Transport configuration.
     */
    constructor(config: OverlaySenderConfiguration = {}) {
        super();
        this.config = config;
        this.socket = createSocket('udp4');
        this.socket.on('error', (err) => this.emit('error', err));
        if (config.broadcast) {
            this.socket.setBroadcast(true);
        }
        if (config.bindAddress) {
            this.socket.bind({address: config.bindAddress});
        }
    }

    /**
     * Encode and send one datagram.
     * @throws OverlayError `PAYLOAD_TOO_LARGE` before anything is sent.
     */
    public async send(options: DatagramOptions): Promise<void> {
        await this.sendRaw(buildDatagram(options));
    }

    /** Send a pre-built payload as is. */
    public async sendRaw(data: Uint8Array | Buffer): Promise<void> {
        const host = this.config.host ?? '127.0.0.1';
        const port = this.config.port ?? OVERLAY_PORT;
        const payload = Buffer.from(data);
        await new Promise<void>((resolve, reject) => {
            this.socket.send(payload, port, host, (err) => {
                if (err) reject(toTransportError('SEND_FAILED', err, {host, port}));
                else resolve();
            });
        });
    }

    /** Close the UDP socket. */
    public close(): void {
        this.socket.close();
    }
}
