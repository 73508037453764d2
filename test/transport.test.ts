import {EventEmitter} from 'events';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {DatagramReceiver, OverlayError, OverlaySender} from '../src';

type SentPacket = {payload: string; port: number; host: string};

class MockSocket extends EventEmitter {
    public bindConfig: unknown = null;
    public broadcast = false;
    public closed = false;
    public readonly sent: SentPacket[] = [];
    public bindError: Error | undefined;
    public sendError: Error | undefined;

    public bind(config: unknown, callback?: () => void): void {
        this.bindConfig = config;
        if (this.bindError) {
            this.emit('error', this.bindError);
            return;
        }
        callback?.();
    }

    public setBroadcast(flag: boolean): void {
        this.broadcast = flag;
    }

    public send(packet: Buffer, port: number, host: string, callback: (err: Error | null) => void): void {
        if (this.sendError) {
            callback(this.sendError);
            return;
        }
        this.sent.push({payload: packet.toString('utf8'), port, host});
        callback(null);
    }

    public close(callback?: () => void): void {
        this.closed = true;
        callback?.();
    }
}

const sockets: MockSocket[] = [];

vi.mock('dgram', () => ({
    createSocket: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        return socket;
    }),
}));

const socketAt = (index: number): MockSocket => {
    const socket = sockets[index];
    if (!socket) throw new Error(`no socket #${index}`);
    return socket;
};

const deliver = (socket: MockSocket, text: string): void => {
    socket.emit('message', Buffer.from(text, 'utf8'), {address: '127.0.0.1', port: 42000});
};

beforeEach(() => {
    sockets.length = 0;
});

afterEach(() => {
    vi.useRealTimers();
    for (const socket of sockets) {
        socket.removeAllListeners();
    }
});

describe('DatagramReceiver', () => {
    it('binds to the configured port', async () => {
        const receiver = new DatagramReceiver({port: 9000, iface: '127.0.0.1'});
        await receiver.listen();

        expect(socketAt(0).bindConfig).toEqual({port: 9000, address: '127.0.0.1'});
        expect(receiver.isListening()).toBe(true);
        await receiver.close();
    });

    it('validates the port', () => {
        expect(() => new DatagramReceiver({port: 70000})).toThrow(RangeError);
    });

    it('keeps only the newest datagram of a burst', async () => {
        const receiver = new DatagramReceiver();
        await receiver.listen();
        const socket = socketAt(0);

        deliver(socket, '{"values":[0.1]}');
        deliver(socket, '{"values":[0.2]}');
        deliver(socket, '{"values":[0.3]}');

        expect(receiver.takeLatest()?.toString('utf8')).toBe('{"values":[0.3]}');
        expect(receiver.takeLatest()).toBeUndefined();
        expect(receiver.stats()).toEqual({received: 3, dropped: 2});
        await receiver.close();
    });

    it('wakes a pending wait when a datagram arrives', async () => {
        const receiver = new DatagramReceiver();
        await receiver.listen();

        const ready = receiver.waitForDatagram(1000);
        deliver(socketAt(0), '{"texts":["a"]}');

        await expect(ready).resolves.toBe(true);
        expect(receiver.takeLatest()?.toString('utf8')).toBe('{"texts":["a"]}');
        await receiver.close();
    });

    it('returns right away when a datagram is already buffered', async () => {
        const receiver = new DatagramReceiver();
        await receiver.listen();
        deliver(socketAt(0), '{}');

        await expect(receiver.waitForDatagram(1000)).resolves.toBe(true);
        await receiver.close();
    });

    it('gives up after the timeout', async () => {
        vi.useFakeTimers();
        const receiver = new DatagramReceiver();
        await receiver.listen();

        const ready = receiver.waitForDatagram(50);
        vi.advanceTimersByTime(50);

        await expect(ready).resolves.toBe(false);
        await receiver.close();
    });

    it('releases a pending wait on close', async () => {
        const receiver = new DatagramReceiver();
        await receiver.listen();

        const ready = receiver.waitForDatagram(1000);
        await receiver.close();

        await expect(ready).resolves.toBe(false);
        expect(socketAt(0).closed).toBe(true);
    });

    it('rejects listen when the port cannot be bound', async () => {
        const receiver = new DatagramReceiver({port: 7777});
        socketAt(0).bindError = new Error('EADDRINUSE');

        await expect(receiver.listen()).rejects.toMatchObject({
            domain: 'transport',
            code: 'BIND_FAILED',
            message: 'Failed to bind overlay socket: EADDRINUSE',
        });
    });

    it('reports socket errors after bind as receive errors', async () => {
        const receiver = new DatagramReceiver();
        await receiver.listen();
        const errors: Error[] = [];
        receiver.on('error', (err) => errors.push(err));

        socketAt(0).emit('error', new Error('ECONNREFUSED'));

        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(OverlayError);
        expect(errors[0]).toMatchObject({code: 'RECEIVE_FAILED'});
        await receiver.close();
    });
});

describe('OverlaySender', () => {
    it('encodes and sends to localhost by default', async () => {
        const sender = new OverlaySender();

        await sender.send({values: [0.9], assetUpdates: [{id: 2, label: 'cpu'}]});

        expect(socketAt(0).sent).toEqual([
            {payload: '{"values":[0.9],"asset_updates":[{"id":2,"label":"cpu"}]}', port: 7777, host: '127.0.0.1'},
        ]);
        sender.close();
        expect(socketAt(0).closed).toBe(true);
    });

    it('sends raw payloads to a configured target', async () => {
        const sender = new OverlaySender({host: '10.0.0.5', port: 9000, broadcast: true});

        await sender.sendRaw(Buffer.from('{"texts":["x"]}'));

        expect(socketAt(0).broadcast).toBe(true);
        expect(socketAt(0).sent).toEqual([{payload: '{"texts":["x"]}', port: 9000, host: '10.0.0.5'}]);
        sender.close();
    });

    it('rejects with a send error', async () => {
        const sender = new OverlaySender();
        socketAt(0).sendError = new Error('ENETUNREACH');

        await expect(sender.send({values: [1]})).rejects.toMatchObject({
            code: 'SEND_FAILED',
            message: 'Failed to send overlay datagram: ENETUNREACH',
            details: {host: '127.0.0.1', port: 7777},
        });
        sender.close();
    });

    it('refuses oversized payloads before sending', async () => {
        const sender = new OverlaySender();

        await expect(sender.send({texts: new Array<string>(16).fill('z'.repeat(96))})).rejects.toMatchObject({
            code: 'PAYLOAD_TOO_LARGE',
        });
        expect(socketAt(0).sent).toEqual([]);
        sender.close();
    });
});
