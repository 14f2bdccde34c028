import type { RelaySocket, SocketFactory, SocketHandlers } from '@/lib/nostr/relay';

/**
 * In-process stand-in for a relay socket. Frames sent by the client are
 * recorded; the test drives open/receive/drop by hand.
 */
export class FakeSocket implements RelaySocket {
    readonly sent: unknown[][] = [];
    closed = false;

    constructor(readonly url: string, private readonly handlers: SocketHandlers) {}

    send(data: string): void {
        const frame: unknown = JSON.parse(data);
        if (Array.isArray(frame)) {
            this.sent.push(frame);
        }
    }

    close(): void {
        this.closed = true;
    }

    open(): void {
        this.handlers.onOpen();
    }

    receive(frame: unknown[]): void {
        this.handlers.onMessage(JSON.stringify(frame));
    }

    drop(): void {
        this.handlers.onError(new Error('connection reset'));
        this.handlers.onClose();
    }

    framesOfType(type: string): unknown[][] {
        return this.sent.filter((f) => f[0] === type);
    }
}

export class FakeRelayNetwork {
    readonly sockets: FakeSocket[] = [];

    readonly factory: SocketFactory = (url, handlers) => {
        const socket = new FakeSocket(url, handlers);
        this.sockets.push(socket);
        return socket;
    };

    socketsFor(url: string): FakeSocket[] {
        return this.sockets.filter((s) => s.url === url);
    }

    latest(url: string): FakeSocket {
        const sockets = this.socketsFor(url);
        const socket = sockets[sockets.length - 1];
        if (!socket) {
            throw new Error(`No socket opened for ${url}`);
        }
        return socket;
    }
}
