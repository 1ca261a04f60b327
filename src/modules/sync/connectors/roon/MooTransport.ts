/**
 * Request/response channel to the library core over a WebSocket.
 * Answers the core's keep-alive pings and matches replies to requests by Request-Id.
 */

import WebSocket from 'ws';
import {decodeMoo, encodeMoo, MooMessage} from './MooProtocol';
import {LibraryConnectionError} from '../../../lib/errors';
import {errorMessage} from '../../../lib/util';

const PING_METHOD = 'com.roonlabs.ping:1/ping';

interface PendingRequest {
    name: string;
    resolve: (message: MooMessage) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (Array.isArray(data)) return Buffer.concat(data);
    return Buffer.from(data);
}

export class MooTransport {
    private nextRequestId = 0;
    private readonly pending = new Map<number, PendingRequest>();
    private closed = false;

    private constructor(private readonly socket: WebSocket, private readonly timeoutMs: number) {
        socket.on('message', (data) => this.onMessage(toBuffer(data)));
        socket.on('close', () => this.shutdown(new LibraryConnectionError('Connection to library core closed')));
        socket.on('error', (err) => this.shutdown(new LibraryConnectionError(`Library core socket error: ${err.message}`)));
    }

    static connect(url: string, timeoutMs: number): Promise<MooTransport> {
        return new Promise((resolve, reject) => {
            const socket = new WebSocket(url, {handshakeTimeout: timeoutMs});
            const onError = (err: Error) => {
                socket.removeAllListeners();
                reject(new LibraryConnectionError(`Could not connect to ${url}: ${err.message}`));
            };
            socket.once('error', onError);
            socket.once('open', () => {
                socket.off('error', onError);
                resolve(new MooTransport(socket, timeoutMs));
            });
        });
    }

    get isOpen(): boolean {
        return !this.closed;
    }

    /**
     * Send a request and resolve with the first reply (COMPLETE or CONTINUE).
     */
    request(name: string, body?: unknown, timeoutMs: number = this.timeoutMs): Promise<MooMessage> {
        if (this.closed) {
            return Promise.reject(new LibraryConnectionError('Library core connection is closed'));
        }
        const requestId = this.nextRequestId++;
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(requestId);
                reject(new LibraryConnectionError(`Timed out waiting for ${name}`));
            }, timeoutMs);
            this.pending.set(requestId, {name, resolve, reject, timer});
            this.socket.send(encodeMoo('REQUEST', name, requestId, body), (err) => {
                if (!err) return;
                clearTimeout(timer);
                this.pending.delete(requestId);
                reject(new LibraryConnectionError(`Failed to send ${name}: ${err.message}`));
            });
        });
    }

    async close(): Promise<void> {
        this.shutdown(new LibraryConnectionError('Library core connection closed by client'));
        if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
            this.socket.close();
        }
    }

    private onMessage(data: Buffer): void {
        let message: MooMessage;
        try {
            message = decodeMoo(data);
        } catch (err) {
            console.warn(`⚠️  Ignoring malformed frame from library core: ${errorMessage(err)}`);
            return;
        }

        if (message.verb === 'REQUEST') {
            this.answer(message);
            return;
        }

        const pending = this.pending.get(message.requestId);
        if (!pending) return; // late CONTINUE of a subscription, or timed out
        clearTimeout(pending.timer);
        this.pending.delete(message.requestId);
        pending.resolve(message);
    }

    private answer(message: MooMessage): void {
        const reply = message.name === PING_METHOD
            ? encodeMoo('COMPLETE', 'Success', message.requestId)
            : encodeMoo('COMPLETE', 'InvalidRequest', message.requestId, {error: `unsupported: ${message.name}`});
        this.socket.send(reply, (err) => {
            if (err) console.warn(`⚠️  Could not answer ${message.name}: ${err.message}`);
        });
    }

    private shutdown(reason: Error): void {
        this.closed = true;
        for (const [id, pending] of this.pending) {
            clearTimeout(pending.timer);
            pending.reject(reason);
            this.pending.delete(id);
        }
    }
}
