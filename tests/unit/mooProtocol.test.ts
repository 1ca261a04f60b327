/**
 * Unit tests for MOO/1 framing and the WebSocket transport
 */

import {WebSocketServer} from 'ws';
import {decodeMoo, encodeMoo, MooParseError} from '../../src/modules/sync/connectors/roon/MooProtocol';
import {MooTransport} from '../../src/modules/sync/connectors/roon/MooTransport';
import {LibraryConnectionError} from '../../src/modules/lib/errors';

describe('encodeMoo', () => {
    test('writes headers and a JSON body', () => {
        const frame = encodeMoo('REQUEST', 'com.roonlabs.browse:1/load', 7, {offset: 0});

        expect(frame.toString('utf8')).toBe(
            'MOO/1 REQUEST com.roonlabs.browse:1/load\n' +
            'Request-Id: 7\n' +
            'Content-Length: 12\n' +
            'Content-Type: application/json\n' +
            '\n' +
            '{"offset":0}',
        );
    });

    test('omits body headers when there is no body', () => {
        expect(encodeMoo('COMPLETE', 'Success', 3).toString('utf8')).toBe('MOO/1 COMPLETE Success\nRequest-Id: 3\n\n');
    });

    test('counts Content-Length in bytes', () => {
        const frame = encodeMoo('COMPLETE', 'Success', 1, {title: 'Sigur Rós'});

        expect(frame.toString('utf8')).toContain('Content-Length: 22\n');
    });
});

describe('decodeMoo', () => {
    test('reads verb, name, request id and body', () => {
        const message = decodeMoo(
            'MOO/1 COMPLETE Success\nRequest-Id: 12\nContent-Length: 17\nContent-Type: application/json\n\n{"action":"list"}',
        );

        expect(message.verb).toBe('COMPLETE');
        expect(message.name).toBe('Success');
        expect(message.requestId).toBe(12);
        expect(message.body).toEqual({action: 'list'});
    });

    test('reads no more than Content-Length bytes of body', () => {
        const message = decodeMoo('MOO/1 COMPLETE Success\nRequest-Id: 2\nContent-Length: 2\nContent-Type: application/json\n\n{}trailing');

        expect(message.body).toEqual({});
    });

    test('decodes what encodeMoo writes', () => {
        const body = {items: [{title: 'Animals', item_key: '7:1'}], offset: 0};

        const message = decodeMoo(encodeMoo('CONTINUE', 'Changed', 4, body));

        expect(message).toEqual({
            verb: 'CONTINUE',
            name: 'Changed',
            requestId: 4,
            headers: {'Request-Id': '4', 'Content-Length': String(JSON.stringify(body).length), 'Content-Type': 'application/json'},
            body,
        });
    });

    test('returns a null body for header-only frames', () => {
        expect(decodeMoo('MOO/1 REQUEST com.roonlabs.ping:1/ping\nRequest-Id: 0\n\n').body).toBeNull();
    });

    test.each([
        {description: 'missing header terminator', frame: 'MOO/1 COMPLETE Success\nRequest-Id: 1\n', message: 'Frame has no header terminator'},
        {description: 'wrong protocol line', frame: 'HTTP/1.1 200 OK\nRequest-Id: 1\n\n', message: 'Bad first line: HTTP/1.1 200 OK'},
        {description: 'missing request id', frame: 'MOO/1 COMPLETE Success\nContent-Type: application/json\n\n', message: 'Missing Request-Id header'},
        {description: 'invalid JSON body', frame: 'MOO/1 COMPLETE Success\nRequest-Id: 1\nContent-Type: application/json\n\n{oops', message: 'Body is not valid JSON'},
    ])('rejects $description', ({frame, message}) => {
        expect(() => decodeMoo(frame)).toThrow(MooParseError);
        expect(() => decodeMoo(frame)).toThrow(message);
    });
});

describe('MooTransport', () => {
    let server: WebSocketServer;
    let url: string;

    beforeEach(async () => {
        server = new WebSocketServer({port: 0});
        await new Promise<void>((resolve) => server.once('listening', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server has no port');
        url = `ws://127.0.0.1:${address.port}/api`;
    });

    afterEach(async () => {
        for (const client of server.clients) client.terminate();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    test('matches replies to requests by id', async () => {
        server.on('connection', (socket) => {
            socket.on('message', (data) => {
                const request = decodeMoo(Buffer.from(data.toString()));
                socket.send(encodeMoo('COMPLETE', 'Success', request.requestId, {echo: request.name}));
            });
        });
        const transport = await MooTransport.connect(url, 1000);

        const reply = await transport.request('com.roonlabs.registry:1/info');

        expect(reply.name).toBe('Success');
        expect(reply.body).toEqual({echo: 'com.roonlabs.registry:1/info'});
        await transport.close();
        expect(transport.isOpen).toBe(false);
    });

    test('answers pings from the core', async () => {
        const pong = new Promise<string>((resolve) => {
            server.on('connection', (socket) => {
                socket.on('message', (data) => resolve(data.toString()));
                socket.send(encodeMoo('REQUEST', 'com.roonlabs.ping:1/ping', 99));
            });
        });
        const transport = await MooTransport.connect(url, 1000);

        expect(await pong).toBe('MOO/1 COMPLETE Success\nRequest-Id: 99\n\n');
        await transport.close();
    });

    test('rejects pending requests when the connection drops', async () => {
        server.on('connection', (socket) => {
            socket.on('message', () => socket.terminate());
        });
        const transport = await MooTransport.connect(url, 1000);

        await expect(transport.request('com.roonlabs.browse:1/browse', {hierarchy: 'browse'}))
            .rejects.toBeInstanceOf(LibraryConnectionError);
        expect(transport.isOpen).toBe(false);
    });

    test('fails to connect with LibraryConnectionError', async () => {
        await expect(MooTransport.connect('ws://127.0.0.1:1/api', 500)).rejects.toBeInstanceOf(LibraryConnectionError);
    });
});
