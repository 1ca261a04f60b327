/**
 * Registered extension session with a library core: one WebSocket, one browse cursor.
 */

import fs from 'node:fs';
import Joi from 'joi';
import {MooTransport} from './MooTransport';
import {MooMessage} from './MooProtocol';
import {
    BrowseClient,
    BrowseRequest,
    BrowseResult,
    browseResultSchema,
    LoadRequest,
    LoadResult,
    loadResultSchema,
    registrationReplySchema,
} from './RoonTypes';
import {LibraryBrowseError, LibraryConnectionError} from '../../../lib/errors';

const REGISTRY_INFO = 'com.roonlabs.registry:1/info';
const REGISTRY_REGISTER = 'com.roonlabs.registry:1/register';
const BROWSE_BROWSE = 'com.roonlabs.browse:1/browse';
const BROWSE_LOAD = 'com.roonlabs.browse:1/load';

export interface ExtensionInfo {
    extension_id: string;
    display_name: string;
    display_version: string;
    publisher: string;
    email: string;
}

export interface RoonSessionConfig {
    host: string;
    port: number;
    tokenFile: string;
    timeoutMs: number;
    extension: ExtensionInfo;
}

/** Minimal transport surface, so tests can drive a session without a socket. */
export interface MooChannel {
    request(name: string, body?: unknown, timeoutMs?: number): Promise<MooMessage>;
    close(): Promise<void>;
}

export type ChannelFactory = (url: string, timeoutMs: number) => Promise<MooChannel>;

function readToken(file: string): string | undefined {
    try {
        const token = fs.readFileSync(file, 'utf8').trim();
        return token || undefined;
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
        throw err;
    }
}

function validated<T>(schema: Joi.ObjectSchema<T>, message: MooMessage, what: string): T {
    const {error, value} = schema.validate(message.body, {abortEarly: false});
    if (error || value === undefined) {
        throw new LibraryBrowseError(`Unexpected ${what} reply: ${error?.message ?? 'empty body'}`, message.name);
    }
    return value;
}

export class RoonSession implements BrowseClient {
    private constructor(
        private readonly channel: MooChannel,
        readonly coreName: string,
    ) {
    }

    /**
     * Connect, register as an extension and persist the pairing token.
     * Registration only completes once the extension is enabled on the core.
     */
    static async open(config: RoonSessionConfig, connect: ChannelFactory = MooTransport.connect): Promise<RoonSession> {
        const url = `ws://${config.host}:${config.port}/api`;
        const channel = await connect(url, config.timeoutMs);
        try {
            await channel.request(REGISTRY_INFO);

            const token = readToken(config.tokenFile);
            const reply = await channel.request(REGISTRY_REGISTER, {
                ...config.extension,
                token,
                required_services: ['com.roonlabs.browse:1'],
                optional_services: [],
                provided_services: ['com.roonlabs.ping:1'],
            });
            if (reply.name !== 'Registered') {
                throw new LibraryConnectionError(`Registration refused by library core: ${reply.name}`);
            }

            const registration = validated(registrationReplySchema, reply, 'registration');
            if (registration.token !== token) {
                fs.writeFileSync(config.tokenFile, registration.token, 'utf8');
            }
            return new RoonSession(channel, registration.display_name);
        } catch (err) {
            await channel.close();
            throw err;
        }
    }

    async browse(request: BrowseRequest): Promise<BrowseResult> {
        const reply = await this.channel.request(BROWSE_BROWSE, request);
        if (reply.name !== 'Success') {
            throw new LibraryBrowseError(`Browse failed: ${reply.name}`, reply.name);
        }
        return validated(browseResultSchema, reply, 'browse');
    }

    async load(request: LoadRequest): Promise<LoadResult> {
        const reply = await this.channel.request(BROWSE_LOAD, request);
        if (reply.name !== 'Success') {
            throw new LibraryBrowseError(`Load failed: ${reply.name}`, reply.name);
        }
        return validated(loadResultSchema, reply, 'load');
    }

    async close(): Promise<void> {
        await this.channel.close();
    }
}
