/**
 * Browse service payloads and the client contract the connector depends on.
 */

import Joi from 'joi';

export interface BrowseItem {
    title: string;
    subtitle?: string | null;
    image_key?: string | null;
    item_key?: string | null;
    hint?: string | null;
}

export interface BrowseList {
    title?: string;
    count: number;
    level?: number;
}

export interface BrowseRequest {
    hierarchy: 'browse';
    pop_all?: boolean;
    item_key?: string;
}

export interface LoadRequest {
    hierarchy: 'browse';
    offset: number;
    count: number;
}

export interface BrowseResult {
    action: string;
    list?: BrowseList;
}

export interface LoadResult {
    items: BrowseItem[];
    offset: number;
    list: BrowseList;
}

/**
 * An open browse session against the library core.
 */
export interface BrowseClient {
    readonly coreName: string;
    browse(request: BrowseRequest): Promise<BrowseResult>;
    load(request: LoadRequest): Promise<LoadResult>;
    close(): Promise<void>;
}

export interface RegistrationReply {
    core_id: string;
    display_name: string;
    token: string;
}

const browseListSchema = Joi.object<BrowseList>({
    title: Joi.string().allow(''),
    count: Joi.number().integer().min(0).required(),
    level: Joi.number().integer(),
}).unknown(true);

export const browseItemSchema = Joi.object<BrowseItem>({
    title: Joi.string().allow('').required(),
    subtitle: Joi.string().allow('', null),
    image_key: Joi.string().allow('', null),
    item_key: Joi.string().allow('', null),
    hint: Joi.string().allow('', null),
}).unknown(true);

export const browseResultSchema = Joi.object<BrowseResult>({
    action: Joi.string().required(),
    list: browseListSchema,
}).unknown(true);

export const loadResultSchema = Joi.object<LoadResult>({
    items: Joi.array().items(browseItemSchema).required(),
    offset: Joi.number().integer().min(0).default(0),
    list: browseListSchema.required(),
}).unknown(true);

export const registrationReplySchema = Joi.object<RegistrationReply>({
    core_id: Joi.string().required(),
    display_name: Joi.string().allow('').required(),
    token: Joi.string().required(),
}).unknown(true);
