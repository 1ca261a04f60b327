/**
 * Catalog API payloads. Only the fields the sync reads are declared; everything
 * else is allowed through.
 */

import Joi from 'joi';
import type {FetchError} from '../../../lib/errors';

export interface NamedEntry {
    name: string;
    role?: string;
}

export interface Pagination {
    page: number;
    pages: number;
    per_page?: number;
    items?: number;
}

export interface ListingPage {
    pagination: Pagination;
    releases?: unknown[];
    wants?: unknown[];
}

export interface BasicInformation {
    id?: number;
    title?: string;
    year?: number | null;
    thumb?: string | null;
    cover_image?: string | null;
    artists?: NamedEntry[];
    labels?: NamedEntry[];
    formats?: NamedEntry[];
}

export interface CollectionNote {
    field_id: number;
    value: string;
}

export interface CollectionEntry {
    id: number;
    instance_id?: number | null;
    folder_id?: number | null;
    rating?: number | null;
    date_added?: string | null;
    basic_information: BasicInformation;
    notes?: CollectionNote[];
}

export interface WantEntry {
    id: number;
    date_added?: string | null;
    notes?: string | null;
    basic_information: BasicInformation;
}

export interface PriceSuggestion {
    value: number;
    currency?: string;
}

export interface StatsPayload {
    lowest_price?: PriceSuggestion | null;
    num_for_sale?: number | null;
    blocked_from_sale?: boolean;
}

export interface TracklistEntry {
    position?: string;
    title?: string;
    duration?: string;
    type_?: string;
    artists?: NamedEntry[];
    extraartists?: NamedEntry[];
}

export interface ReleasePayload {
    id?: number;
    tracklist?: TracklistEntry[];
}

/** Outcome of a best-effort secondary call. */
export type FetchResult<T> = {ok: true; value: T} | {ok: false; error: FetchError};

/** Result of a paged listing. `complete` is false when paging stopped early. */
export interface Listing<T> {
    items: T[];
    complete: boolean;
    pages: number;
    /** Items dropped because they failed validation. */
    skipped: number;
}

const namedEntrySchema = Joi.object<NamedEntry>({
    name: Joi.string().allow('').required(),
    role: Joi.string().allow(''),
}).unknown(true);

const basicInformationSchema = Joi.object<BasicInformation>({
    id: Joi.number().integer(),
    title: Joi.string().allow(''),
    year: Joi.number().integer().allow(null),
    thumb: Joi.string().allow('', null),
    cover_image: Joi.string().allow('', null),
    artists: Joi.array().items(namedEntrySchema),
    labels: Joi.array().items(namedEntrySchema),
    formats: Joi.array().items(namedEntrySchema),
}).unknown(true);

export const listingPageSchema = Joi.object<ListingPage>({
    pagination: Joi.object<Pagination>({
        page: Joi.number().integer().min(1).required(),
        pages: Joi.number().integer().min(0).required(),
        per_page: Joi.number().integer(),
        items: Joi.number().integer(),
    }).unknown(true).required(),
    releases: Joi.array(),
    wants: Joi.array(),
}).unknown(true);

export const collectionEntrySchema = Joi.object<CollectionEntry>({
    id: Joi.number().integer().required(),
    instance_id: Joi.number().integer().allow(null),
    folder_id: Joi.number().integer().allow(null),
    rating: Joi.number().integer().allow(null),
    date_added: Joi.string().allow('', null),
    basic_information: basicInformationSchema.required(),
    notes: Joi.array().items(Joi.object<CollectionNote>({
        field_id: Joi.number().integer().required(),
        value: Joi.string().allow('').required(),
    }).unknown(true)),
}).unknown(true);

export const wantEntrySchema = Joi.object<WantEntry>({
    id: Joi.number().integer().required(),
    date_added: Joi.string().allow('', null),
    notes: Joi.string().allow('', null),
    basic_information: basicInformationSchema.required(),
}).unknown(true);

export const statsSchema = Joi.object<StatsPayload>({
    lowest_price: Joi.object<PriceSuggestion>({
        value: Joi.number().required(),
        currency: Joi.string(),
    }).unknown(true).allow(null),
    num_for_sale: Joi.number().integer().allow(null),
    blocked_from_sale: Joi.boolean(),
}).unknown(true);

export const releaseSchema = Joi.object<ReleasePayload>({
    id: Joi.number().integer(),
    tracklist: Joi.array().items(Joi.object<TracklistEntry>({
        position: Joi.string().allow(''),
        title: Joi.string().allow(''),
        duration: Joi.string().allow(''),
        type_: Joi.string(),
        artists: Joi.array().items(namedEntrySchema),
        extraartists: Joi.array().items(namedEntrySchema),
    }).unknown(true)),
}).unknown(true);
