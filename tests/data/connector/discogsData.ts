/**
 * Test data for the marketplace catalog connector
 */

export const TEST_TOKEN = 'test-secret';
export const TEST_USER = 'test-user';
export const TEST_USER_AGENT = 'CollectionSyncTest/1.0';

export const API = 'https://api.discogs.com';
export const COLLECTION_URL = `${API}/users/${TEST_USER}/collection/folders/0/releases`;
export const WANTS_URL = `${API}/users/${TEST_USER}/wants`;

export function collectionEntry(id: number, title: string, artist: string) {
    return {
        id,
        instance_id: 9000 + id,
        folder_id: 1,
        rating: 4,
        date_added: '2024-03-01T10:00:00-08:00',
        basic_information: {
            id,
            title,
            year: 1973,
            thumb: `https://img.example/t${id}.jpg`,
            cover_image: `https://img.example/c${id}.jpg`,
            artists: [{name: artist}, {name: 'Guest Artist'}],
            labels: [{name: 'Harvest'}],
            formats: [{name: 'Vinyl'}],
        },
        notes: [
            {field_id: 1, value: 'Near Mint (NM or M-)'},
            {field_id: 2, value: 'Very Good Plus (VG+)'},
            {field_id: 3, value: 'first pressing'},
        ],
    };
}

export function wantEntry(id: number, title: string, artist: string) {
    return {
        id,
        date_added: '2024-05-10T08:30:00-00:00',
        notes: 'only the gatefold',
        basic_information: {
            id,
            title,
            year: 1971,
            thumb: '',
            cover_image: `https://img.example/c${id}.jpg`,
            artists: [{name: artist}],
            labels: [{name: 'Island'}],
            formats: [{name: 'CD'}],
        },
    };
}

export function listingPage(key: 'releases' | 'wants', page: number, pages: number, items: unknown[]) {
    return {
        pagination: {page, pages, per_page: 100, items: items.length},
        [key]: items,
    };
}

export const collectionPage1 = listingPage('releases', 1, 2, [
    collectionEntry(101, 'The Dark Side of the Moon', 'Pink Floyd'),
    collectionEntry(102, 'Wish You Were Here', 'Pink Floyd'),
]);

export const collectionPage2 = listingPage('releases', 2, 2, [
    collectionEntry(103, 'Animals', 'Pink Floyd'),
    {basic_information: {title: 'No id at all'}},
]);

export const singleCollectionPage = listingPage('releases', 1, 1, [
    collectionEntry(101, 'The Dark Side of the Moon', 'Pink Floyd'),
]);

export const wantsPage = listingPage('wants', 1, 1, [
    wantEntry(201, 'Pink Moon', 'Nick Drake'),
    {id: 202, basic_information: {title: 'Bryter Layter', year: 0}},
]);

export const statsPayload = {
    lowest_price: {value: 24.5, currency: 'EUR'},
    num_for_sale: 12,
    blocked_from_sale: false,
};

export const releasePayload = {
    id: 101,
    tracklist: [
        {position: '', title: 'Side A', type_: 'heading'},
        {
            position: 'A1',
            title: 'Speak to Me',
            duration: '1:30',
            type_: 'track',
            extraartists: [{name: 'Alan Parsons', role: 'Engineer'}, {name: 'Nick Mason', role: ''}],
        },
        {
            position: 'A2',
            title: 'Breathe',
            duration: '2:43',
            type_: 'track',
            artists: [{name: 'Pink Floyd'}],
        },
    ],
};
