import {ApiSyncSource, SourceRunResult, SyncContext} from './SyncSourceInterface';
import {toCatalogItemRecord} from '../connectors/discogs/DiscogsConnector';
import {pruneCollection, replaceCatalogTracks, upsertCollectionItem} from '../../database/services/CatalogService';
import {SyncSourceError} from '../../lib/errors';
import {SyncSourceId} from '../../../types/SyncEnums';

/**
 * Owned releases with marketplace stats and tracklists.
 *
 * Rows are upserted by release id so user fields survive a resync. Rows missing from
 * the listing are pruned, but only after a complete listing.
 */
export class CatalogCollectionSource extends ApiSyncSource {
    constructor() {
        super(SyncSourceId.CATALOG_COLLECTION, 'Catalog collection');
    }

    async run(ctx: SyncContext): Promise<SourceRunResult> {
        const catalog = ctx.catalog;
        catalog.assertConfigured();

        const listing = await catalog.fetchCollection();
        if (!listing.complete && listing.items.length === 0) {
            throw new SyncSourceError('Collection listing failed');
        }
        console.log(`📦 Total collection items fetched: ${listing.items.length}`);

        const details: string[] = [];
        const duplicates: string[] = [];
        const seen = new Set<number>();
        let created = 0;
        let trackCount = 0;
        let itemCount = 0;

        for (const [index, entry] of listing.items.entries()) {
            if (index % 50 === 0) {
                console.log(`    Progress: ${index}/${listing.items.length}`);
            }
            const record = toCatalogItemRecord(entry);
            if (seen.has(record.releaseId)) {
                duplicates.push(String(record.releaseId));
                continue;
            }

            const stats = await catalog.fetchStats(record.releaseId);
            if (stats.ok) {
                record.stats = stats.value;
            } else {
                details.push(`no stats for ${record.releaseId}: ${stats.error.message}`);
            }

            const result = await upsertCollectionItem(record, seen);
            if (result.wasDuplicateInsert || result.id === null) continue;
            itemCount++;
            if (result.created) created++;

            const tracks = await catalog.fetchTracks(record.releaseId);
            if (tracks.ok) {
                trackCount += await replaceCatalogTracks(result.id, record.releaseId, tracks.value);
            } else {
                details.push(`no tracks for ${record.releaseId}: ${tracks.error.message}`);
            }
        }

        if (listing.complete) {
            const removed = await pruneCollection(seen);
            if (removed > 0) details.push(`pruned ${removed} release(s) no longer in the collection`);
        } else {
            details.push(`listing incomplete after ${listing.pages} page(s), nothing pruned`);
        }
        if (listing.skipped > 0) {
            details.push(`${listing.skipped} malformed item(s) skipped`);
        }

        console.log(`✅ Synced ${itemCount} collection items (${created} new), ${trackCount} tracks`);
        return {count: itemCount, duplicates, details};
    }
}
