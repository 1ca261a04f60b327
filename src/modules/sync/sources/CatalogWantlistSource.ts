import {ApiSyncSource, SourceRunResult, SyncContext} from './SyncSourceInterface';
import {toWantlistRecord} from '../connectors/discogs/DiscogsConnector';
import {replaceWantlist} from '../../database/services/CatalogService';
import {SyncSourceError} from '../../lib/errors';
import {SyncSourceId} from '../../../types/SyncEnums';

/**
 * Want-list with marketplace availability. Replaced wholesale on every sync.
 */
export class CatalogWantlistSource extends ApiSyncSource {
    constructor() {
        super(SyncSourceId.CATALOG_WANTLIST, 'Catalog want-list');
    }

    async run(ctx: SyncContext): Promise<SourceRunResult> {
        const catalog = ctx.catalog;
        catalog.assertConfigured();

        const listing = await catalog.fetchWantlist();
        if (!listing.complete && listing.items.length === 0) {
            throw new SyncSourceError('Want-list listing failed');
        }
        console.log(`📦 Total wantlist items: ${listing.items.length}`);

        const details: string[] = [];
        const records = listing.items.map(toWantlistRecord);
        for (const record of records) {
            const stats = await catalog.fetchStats(record.releaseId);
            if (stats.ok) {
                record.stats = stats.value;
            } else {
                details.push(`no stats for ${record.releaseId}: ${stats.error.message}`);
            }
        }

        const {inserted, duplicates} = await replaceWantlist(records, ctx.settings.commitBatchSize);
        if (!listing.complete) {
            details.push(`listing incomplete after ${listing.pages} page(s)`);
        }
        if (listing.skipped > 0) {
            details.push(`${listing.skipped} malformed item(s) skipped`);
        }
        console.log(`✅ Synced ${inserted} wantlist items`);
        return {count: inserted, duplicates: duplicates.map(String), details};
    }
}
