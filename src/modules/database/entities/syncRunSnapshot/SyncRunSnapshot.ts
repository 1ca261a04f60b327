import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";

@Entity("sync_history")
@Index("sync_history_date", ["syncDate"])
export class SyncRunSnapshot {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("datetime", {
        name: "sync_date",
        default: () => "CURRENT_TIMESTAMP",
    })
    syncDate!: Date;

    @Column("int", {name: "library_albums", default: 0})
    libraryAlbums!: number;

    @Column("int", {name: "library_tracks", default: 0})
    libraryTracks!: number;

    @Column("int", {name: "library_play_history", default: 0})
    libraryPlayHistory!: number;

    @Column("int", {name: "catalog_collection", default: 0})
    catalogCollection!: number;

    @Column("int", {name: "catalog_tracks", default: 0})
    catalogTracks!: number;

    @Column("int", {name: "catalog_wantlist", default: 0})
    catalogWantlist!: number;

    @Column("int", {name: "track_index_total", default: 0})
    trackIndexTotal!: number;

    @Column("int", {name: "track_index_distinct", default: 0})
    trackIndexDistinct!: number;

    @Column("int", {name: "listening_history", default: 0})
    listeningHistory!: number;
}
