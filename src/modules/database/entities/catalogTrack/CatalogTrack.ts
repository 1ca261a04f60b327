import {Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn} from "typeorm";
import {CatalogItem} from "../catalogItem/CatalogItem";

@Entity("catalog_tracks")
@Index("catalog_track_release", ["releaseId"])
export class CatalogTrack {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("int", {name: "collection_id"})
    collectionId!: number;

    @ManyToOne(() => CatalogItem, (item) => item.tracks, {onDelete: "CASCADE"})
    @JoinColumn({name: "collection_id"})
    collectionItem?: CatalogItem;

    @Column("int", {name: "release_id"})
    releaseId!: number;

    @Column("varchar", {length: 20, nullable: true})
    position?: string | null;

    @Column("varchar", {name: "track_title", length: 500, nullable: true})
    trackTitle?: string | null;

    @Column("varchar", {length: 20, nullable: true})
    duration?: string | null;

    @Column("varchar", {name: "track_artists", length: 500, nullable: true})
    trackArtists?: string | null;

    @Column("varchar", {name: "extra_artists", length: 500, nullable: true})
    extraArtists?: string | null;

    @Column("datetime", {
        name: "created_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    createdAt!: Date;
}
