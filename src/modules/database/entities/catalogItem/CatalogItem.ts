import {Column, Entity, Index, OneToMany, PrimaryGeneratedColumn} from "typeorm";
import {CatalogTrack} from "../catalogTrack/CatalogTrack";
import {currencyTransformer} from "../../transformers";

/**
 * A release in the owned marketplace collection.
 * lastListened, inCollection and notes belong to the user and survive resyncs.
 */
@Entity("catalog_collection")
@Index("catalog_release", ["releaseId"], {unique: true})
@Index("catalog_match_key", ["matchKey"])
@Index("catalog_artist", ["artist"])
export class CatalogItem {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("int", {name: "release_id"})
    releaseId!: number;

    @Column("int", {name: "instance_id", nullable: true})
    instanceId?: number | null;

    @Column("int", {name: "folder_id", nullable: true})
    folderId?: number | null;

    @Column("varchar", {length: 300, nullable: true})
    artist?: string | null;

    @Column("varchar", {name: "album_title", length: 500, nullable: true})
    albumTitle?: string | null;

    @Column("varchar", {length: 300, nullable: true})
    label?: string | null;

    @Column("varchar", {length: 100, nullable: true})
    format?: string | null;

    @Column("int", {nullable: true})
    year?: number | null;

    @Column("datetime", {name: "date_added", nullable: true})
    dateAdded?: Date | null;

    @Column("int", {nullable: true})
    rating?: number | null;

    @Column("varchar", {name: "artist_norm", length: 300, nullable: true})
    artistNorm?: string | null;

    @Column("varchar", {name: "album_norm", length: 500, nullable: true})
    albumNorm?: string | null;

    @Column("varchar", {name: "match_key", length: 500, nullable: true})
    matchKey?: string | null;

    @Column("int", {name: "num_for_sale", nullable: true})
    numForSale?: number | null;

    @Column("decimal", {
        name: "lowest_price",
        precision: 10,
        scale: 2,
        nullable: true,
        transformer: currencyTransformer,
    })
    lowestPrice?: number | null;

    @Column("varchar", {name: "thumb_url", length: 500, nullable: true})
    thumbUrl?: string | null;

    @Column("varchar", {name: "cover_image_url", length: 500, nullable: true})
    coverImageUrl?: string | null;

    @Column("varchar", {name: "media_condition", length: 100, nullable: true})
    mediaCondition?: string | null;

    @Column("varchar", {name: "sleeve_condition", length: 100, nullable: true})
    sleeveCondition?: string | null;

    @Column("datetime", {name: "last_listened", nullable: true})
    lastListened?: Date | null;

    @Column("boolean", {name: "in_collection", default: false})
    inCollection!: boolean;

    @Column("text", {nullable: true})
    notes?: string | null;

    @OneToMany(() => CatalogTrack, (track) => track.collectionItem)
    tracks?: CatalogTrack[];

    @Column("datetime", {
        name: "created_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    createdAt!: Date;

    @Column("datetime", {
        name: "updated_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    updatedAt!: Date;
}
