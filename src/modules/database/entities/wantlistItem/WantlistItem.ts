import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";
import {currencyTransformer} from "../../transformers";

@Entity("catalog_wantlist")
@Index("wantlist_release", ["releaseId"], {unique: true})
@Index("wantlist_available", ["available"])
export class WantlistItem {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("int", {name: "release_id"})
    releaseId!: number;

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

    @Column("text", {nullable: true})
    notes?: string | null;

    @Column("int", {name: "num_for_sale", default: 0})
    numForSale!: number;

    @Column("decimal", {
        name: "lowest_price",
        precision: 10,
        scale: 2,
        nullable: true,
        transformer: currencyTransformer,
    })
    lowestPrice?: number | null;

    @Column("boolean", {default: false})
    available!: boolean;

    @Column("varchar", {name: "marketplace_url", length: 500, nullable: true})
    marketplaceUrl?: string | null;

    @Column("varchar", {name: "thumb_url", length: 500, nullable: true})
    thumbUrl?: string | null;

    @Column("varchar", {name: "cover_image_url", length: 500, nullable: true})
    coverImageUrl?: string | null;

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
