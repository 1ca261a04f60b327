import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";

@Entity("library_albums")
@Index("library_album_item_key", ["itemKey"], {unique: true})
@Index("library_album_match_key", ["matchKey"])
@Index("library_album_title", ["albumTitle"])
export class LibraryAlbum {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("varchar", {name: "album_title", length: 500})
    albumTitle!: string;

    @Column("varchar", {length: 300, nullable: true})
    artist?: string | null;

    @Column("varchar", {name: "image_key", length: 100, nullable: true})
    imageKey?: string | null;

    @Column("varchar", {name: "item_key", length: 50, nullable: true})
    itemKey?: string | null;

    @Column("varchar", {name: "artist_norm", length: 300, nullable: true})
    artistNorm?: string | null;

    @Column("varchar", {name: "album_norm", length: 500, nullable: true})
    albumNorm?: string | null;

    @Column("varchar", {name: "match_key", length: 500, nullable: true})
    matchKey?: string | null;

    @Column("boolean", {name: "is_physical_dupe", default: false})
    isPhysicalDupe!: boolean;

    @Column("varchar", {name: "physical_tag", length: 50, nullable: true})
    physicalTag?: string | null;

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
