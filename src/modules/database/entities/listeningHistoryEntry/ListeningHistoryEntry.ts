import {Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, RelationId} from "typeorm";
import {CatalogItem} from "../catalogItem/CatalogItem";
import {LibraryAlbum} from "../libraryAlbum/LibraryAlbum";
import {ListeningSource} from "../../../../types/SyncEnums";

@Entity("listening_history")
@Index("listening_history_listened_at", ["listenedAt"])
export class ListeningHistoryEntry {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("varchar", {length: 300, nullable: true})
    artist?: string | null;

    @Column("varchar", {length: 500, nullable: true})
    album?: string | null;

    @Column({type: "simple-enum", enum: ListeningSource})
    source!: ListeningSource;

    @Column("datetime", {
        name: "listened_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    listenedAt!: Date;

    @Column("text", {nullable: true})
    notes?: string | null;

    @ManyToOne(() => CatalogItem, {onDelete: "SET NULL", nullable: true})
    @JoinColumn({name: "catalog_item_id"})
    catalogItem?: CatalogItem | null;

    @RelationId((entry: ListeningHistoryEntry) => entry.catalogItem)
    catalogItemId?: number | null;

    @ManyToOne(() => LibraryAlbum, {onDelete: "SET NULL", nullable: true})
    @JoinColumn({name: "library_album_id"})
    libraryAlbum?: LibraryAlbum | null;

    @RelationId((entry: ListeningHistoryEntry) => entry.libraryAlbum)
    libraryAlbumId?: number | null;

    @Column("datetime", {
        name: "created_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    createdAt!: Date;
}
