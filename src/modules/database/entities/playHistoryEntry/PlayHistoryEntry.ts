import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";

/**
 * One play event from the library's history export. Append-only per import.
 */
@Entity("library_play_history")
@Index("play_history_album_artist", ["albumArtist"])
@Index("play_history_played_at", ["playedAt"])
export class PlayHistoryEntry {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("varchar", {name: "album_artist", length: 300, nullable: true})
    albumArtist?: string | null;

    @Column("varchar", {length: 500, nullable: true})
    album?: string | null;

    @Column("int", {name: "disc_number", nullable: true})
    discNumber?: number | null;

    @Column("int", {name: "track_number", nullable: true})
    trackNumber?: number | null;

    @Column("varchar", {name: "track_title", length: 500, nullable: true})
    trackTitle?: string | null;

    @Column("varchar", {name: "track_artists", length: 500, nullable: true})
    trackArtists?: string | null;

    @Column("varchar", {length: 500, nullable: true})
    composers?: string | null;

    @Column("varchar", {name: "external_id", length: 100, nullable: true})
    externalId?: string | null;

    @Column("varchar", {length: 50, nullable: true})
    source?: string | null;

    @Column("datetime", {name: "played_at", nullable: true})
    playedAt?: Date | null;

    @Column("datetime", {
        name: "created_at",
        default: () => "CURRENT_TIMESTAMP",
    })
    createdAt!: Date;
}
