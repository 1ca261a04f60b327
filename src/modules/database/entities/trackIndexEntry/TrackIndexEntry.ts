import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";
import {TrackIndexSource} from "../../../../types/SyncEnums";

/**
 * Derived, flattened track listing across both collections. Rebuilt wholesale.
 */
@Entity("track_index")
@Index("track_index_title", ["trackTitle"])
@Index("track_index_artist", ["artist"])
export class TrackIndexEntry {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("varchar", {name: "track_title", length: 500, nullable: true})
    trackTitle?: string | null;

    @Column("varchar", {length: 500, nullable: true})
    album?: string | null;

    @Column("varchar", {length: 300, nullable: true})
    artist?: string | null;

    @Column({type: "simple-enum", enum: TrackIndexSource})
    source!: TrackIndexSource;
}
