import {Column, Entity, Index, PrimaryGeneratedColumn} from "typeorm";
import {SyncSourceType} from "../../../../types/SyncEnums";

@Entity("sync_ledger")
@Index("sync_ledger_source", ["sourceName"], {unique: true})
export class SyncLedgerEntry {
    @PrimaryGeneratedColumn("increment")
    id!: number;

    @Column("varchar", {name: "source_name", length: 50})
    sourceName!: string;

    @Column({type: "simple-enum", enum: SyncSourceType, name: "source_type"})
    sourceType!: SyncSourceType;

    @Column("varchar", {name: "file_path", length: 500, nullable: true})
    filePath?: string | null;

    // Time of the last attempt, successful or not.
    @Column("datetime", {name: "last_sync", nullable: true})
    lastSync?: Date | null;

    // Informational; skip decisions read last_sync.
    @Column("datetime", {name: "last_success_at", nullable: true})
    lastSuccessAt?: Date | null;

    @Column("int", {name: "records_count", nullable: true})
    recordsCount?: number | null;

    @Column("varchar", {name: "sync_status", length: 100, nullable: true})
    syncStatus?: string | null;

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
