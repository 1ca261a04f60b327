import {MigrationInterface, QueryRunner} from "typeorm";

export class CreateCollectionTables1760000000000 implements MigrationInterface {
    name = 'CreateCollectionTables1760000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS library_albums (
                id INT NOT NULL AUTO_INCREMENT,
                album_title VARCHAR(500) NOT NULL,
                artist VARCHAR(300) NULL,
                image_key VARCHAR(100) NULL,
                item_key VARCHAR(50) NULL,
                artist_norm VARCHAR(300) NULL,
                album_norm VARCHAR(500) NULL,
                match_key VARCHAR(500) NULL,
                is_physical_dupe BOOLEAN NOT NULL DEFAULT FALSE,
                physical_tag VARCHAR(50) NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                UNIQUE INDEX library_album_item_key (item_key),
                INDEX library_album_match_key (match_key),
                INDEX library_album_title (album_title)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS library_tracks (
                id INT NOT NULL AUTO_INCREMENT,
                album_artist VARCHAR(300) NULL,
                album VARCHAR(500) NULL,
                disc_number INT NULL,
                track_number INT NULL,
                track_title VARCHAR(500) NULL,
                track_artists VARCHAR(500) NULL,
                composers VARCHAR(500) NULL,
                external_id VARCHAR(100) NULL,
                source VARCHAR(50) NULL,
                is_duplicate BOOLEAN NOT NULL DEFAULT FALSE,
                is_hidden BOOLEAN NOT NULL DEFAULT FALSE,
                tags TEXT NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                INDEX library_track_album_artist (album_artist),
                INDEX library_track_album (album)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS library_play_history (
                id INT NOT NULL AUTO_INCREMENT,
                album_artist VARCHAR(300) NULL,
                album VARCHAR(500) NULL,
                disc_number INT NULL,
                track_number INT NULL,
                track_title VARCHAR(500) NULL,
                track_artists VARCHAR(500) NULL,
                composers VARCHAR(500) NULL,
                external_id VARCHAR(100) NULL,
                source VARCHAR(50) NULL,
                played_at DATETIME NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                INDEX play_history_album_artist (album_artist),
                INDEX play_history_played_at (played_at)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS catalog_collection (
                id INT NOT NULL AUTO_INCREMENT,
                release_id INT NOT NULL,
                instance_id INT NULL,
                folder_id INT NULL,
                artist VARCHAR(300) NULL,
                album_title VARCHAR(500) NULL,
                label VARCHAR(300) NULL,
                format VARCHAR(100) NULL,
                year INT NULL,
                date_added DATETIME NULL,
                rating INT NULL,
                artist_norm VARCHAR(300) NULL,
                album_norm VARCHAR(500) NULL,
                match_key VARCHAR(500) NULL,
                num_for_sale INT NULL,
                lowest_price DECIMAL(10,2) NULL,
                thumb_url VARCHAR(500) NULL,
                cover_image_url VARCHAR(500) NULL,
                media_condition VARCHAR(100) NULL,
                sleeve_condition VARCHAR(100) NULL,
                last_listened DATETIME NULL,
                in_collection BOOLEAN NOT NULL DEFAULT FALSE,
                notes TEXT NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                UNIQUE INDEX catalog_release (release_id),
                INDEX catalog_match_key (match_key),
                INDEX catalog_artist (artist)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS catalog_tracks (
                id INT NOT NULL AUTO_INCREMENT,
                collection_id INT NOT NULL,
                release_id INT NOT NULL,
                position VARCHAR(20) NULL,
                track_title VARCHAR(500) NULL,
                duration VARCHAR(20) NULL,
                track_artists VARCHAR(500) NULL,
                extra_artists VARCHAR(500) NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                INDEX catalog_track_release (release_id),
                CONSTRAINT FK_catalog_track_collection FOREIGN KEY (collection_id) REFERENCES catalog_collection(id) ON DELETE CASCADE
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS catalog_wantlist (
                id INT NOT NULL AUTO_INCREMENT,
                release_id INT NOT NULL,
                artist VARCHAR(300) NULL,
                album_title VARCHAR(500) NULL,
                label VARCHAR(300) NULL,
                format VARCHAR(100) NULL,
                year INT NULL,
                date_added DATETIME NULL,
                notes TEXT NULL,
                num_for_sale INT NOT NULL DEFAULT 0,
                lowest_price DECIMAL(10,2) NULL,
                available BOOLEAN NOT NULL DEFAULT FALSE,
                marketplace_url VARCHAR(500) NULL,
                thumb_url VARCHAR(500) NULL,
                cover_image_url VARCHAR(500) NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                UNIQUE INDEX wantlist_release (release_id),
                INDEX wantlist_available (available)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS listening_history (
                id INT NOT NULL AUTO_INCREMENT,
                artist VARCHAR(300) NULL,
                album VARCHAR(500) NULL,
                source VARCHAR(255) NOT NULL,
                listened_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                notes TEXT NULL,
                catalog_item_id INT NULL,
                library_album_id INT NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                INDEX listening_history_listened_at (listened_at),
                CONSTRAINT FK_listening_catalog_item FOREIGN KEY (catalog_item_id) REFERENCES catalog_collection(id) ON DELETE SET NULL,
                CONSTRAINT FK_listening_library_album FOREIGN KEY (library_album_id) REFERENCES library_albums(id) ON DELETE SET NULL
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS track_index (
                id INT NOT NULL AUTO_INCREMENT,
                track_title VARCHAR(500) NULL,
                album VARCHAR(500) NULL,
                artist VARCHAR(300) NULL,
                source VARCHAR(255) NOT NULL,
                PRIMARY KEY (id),
                INDEX track_index_title (track_title),
                INDEX track_index_artist (artist)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS sync_ledger (
                id INT NOT NULL AUTO_INCREMENT,
                source_name VARCHAR(50) NOT NULL,
                source_type VARCHAR(255) NOT NULL,
                file_path VARCHAR(500) NULL,
                last_sync DATETIME NULL,
                last_success_at DATETIME NULL,
                records_count INT NULL,
                sync_status VARCHAR(100) NULL,
                created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                PRIMARY KEY (id),
                UNIQUE INDEX sync_ledger_source (source_name)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS sync_history (
                id INT NOT NULL AUTO_INCREMENT,
                sync_date DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
                library_albums INT NOT NULL DEFAULT 0,
                library_tracks INT NOT NULL DEFAULT 0,
                library_play_history INT NOT NULL DEFAULT 0,
                catalog_collection INT NOT NULL DEFAULT 0,
                catalog_tracks INT NOT NULL DEFAULT 0,
                catalog_wantlist INT NOT NULL DEFAULT 0,
                track_index_total INT NOT NULL DEFAULT 0,
                track_index_distinct INT NOT NULL DEFAULT 0,
                listening_history INT NOT NULL DEFAULT 0,
                PRIMARY KEY (id),
                INDEX sync_history_date (sync_date)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
        `);

        // Ledger rows for every known source; never deleted afterwards.
        await queryRunner.query(`
            INSERT IGNORE INTO sync_ledger (source_name, source_type) VALUES
                ('remote-library-albums', 'api'),
                ('remote-library-tags', 'api'),
                ('remote-library-tracks', 'file'),
                ('remote-library-play-history', 'file'),
                ('catalog-collection', 'api'),
                ('catalog-wantlist', 'api'),
                ('track-index', 'derived')
        `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE IF EXISTS sync_history`);
        await queryRunner.query(`DROP TABLE IF EXISTS sync_ledger`);
        await queryRunner.query(`DROP TABLE IF EXISTS track_index`);
        await queryRunner.query(`DROP TABLE IF EXISTS listening_history`);
        await queryRunner.query(`DROP TABLE IF EXISTS catalog_wantlist`);
        await queryRunner.query(`DROP TABLE IF EXISTS catalog_tracks`);
        await queryRunner.query(`DROP TABLE IF EXISTS catalog_collection`);
        await queryRunner.query(`DROP TABLE IF EXISTS library_play_history`);
        await queryRunner.query(`DROP TABLE IF EXISTS library_tracks`);
        await queryRunner.query(`DROP TABLE IF EXISTS library_albums`);
    }
}
