import Database from 'better-sqlite3';
import path from 'node:path';
import { EmptyCatalogueError } from '@/domain/errors';
import type {
  CatalogueStats,
  TrackRecord,
  TrackSelection,
  TrackUpsert,
} from '@/domain/library/types';
import type { CatalogPort } from '@/ports/CatalogPort';
import { ensureDir } from '@/shared/utils/file';

interface LibraryRow {
  path: string;
  title: string | null;
  genre: string | null;
  artist: string | null;
  album: string | null;
  duration: number;
  favourite: number;
  listen_count: number;
}

const BUSY_TIMEOUT_MS = 5000;

const LEAST_PLAYED_SQL = `
  SELECT * FROM library
  WHERE listen_count = (SELECT MIN(listen_count) FROM library)
  ORDER BY RANDOM()
  LIMIT 1
`;

/**
 * SQLite catalogue for one library. Several instances may be opened on the
 * same file; selection runs in an immediate transaction so a concurrent
 * connection never sees a half-applied increment.
 */
export class CatalogStore implements CatalogPort {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  public async init(): Promise<void> {
    if (this.db) {
      return;
    }
    if (this.dbPath !== ':memory:') {
      await ensureDir(path.dirname(this.dbPath));
    }
    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
    this.migrate();
  }

  public selectLeastPlayed(): TrackSelection {
    const db = this.requireDb();
    const select = db.transaction((): LibraryRow => {
      const row = this.pickLeastPlayed(db);
      db.prepare('UPDATE library SET listen_count = listen_count + 1 WHERE path = ?').run(row.path);
      return row;
    });
    return toSelection(select.immediate());
  }

  public peekLeastPlayed(): TrackSelection {
    return toSelection(this.pickLeastPlayed(this.requireDb()));
  }

  public setFavourite(trackPath: string, value: boolean): boolean {
    const db = this.requireDb();
    const result = db
      .prepare('UPDATE library SET favourite = ? WHERE path = ?')
      .run(value ? 1 : 0, trackPath);
    return result.changes > 0;
  }

  public upsertTrack(record: TrackUpsert): void {
    const db = this.requireDb();
    db.prepare(`
      INSERT INTO library (path, title, genre, artist, album, duration)
      VALUES (@path, @title, @genre, @artist, @album, @duration)
      ON CONFLICT(path) DO UPDATE SET
        title = excluded.title,
        genre = excluded.genre,
        artist = excluded.artist,
        album = excluded.album,
        duration = excluded.duration
    `).run({
      path: record.path,
      title: record.title ?? null,
      genre: record.genre ?? null,
      artist: record.artist ?? null,
      album: record.album ?? null,
      duration: record.duration,
    });
  }

  public deleteMissing(knownPaths: Iterable<string>): number {
    const db = this.requireDb();
    const prune = db.transaction((paths: Iterable<string>): number => {
      db.exec('CREATE TEMP TABLE IF NOT EXISTS known_paths (path TEXT PRIMARY KEY)');
      db.exec('DELETE FROM known_paths');
      const insert = db.prepare('INSERT OR IGNORE INTO known_paths (path) VALUES (?)');
      for (const known of paths) {
        insert.run(known);
      }
      const result = db
        .prepare('DELETE FROM library WHERE path NOT IN (SELECT path FROM known_paths)')
        .run();
      db.exec('DROP TABLE known_paths');
      return result.changes;
    });
    return prune(knownPaths);
  }

  public getTrack(trackPath: string): TrackRecord | null {
    const db = this.requireDb();
    const row = db.prepare('SELECT * FROM library WHERE path = ?').get(trackPath) as
      | LibraryRow
      | undefined;
    return row ? toRecord(row) : null;
  }

  public getStats(): CatalogueStats {
    const db = this.requireDb();
    const row = db
      .prepare(`
        SELECT COUNT(*) AS tracks,
               COALESCE(SUM(favourite), 0) AS favourites,
               COALESCE(MIN(listen_count), 0) AS min_listen_count,
               COALESCE(MAX(listen_count), 0) AS max_listen_count
        FROM library
      `)
      .get() as {
      tracks: number;
      favourites: number;
      min_listen_count: number;
      max_listen_count: number;
    };
    return {
      tracks: row.tracks,
      favourites: row.favourites,
      minListenCount: row.min_listen_count,
      maxListenCount: row.max_listen_count,
    };
  }

  public close(): void {
    if (!this.db) {
      return;
    }
    this.db.close();
    this.db = null;
  }

  private pickLeastPlayed(db: Database.Database): LibraryRow {
    const row = db.prepare(LEAST_PLAYED_SQL).get() as LibraryRow | undefined;
    if (!row) {
      throw new EmptyCatalogueError();
    }
    return row;
  }

  private migrate(): void {
    const db = this.requireDb();
    db.exec(`
      CREATE TABLE IF NOT EXISTS library (
        path TEXT PRIMARY KEY,
        title TEXT,
        genre TEXT,
        artist TEXT,
        album TEXT,
        duration REAL NOT NULL CHECK (duration > 0),
        favourite INTEGER NOT NULL DEFAULT 0,
        listen_count INTEGER NOT NULL DEFAULT 0 CHECK (listen_count >= 0)
      );
      CREATE INDEX IF NOT EXISTS idx_library_listen_count ON library(listen_count);
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('CatalogStore not initialized');
    }
    return this.db;
  }
}

export async function openCatalogStore(dbPath: string): Promise<CatalogStore> {
  const store = new CatalogStore(dbPath);
  await store.init();
  return store;
}

function toRecord(row: LibraryRow): TrackRecord {
  return {
    path: row.path,
    title: row.title ?? undefined,
    genre: row.genre ?? undefined,
    artist: row.artist ?? undefined,
    album: row.album ?? undefined,
    duration: row.duration,
    favourite: row.favourite !== 0,
    listenCount: row.listen_count,
  };
}

function toSelection(row: LibraryRow): TrackSelection {
  const track = toRecord(row);
  return { track, favourite: track.favourite, listenCountBefore: row.listen_count };
}
