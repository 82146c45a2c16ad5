import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from './testHarness';
import { withTempDir } from './helpers';
import { openCatalogStore } from '../src/adapters/catalog/catalogStore';
import { EmptyCatalogueError } from '../src/domain/errors';
import type { TrackUpsert } from '../src/domain/library/types';

function upsert(filePath: string, overrides: Partial<TrackUpsert> = {}): TrackUpsert {
  return { path: filePath, title: `Title ${filePath}`, duration: 120, ...overrides };
}

test('catalogue selection on an empty library throws EmptyCatalogueError', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'empty.db'));
    try {
      assert.throws(() => store.selectLeastPlayed(), EmptyCatalogueError);
      assert.throws(() => store.peekLeastPlayed(), EmptyCatalogueError);
      assert.deepEqual(store.getStats(), {
        tracks: 0,
        favourites: 0,
        minListenCount: 0,
        maxListenCount: 0,
      });
    } finally {
      store.close();
    }
  });
});

test('catalogue selection returns the pre-increment row and increments it', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'one.db'));
    try {
      store.upsertTrack(upsert('/music/a.mp3', { artist: 'Artist', duration: 200.5 }));
      const first = store.selectLeastPlayed();
      assert.equal(first.listenCountBefore, 0);
      assert.equal(first.favourite, false);
      assert.equal(first.track.path, '/music/a.mp3');
      assert.equal(first.track.artist, 'Artist');
      assert.equal(first.track.genre, undefined);
      assert.equal(first.track.duration, 200.5);
      assert.equal(store.getTrack('/music/a.mp3')?.listenCount, 1);
      const second = store.selectLeastPlayed();
      assert.equal(second.listenCountBefore, 1);
      assert.equal(store.getTrack('/music/a.mp3')?.listenCount, 2);
    } finally {
      store.close();
    }
  });
});

test('catalogue selection plays every track once before any track twice', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'fair.db'));
    try {
      const paths = ['/m/1.mp3', '/m/2.mp3', '/m/3.mp3', '/m/4.mp3', '/m/5.mp3'];
      paths.forEach((entry) => store.upsertTrack(upsert(entry)));
      for (let round = 0; round < 3; round += 1) {
        const seen = new Set<string>();
        for (let i = 0; i < paths.length; i += 1) {
          const selection = store.selectLeastPlayed();
          assert.equal(selection.listenCountBefore, round);
          seen.add(selection.track.path);
        }
        assert.deepEqual([...seen].sort(), paths);
      }
      const stats = store.getStats();
      assert.equal(stats.minListenCount, 3);
      assert.equal(stats.maxListenCount, 3);
    } finally {
      store.close();
    }
  });
});

test('catalogue selection breaks ties at random among least-played tracks', async () => {
  await withTempDir(async (dir) => {
    const paths = ['/m/a.mp3', '/m/b.mp3', '/m/c.mp3', '/m/d.mp3'];
    const firstPicks = new Set<string>();
    for (let run = 0; run < 30; run += 1) {
      const store = await openCatalogStore(path.join(dir, `tie-${run}.db`));
      try {
        paths.forEach((entry) => store.upsertTrack(upsert(entry)));
        const first = store.selectLeastPlayed();
        assert.equal(first.listenCountBefore, 0);
        firstPicks.add(first.track.path);
        const second = store.selectLeastPlayed();
        assert.equal(second.listenCountBefore, 0);
        assert.notEqual(second.track.path, first.track.path);
      } finally {
        store.close();
      }
    }
    assert.ok(firstPicks.size > 1, `always picked ${[...firstPicks].join(',')}`);
  });
});

test('peek picks a least-played track without recording a play', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'peek.db'));
    try {
      store.upsertTrack(upsert('/m/a.mp3'));
      store.upsertTrack(upsert('/m/b.mp3'));
      store.selectLeastPlayed();
      const peeked = store.peekLeastPlayed();
      assert.equal(peeked.listenCountBefore, 0);
      assert.equal(store.getTrack(peeked.track.path)?.listenCount, 0);
    } finally {
      store.close();
    }
  });
});

test('two connections on one library never hand out the same count twice', async () => {
  await withTempDir(async (dir) => {
    const dbPath = path.join(dir, 'shared.db');
    const first = await openCatalogStore(dbPath);
    const second = await openCatalogStore(dbPath);
    try {
      first.upsertTrack(upsert('/m/only.mp3'));
      const counts = [
        first.selectLeastPlayed().listenCountBefore,
        second.selectLeastPlayed().listenCountBefore,
        first.selectLeastPlayed().listenCountBefore,
        second.selectLeastPlayed().listenCountBefore,
      ];
      assert.deepEqual(counts, [0, 1, 2, 3]);
      assert.equal(second.getTrack('/m/only.mp3')?.listenCount, 4);
    } finally {
      first.close();
      second.close();
    }
  });
});

test('favourite writes are idempotent and visible to other connections', async () => {
  await withTempDir(async (dir) => {
    const dbPath = path.join(dir, 'fav.db');
    const selection = await openCatalogStore(dbPath);
    const favourites = await openCatalogStore(dbPath);
    try {
      selection.upsertTrack(upsert('/m/a.mp3'));
      assert.equal(favourites.setFavourite('/m/a.mp3', true), true);
      assert.equal(favourites.setFavourite('/m/a.mp3', true), true);
      assert.equal(selection.selectLeastPlayed().favourite, true);
      assert.equal(favourites.setFavourite('/m/a.mp3', false), true);
      assert.equal(selection.getTrack('/m/a.mp3')?.favourite, false);
      assert.equal(favourites.setFavourite('/m/missing.mp3', true), false);
    } finally {
      selection.close();
      favourites.close();
    }
  });
});

test('upsert refreshes metadata but keeps favourite and listen count', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'upsert.db'));
    try {
      store.upsertTrack(upsert('/m/a.mp3', { title: 'Old', album: 'Album' }));
      store.setFavourite('/m/a.mp3', true);
      store.selectLeastPlayed();
      store.upsertTrack(upsert('/m/a.mp3', { title: 'New', duration: 90 }));
      assert.deepEqual(store.getTrack('/m/a.mp3'), {
        path: '/m/a.mp3',
        title: 'New',
        genre: undefined,
        artist: undefined,
        album: undefined,
        duration: 90,
        favourite: true,
        listenCount: 1,
      });
      assert.equal(store.getStats().tracks, 1);
    } finally {
      store.close();
    }
  });
});

test('deleteMissing removes rows for files no longer found', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'prune.db'));
    try {
      ['/m/a.mp3', '/m/b.mp3', '/m/c.mp3'].forEach((entry) => store.upsertTrack(upsert(entry)));
      store.setFavourite('/m/b.mp3', true);
      assert.equal(store.deleteMissing(['/m/a.mp3', '/m/c.mp3', '/m/new.mp3']), 1);
      assert.equal(store.getTrack('/m/b.mp3'), null);
      assert.equal(store.getStats().tracks, 2);
      assert.equal(store.deleteMissing(['/m/a.mp3', '/m/c.mp3']), 0);
      assert.equal(store.getStats().favourites, 0);
    } finally {
      store.close();
    }
  });
});

test('catalogue rejects rows without a positive duration', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'check.db'));
    try {
      assert.throws(() => store.upsertTrack(upsert('/m/zero.mp3', { duration: 0 })));
      assert.equal(store.getStats().tracks, 0);
    } finally {
      store.close();
    }
  });
});

test('catalogue operations fail once closed', async () => {
  await withTempDir(async (dir) => {
    const store = await openCatalogStore(path.join(dir, 'closed.db'));
    store.close();
    store.close();
    assert.throws(() => store.getStats().tracks, /not initialized/);
  });
});
