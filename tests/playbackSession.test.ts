import assert from 'node:assert/strict';
import { test } from './testHarness';
import { waitUntil } from './helpers';
import { FakeCatalog, makeTrack } from './fakes/catalogPort';
import { FakePlayer } from './fakes/playerPort';
import { ManualClock, RecordingDisplay, ScriptedInput } from './fakes/terminal';
import { createRecordingLog } from './fakes/recordingLog';
import type { TrackRecord } from '../src/domain/library/types';
import { EmptyCatalogueError, LaunchError } from '../src/domain/errors';
import { DEFAULT_KEYMAP } from '../src/application/playback/keymap';
import { PlaybackSession } from '../src/application/playback/playbackSession';

function createSession(tracks: TrackRecord[]) {
  const catalog = new FakeCatalog(tracks);
  const player = new FakePlayer();
  const display = new RecordingDisplay();
  const input = new ScriptedInput();
  const clock = new ManualClock();
  const session = new PlaybackSession({
    catalog,
    favourites: catalog,
    player,
    display,
    input,
    clock,
    keymap: DEFAULT_KEYMAP,
    progressIntervalMs: 5,
    log: createRecordingLog().log,
  });
  return { catalog, player, display, input, clock, session };
}

test('session plays least-played tracks back to back until quit', async () => {
  const { catalog, player, display, input, session } = createSession([
    makeTrack('/m/a.mp3'),
    makeTrack('/m/b.mp3'),
  ]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  assert.equal(player.current?.path, '/m/a.mp3');
  assert.equal(display.last?.playCount, 1);

  player.current?.finish();
  await waitUntil(() => player.handles.length === 2, 'second track');
  assert.equal(player.current?.path, '/m/b.mp3');

  input.press('q');
  await running;
  assert.equal(player.current?.state, 'stopped');
  assert.equal(player.handles.length, 2);
  assert.deepEqual(
    catalog.tracks.map((track) => track.listenCount),
    [1, 1],
  );
  assert.equal(display.clears, 1);
  assert.equal(input.closed, true);
});

test('skip stops the current player and starts the next track', async () => {
  const { player, input, session } = createSession([makeTrack('/m/a.mp3'), makeTrack('/m/b.mp3')]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  input.press('n');
  await waitUntil(() => player.handles.length === 2, 'next track');
  assert.equal(player.handles[0]?.terminations, 1);
  assert.equal(player.current?.path, '/m/b.mp3');
  await session.quit();
  await running;
});

test('session advances by itself once the duration has elapsed', async () => {
  const { player, clock, session } = createSession([
    makeTrack('/m/short.mp3', { duration: 5 }),
    makeTrack('/m/next.mp3', { duration: 5 }),
  ]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  clock.advance(5001);
  await waitUntil(() => player.handles.length === 2, 'auto advance');
  assert.equal(player.handles[0]?.terminations, 1);
  assert.equal(player.current?.path, '/m/next.mp3');
  const snapshot = await session.snapshot();
  assert.equal(snapshot.elapsed, 0);
  await session.quit();
  await running;
});

test('paused time does not count towards elapsed time', async () => {
  const { player, input, clock, session } = createSession([makeTrack('/m/a.mp3')]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  clock.advance(2000);
  input.press('space');
  await waitUntil(() => player.current?.state === 'paused', 'pause');
  clock.advance(60_000);
  input.press('p');
  await waitUntil(() => player.current?.state === 'playing', 'resume');
  clock.advance(1000);
  const snapshot = await session.snapshot();
  assert.equal(snapshot.elapsed, 3);
  assert.equal(snapshot.paused, false);
  assert.equal(snapshot.path, '/m/a.mp3');
  input.press('q');
  await running;
});

test('favourite toggles reach the catalogue and the display', async () => {
  const { catalog, player, display, input, session } = createSession([makeTrack('/m/a.mp3')]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  input.press('f');
  await waitUntil(() => display.last?.favourite === true, 'favourite shown');
  assert.equal(catalog.tracks[0]?.favourite, true);
  input.press('q');
  await running;
});

test('quit drains both actors and leaves nothing waiting', async () => {
  const { player, input, session } = createSession([makeTrack('/m/a.mp3')]);
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  input.press('q');
  await running;
  assert.equal(session.signal.waiters, 0);
  assert.equal(session.lock.pending, 0);
  const snapshot = await session.snapshot();
  assert.equal(snapshot.stopped, true);
  await assert.rejects(session.run(), /already running/);
});

test('a failed play-count write still plays and says so', async () => {
  const { catalog, player, display, input, session } = createSession([makeTrack('/m/a.mp3')]);
  catalog.failIncrement = true;
  const running = session.run();
  await waitUntil(() => player.handles.length === 1, 'first track');
  assert.equal(display.last?.message, 'play count not saved');
  assert.equal(display.last?.playCount, 1);
  assert.equal(catalog.tracks[0]?.listenCount, 0);
  input.press('q');
  await running;
});

test('a launch failure ends the session with the error', async () => {
  const { player, input, display, session } = createSession([makeTrack('/m/a.mp3')]);
  player.failing.add('/m/a.mp3');
  await assert.rejects(session.run(), LaunchError);
  assert.equal(input.closed, true);
  assert.equal(display.clears, 1);
  assert.equal(session.signal.waiters, 0);
});

test('an empty catalogue ends the session before anything plays', async () => {
  const { player, session } = createSession([]);
  await assert.rejects(session.run(), EmptyCatalogueError);
  assert.equal(player.handles.length, 0);
});
