import test from 'node:test';
import assert from 'node:assert/strict';
import { createRng, emptyPickerState, loadConfig, ShuffleBagPicker, type AppKey } from 'arr-rotator-commons';

import { runTick, type TickDeps } from '../tick';
import { FakeArr, RecordingLogger, RecordingPublisher } from './fakes';

function fixture(saveResult = true) {
  const config = loadConfig({
    SONARR_URL: 'http://sonarr.local',
    SONARR_API_KEY: 'test-key',
    RADARR_URL: 'http://radarr.local',
    RADARR_API_KEY: 'test-key',
    COOLDOWN_HOURS: '1',
  });
  const fakes: Record<AppKey, FakeArr> = {
    sonarr: new FakeArr({ itemsPath: '/series', failOn: '/tag' }),
    radarr: new FakeArr({
      itemsPath: '/movie',
      tags: [
        { id: 3, label: 'search' },
        { id: 4, label: 'done' },
      ],
      items: [{ id: 1, tags: [3] }],
      missing: [{ movieId: 1 }],
    }),
    lidarr: new FakeArr({ itemsPath: '/artist' }),
  };
  const saves = { count: 0 };
  const rng = createRng('tick');
  const logger = new RecordingLogger();
  const deps: TickDeps = {
    config,
    logger,
    publisher: new RecordingPublisher(),
    rng,
    picker: new ShuffleBagPicker(emptyPickerState(), { rng, clock: () => 1_700_000_000 }),
    store: {
      save() {
        saves.count++;
        return saveResult;
      },
    },
    clientFor: (profile) => fakes[profile.key],
  };
  return { deps, fakes, logger, saves };
}

test('runTick: one failing app does not stop the others, state is saved once', async () => {
  const { deps, fakes, logger, saves } = fixture();

  const report = await runTick(deps);

  assert.match(report.tickId, /^[0-9a-f-]{36}$/);
  assert.deepEqual(report.failed, ['sonarr']);
  assert.deepEqual(report.skipped, ['lidarr']);
  assert.deepEqual(report.picked, { radarr_missing: [1], radarr_upgrades: [] });
  assert.deepEqual(report.promoted, { radarr: [] });
  assert.equal(report.saved, true);
  assert.equal(saves.count, 1);

  assert.deepEqual(fakes.radarr.posted, [{ name: 'MoviesSearch', movieIds: [1] }]);
  assert.deepEqual(fakes.lidarr.gets, []);
  assert.deepEqual(logger.at('error'), ['Sonarr: run failed: GET /tag failed: 503 unavailable']);
  assert.deepEqual(logger.at('warn'), ['Lidarr enabled but LIDARR_URL/LIDARR_API_KEY not set; skipping.']);
});

test('runTick: restricted to the requested apps', async () => {
  const { deps, fakes } = fixture();

  const report = await runTick(deps, ['radarr']);

  assert.deepEqual(report.failed, []);
  assert.deepEqual(report.skipped, []);
  assert.deepEqual(fakes.sonarr.gets, []);
  assert.deepEqual(Object.keys(report.picked), ['radarr_missing', 'radarr_upgrades']);
});

test('runTick: disabled apps are neither run nor reported', async () => {
  const { deps, fakes } = fixture();
  deps.config.apps.sonarr.enabled = false;
  deps.config.apps.lidarr.enabled = false;

  const report = await runTick(deps);

  assert.deepEqual(report.failed, []);
  assert.deepEqual(report.skipped, []);
  assert.deepEqual(fakes.sonarr.gets, []);
});

test('runTick: a failed save is reported', async () => {
  const { deps, saves } = fixture(false);

  const report = await runTick(deps, ['radarr']);

  assert.equal(report.saved, false);
  assert.equal(saves.count, 1);
});

test('runTick: an unreachable event bus does not cut the app short', async () => {
  const { deps, fakes, logger } = fixture();
  fakes.radarr = new FakeArr({
    itemsPath: '/movie',
    tags: [
      { id: 3, label: 'search' },
      { id: 4, label: 'done' },
    ],
    items: [
      { id: 1, tags: [3] },
      { id: 2, tags: [4] },
    ],
    missing: [{ movieId: 1 }],
    cutoff: [{ movieId: 2 }],
  });
  deps.publisher = {
    produceEvent: async () => {
      throw new Error('redis down');
    },
  };

  const report = await runTick(deps, ['radarr']);

  assert.deepEqual(report.failed, []);
  assert.deepEqual(report.picked, { radarr_missing: [1], radarr_upgrades: [2] });
  assert.deepEqual(fakes.radarr.posted, [
    { name: 'MoviesSearch', movieIds: [1] },
    { name: 'MoviesSearch', movieIds: [2] },
  ]);
  assert.deepEqual(logger.at('warn'), [
    'Failed to publish search_dispatched: redis down',
    'Failed to publish search_dispatched: redis down',
  ]);
  assert.deepEqual(logger.at('error'), []);
});
