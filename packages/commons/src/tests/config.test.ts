import test from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError, cooldownSecondsFor, envBool, envInt, loadConfig } from '../config.js';

test('loadConfig: defaults', () => {
  const config = loadConfig({});

  assert.equal(config.logLevel, 'info');
  assert.equal(config.randomSeed, undefined);
  assert.equal(config.tagSearch, 'search');
  assert.equal(config.tagDone, 'done');
  assert.equal(config.runIntervalMinutes, 60);
  assert.equal(config.wantedPageSize, 200);
  assert.equal(config.httpTimeoutSeconds, 30);
  assert.equal(config.dryRun, false);
  assert.equal(config.statePath, '/data/state/state.json');
  assert.equal(config.autoPromote, true);
  assert.equal(config.redisUrl, undefined);
  assert.deepEqual(config.apps.lidarr, {
    enabled: true,
    url: '',
    apiKey: '',
    missingLimit: 10,
    upgradesLimit: 10,
    promoteLimit: 50,
    cooldownSeconds: { missing: 0, upgrades: 0 },
  });
});

test('loadConfig: app settings and overrides', () => {
  const config = loadConfig({
    STATE_DIR: '/tmp/rotator',
    DRY_RUN: 'yes',
    RANDOM_SEED: 'test-seed',
    REDIS_URL: ' redis://localhost:6379 ',
    SONARR_URL: 'http://sonarr:8989/',
    SONARR_API_KEY: 'test-key',
    SONARR_MISSING_LIMIT: '3',
    RADARR_ENABLED: 'off',
    DEFAULT_COOLDOWN_HOURS: '2',
  });

  assert.equal(config.statePath, '/tmp/rotator/state.json');
  assert.equal(config.dryRun, true);
  assert.equal(config.randomSeed, 'test-seed');
  assert.equal(config.redisUrl, 'redis://localhost:6379');
  assert.equal(config.apps.sonarr.url, 'http://sonarr:8989/');
  assert.equal(config.apps.sonarr.apiKey, 'test-key');
  assert.equal(config.apps.sonarr.missingLimit, 3);
  assert.equal(config.apps.radarr.enabled, false);
  assert.deepEqual(config.apps.radarr.cooldownSeconds, { missing: 7200, upgrades: 7200 });
});

test('envBool: truthy words, anything else set is false', () => {
  assert.equal(envBool({ X: ' ON ' }, 'X', false), true);
  assert.equal(envBool({ X: 'Y' }, 'X', false), true);
  assert.equal(envBool({ X: 'nope' }, 'X', true), false);
  assert.equal(envBool({ X: '' }, 'X', true), false);
  assert.equal(envBool({}, 'X', true), true);
});

test('envInt: blank falls back, garbage throws ConfigError', () => {
  assert.equal(envInt({ N: '  ' }, 'N', 4), 4);
  assert.equal(envInt({ N: ' -12 ' }, 'N', 4), -12);
  assert.throws(() => envInt({ N: '1.5' }, 'N', 4), ConfigError);
  assert.throws(() => envInt({ N: 'ten' }, 'N', 4), /Env var N must be an integer, got: "ten"/);
});

test('cooldownSecondsFor: most specific non-blank variable wins', () => {
  const env = {
    SONARR_MISSING_COOLDOWN_HOURS: '0.5',
    SONARR_COOLDOWN_HOURS: '2',
    COOLDOWN_HOURS: '12',
    RADARR_UPGRADES_COOLDOWN_HOURS: ' ',
  };
  assert.equal(cooldownSecondsFor(env, 'sonarr', 'missing', 99), 1800);
  assert.equal(cooldownSecondsFor(env, 'sonarr', 'upgrades', 99), 7200);
  assert.equal(cooldownSecondsFor(env, 'radarr', 'upgrades', 99), 43200);
  assert.equal(cooldownSecondsFor({}, 'lidarr', 'missing', 99), 99);
  assert.equal(cooldownSecondsFor({ COOLDOWN_HOURS: '-3' }, 'lidarr', 'missing', 99), 0);
  assert.throws(() => cooldownSecondsFor({ COOLDOWN_HOURS: 'soon' }, 'lidarr', 'missing', 99), ConfigError);
});

test('loadConfig: negative default cooldown is floored at zero', () => {
  assert.deepEqual(loadConfig({ DEFAULT_COOLDOWN_HOURS: '-4' }).apps.sonarr.cooldownSeconds, { missing: 0, upgrades: 0 });
});
