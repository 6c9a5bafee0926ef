import test from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';

import {
  deserializeEvent,
  listenForArrRotatorEvents,
  serializeEvent,
  type ArrRotatorEvent,
  type ConsumerCallbacks,
} from '../events.js';

test('deserializeEvent: accepts a well-formed run request', () => {
  const event: ArrRotatorEvent = {
    type: 'run_requested',
    data: { apps: ['sonarr', 'lidarr'], requestedBy: 'cli' },
    timestamp: '2026-01-01T00:00:00.000Z',
  };
  assert.deepEqual(deserializeEvent(serializeEvent(event)), event);
});

test('deserializeEvent: rejects bad JSON, unknown types and bad payloads', () => {
  assert.equal(deserializeEvent('{'), null);
  assert.equal(deserializeEvent(JSON.stringify({ type: 'unknown_event', data: {}, timestamp: 'x' })), null);
  assert.equal(
    deserializeEvent(JSON.stringify({ type: 'run_requested', data: { apps: ['plex'], requestedBy: 'cli' }, timestamp: 'x' })),
    null
  );
  assert.equal(
    deserializeEvent(
      JSON.stringify({
        type: 'search_dispatched',
        data: { app: 'radarr', mode: 'missing', bucket: 'radarr_missing', ids: [-1], dryRun: false },
        timestamp: 'x',
      })
    ),
    null
  );
});

function recordingCallbacks() {
  const seen: Record<'invalid' | 'failed' | 'connection', string[]> = { invalid: [], failed: [], connection: [] };
  const callbacks: ConsumerCallbacks = {
    onInvalid: (message) => seen.invalid.push(message),
    onError: (error, event) => seen.failed.push(`${event.type}: ${String(error)}`),
    onConnectionError: (error) => seen.connection.push(error.message),
  };
  return { seen, callbacks };
}

const runRequest: ArrRotatorEvent = {
  type: 'run_requested',
  data: { requestedBy: 'cli' },
  timestamp: '2026-01-01T00:00:00.000Z',
};

test('listenForArrRotatorEvents: connection errors reach the callback instead of crashing', () => {
  const client = new EventEmitter();
  const { seen, callbacks } = recordingCallbacks();
  listenForArrRotatorEvents(client, () => undefined, callbacks);

  client.emit('error', new Error('connect ECONNREFUSED'));

  assert.deepEqual(seen.connection, ['connect ECONNREFUSED']);
});

test('listenForArrRotatorEvents: valid events are handled, invalid ones reported', async () => {
  const client = new EventEmitter();
  const { seen, callbacks } = recordingCallbacks();
  const handled: ArrRotatorEvent[] = [];
  listenForArrRotatorEvents(client, (event) => {
    handled.push(event);
  }, callbacks);

  client.emit('message', 'arr-rotator-events', serializeEvent(runRequest));
  client.emit('message', 'arr-rotator-events', 'not json');
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(handled, [runRequest]);
  assert.deepEqual(seen.invalid, ['not json']);
  assert.deepEqual(seen.failed, []);
});

test('listenForArrRotatorEvents: a failing handler is reported with its event', async () => {
  const client = new EventEmitter();
  const { seen, callbacks } = recordingCallbacks();
  listenForArrRotatorEvents(client, async () => {
    throw new Error('tick exploded');
  }, callbacks);

  client.emit('message', 'arr-rotator-events', serializeEvent(runRequest));
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(seen.failed, ['run_requested: Error: tick exploded']);
});
