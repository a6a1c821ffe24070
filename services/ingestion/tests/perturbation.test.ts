import assert from 'node:assert/strict';
import test from 'node:test';
import { jitterValues, rotateValues } from '../src/source/perturbation';
import { createRandom, randomInt } from '../src/source/random';

const samples = [
  { time: '00:00:00', value: 60 },
  { time: '00:00:01', value: 70 },
  { time: '00:00:02', value: 80 },
  { time: '00:00:03', value: 90 }
];

test('rotation moves values by seed mod count and keeps times in place', () => {
  const rotated = rotateValues(samples, 5);
  assert.deepEqual(
    rotated.map((sample) => sample.time),
    samples.map((sample) => sample.time)
  );
  assert.deepEqual(
    rotated.map((sample) => sample.value),
    [70, 80, 90, 60]
  );
});

test('rotation by a multiple of the count or seed zero is the identity', () => {
  assert.deepEqual(rotateValues(samples, 8), samples);
  assert.deepEqual(rotateValues(samples, 0), samples);
});

test('rotation accepts negative seeds', () => {
  assert.deepEqual(
    rotateValues(samples, -1).map((sample) => sample.value),
    [90, 60, 70, 80]
  );
});

test('jitter is reproducible for a fixed seed', () => {
  assert.deepEqual(jitterValues(samples, 42), jitterValues(samples, 42));
  assert.deepEqual(rotateValues(samples, 3), rotateValues(samples, 3));
});

test('jitter stays within five beats, the physiological range and two decimals', () => {
  const edge = [
    { time: '00:00:00', value: 52 },
    { time: '00:00:01', value: 120 },
    { time: '00:00:02', value: 198 }
  ];
  const jittered = jitterValues(edge, 1234);
  jittered.forEach((sample, index) => {
    assert.ok(Math.abs(sample.value - edge[index].value) <= 5);
    assert.ok(sample.value >= 50 && sample.value <= 200);
    assert.equal(Math.round(sample.value * 100) / 100, sample.value);
    assert.equal(sample.time, edge[index].time);
  });
});

test('jitter with seed zero leaves values untouched', () => {
  assert.deepEqual(jitterValues(samples, 0), samples);
});

test('different seeds perturb differently', () => {
  assert.notDeepEqual(jitterValues(samples, 1), jitterValues(samples, 2));
});

test('generator sequences depend only on the seed', () => {
  const first = createRandom(99);
  const second = createRandom(99);
  const drawsA = Array.from({ length: 5 }, () => first());
  const drawsB = Array.from({ length: 5 }, () => second());
  assert.deepEqual(drawsA, drawsB);
  for (const draw of drawsA) {
    assert.ok(draw >= 0 && draw < 1);
  }
  const random = createRandom(5);
  for (let i = 0; i < 50; i += 1) {
    const value = randomInt(random, 60, 80);
    assert.ok(Number.isInteger(value) && value >= 60 && value <= 80);
  }
});

test('every integer seed yields draws inside [0, 1)', () => {
  for (const seed of [-2147483646, -2147483647, -1, 0, 2147483647, 4294967294]) {
    const random = createRandom(seed);
    for (let i = 0; i < 20; i += 1) {
      const draw = random();
      assert.ok(draw >= 0 && draw < 1, `seed ${seed} drew ${draw}`);
    }
    const bounded = createRandom(seed);
    for (let i = 0; i < 20; i += 1) {
      const value = randomInt(bounded, 60, 80);
      assert.ok(value >= 60 && value <= 80, `seed ${seed} produced ${value}`);
    }
  }
});
