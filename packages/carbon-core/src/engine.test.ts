import test, { before } from 'node:test';
import assert from 'node:assert/strict';

import { CarbonEngine, MEMO_LIMIT, createCarbonEngine } from './engine.js';
import { UnknownActivityError, UnknownRegionError } from './errors.js';
import { loadReferenceData } from './reference/referenceData.js';
import type { ReferenceData } from './types.js';

let data: ReferenceData;

before(async () => {
  data = await loadReferenceData();
});

function near(actual: number, expected: number, eps = 1e-9) {
  assert.ok(Math.abs(actual - expected) <= eps, `expected ${expected}, got ${actual}`);
}

test('createCarbonEngine loads the bundled tables', async () => {
  const engine = await createCarbonEngine();
  assert.ok(engine.data.regions.has('EU-avg'));
  assert.strictEqual(engine.basis, 'base');
  assert.strictEqual(engine.strict, false);
});

test('createCarbonEngine accepts preloaded data', async () => {
  const engine = await createCarbonEngine({ data, basis: 'implied' });
  assert.strictEqual(engine.data, data);
  near(engine.resolve('FR').effectiveFactor, 0.04912);
});

test('resolveOrDefault is memoized per region and slider', () => {
  const engine = new CarbonEngine(data);

  const first = engine.resolveOrDefault('FR', 0.2);
  assert.strictEqual(engine.resolveOrDefault('FR', 0.2), first);
  assert.notStrictEqual(engine.resolveOrDefault('FR', 0.3), first);
  assert.ok(Object.isFrozen(first));
});

test('fallbacks and clamped sliders share one memo entry', () => {
  const engine = new CarbonEngine(data);

  for (let i = 0; i < 1000; i++) {
    engine.profileDetails(`bogus-${i}`, 'Summer', 0);
    engine.resolveOrDefault('FR', 0.8 + i);
    engine.resolveOrDefault(`bogus-${i}`);
  }

  assert.deepStrictEqual(engine.memoSizes(), { resolutions: 2, profiles: 1 });
});

test('memoized fallbacks keep the requested region', () => {
  const engine = new CarbonEngine(data);

  const direct = engine.resolveOrDefault('EU-avg');
  const fallback = engine.resolveOrDefault('ZZ');
  assert.strictEqual(direct.fallbackUsed, false);
  assert.strictEqual(fallback.requestedRegion, 'ZZ');
  assert.strictEqual(fallback.fallbackUsed, true);
  assert.strictEqual(fallback.effectiveFactor, direct.effectiveFactor);
  assert.ok(Object.isFrozen(fallback));

  assert.strictEqual(engine.profileDetails('ZZ', 'Winter').fallbackUsed, true);
  assert.strictEqual(engine.profileDetails('EU-avg', 'Winter').fallbackUsed, false);
  assert.strictEqual(engine.memoSizes().profiles, 1);
});

test('memo tables stay within MEMO_LIMIT', () => {
  const engine = new CarbonEngine(data);

  for (let i = 0; i <= MEMO_LIMIT; i++) {
    engine.resolveOrDefault('FR', i / (MEMO_LIMIT * 2));
  }

  assert.strictEqual(engine.memoSizes().resolutions, MEMO_LIMIT);
});

test('resolve throws for unknown regions', () => {
  assert.throws(() => new CarbonEngine(data).resolve('ZZ'), UnknownRegionError);
});

test('estimateDay charges electricity at the resolved factor', () => {
  const engine = new CarbonEngine(data);
  const day = engine.estimateDay({ electricity_kwh: 10, bus_km: 10 }, 'CN');

  assert.strictEqual(day.electricity.regionCode, 'CN');
  near(day.perActivity.electricity_kwh, 5.8);
  near(day.perActivity.bus_km, 1.2);
  near(day.total, 7);
});

test('estimateDay falls back to the default region', () => {
  const day = new CarbonEngine(data).estimateDay({ electricity_kwh: 10 }, 'ZZ', 0.5);

  assert.strictEqual(day.electricity.fallbackUsed, true);
  assert.strictEqual(day.electricity.regionCode, 'EU-avg');
  near(day.total, 1.4);
});

test('strict engines reject unknown activities unless overridden', () => {
  const engine = new CarbonEngine(data, { strict: true });

  assert.throws(() => engine.calculate({ unicorn_rides: 1 }, 0.2), UnknownActivityError);
  assert.deepStrictEqual(engine.calculate({ unicorn_rides: 1 }, 0.2, { strict: false }).ignored, ['unicorn_rides']);
});

test('profiles are cached but returned as copies', () => {
  const engine = new CarbonEngine(data);

  const first = engine.profileDetails('FR', 'Summer');
  first.profile[0] = 99;

  const second = engine.profileDetails('FR', 'Summer');
  assert.notStrictEqual(second.profile[0], 99);
  assert.strictEqual(second.template, 'evening_peak');
});

test('buildProfile uses the fallback region', () => {
  const engine = new CarbonEngine(data);
  assert.deepStrictEqual(engine.buildProfile('ZZ', 'Winter'), engine.buildProfile('EU-avg', 'Winter'));
});

test('a summer evening dishwasher in France moves to 02:00', () => {
  const engine = new CarbonEngine(data);
  const profile = engine.buildProfile('FR', 'Summer');

  const result = engine.compare(profile, [
    { name: 'Dishwasher', kwh: 1.5, hour: 19 },
    { name: 'Fridge', kwh: 0, hour: 12 },
  ]);

  assert.strictEqual(result.rows[0].optimalHour, 2);
  assert.ok(result.rows[0].savingsKg > 0);
  assert.strictEqual(result.rows[1].savingsKg, 0);
  assert.strictEqual(result.bestOpportunity?.name, 'Dishwasher');
  assert.deepStrictEqual(engine.topNLowHours(profile, 2), [2, 3]);
});

test('annualize through the engine', () => {
  const engine = new CarbonEngine(data);
  const profile = engine.buildProfile('FR', 'Summer');
  const projection = engine.annualize(profile, 3, 19);

  assert.strictEqual(projection.bestHour, 2);
  near(projection.yearlyKg, projection.dailyKg * 365);
  near(projection.yearlyCostUSD, (projection.yearlyKg / 1000) * 15);
  assert.strictEqual(engine.evaluate(profile, { name: 'x', kwh: 3, hour: 19 }).optimalHour, 2);
});
