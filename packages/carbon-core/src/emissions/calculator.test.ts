import test, { before } from 'node:test';
import assert from 'node:assert/strict';

import { InvalidQuantityError, UnknownActivityError } from '../errors.js';
import { resolve } from '../grid/gridMix.js';
import { loadReferenceData } from '../reference/referenceData.js';
import type { ActivityEntry, ReferenceData } from '../types.js';
import { calculate, calculateWithTableFactors, normalizeActivityName, normalizeEntry, sumCategories } from './calculator.js';

let data: ReferenceData;

before(async () => {
  data = await loadReferenceData();
});

function near(actual: number, expected: number, eps = 1e-9) {
  assert.ok(Math.abs(actual - expected) <= eps, `expected ${expected}, got ${actual}`);
}

test('normalizeActivityName', () => {
  assert.strictEqual(normalizeActivityName('electricity_kwh'), 'electricity_kwh');
  assert.strictEqual(normalizeActivityName('  Electricity (kWh) '), 'electricity_kwh');
  assert.strictEqual(normalizeActivityName('Bus-km'), 'bus_km');
  assert.strictEqual(normalizeActivityName('__meat kg__'), 'meat_kg');
});

test('10 kWh in FR, EU-avg and CN', () => {
  const entry = { electricity_kwh: 10 };

  near(calculate(data, entry, resolve(data, 'FR').effectiveFactor).total, 0.7);
  near(calculate(data, entry, resolve(data, 'EU-avg').effectiveFactor).total, 2.8);
  near(calculate(data, entry, resolve(data, 'CN').effectiveFactor).total, 5.8);
});

test('mixed entry is split per activity and per category', () => {
  const result = calculate(data, { electricity_kwh: 5, petrol_liter: 10, bus_km: 20, meat_kg: 0.2 }, 0.28);

  near(result.perActivity.electricity_kwh, 1.4);
  near(result.perActivity.petrol_liter, 2.35);
  near(result.perActivity.bus_km, 2.4);
  near(result.perActivity.meat_kg, 5.4);
  near(result.perCategory.Energy, 1.4);
  near(result.perCategory.Transport, 4.75);
  near(result.perCategory.Meals, 5.4);
  near(result.total, 11.55);
  assert.deepStrictEqual(result.ignored, []);
});

test('per-category values sum to the total', () => {
  const result = calculate(data, { natural_gas_m3: 1.5, train_km: 12, dairy_kg: 0.3, vegan_kg: 0.4 }, 0.1);
  assert.strictEqual(result.total, sumCategories(result.perCategory));
});

test('emissions are additive over disjoint entries', () => {
  const a: ActivityEntry = { electricity_kwh: 4, diesel_liter: 3 };
  const b: ActivityEntry = { chicken_kg: 0.25, eggs_kg: 0.1 };

  const left = calculate(data, a, 0.3);
  const right = calculate(data, b, 0.3);
  const union = calculate(data, { ...a, ...b }, 0.3);

  assert.deepStrictEqual(union.perActivity, { ...left.perActivity, ...right.perActivity });
  near(union.total, left.total + right.total);
});

test('unknown activities are ignored before their value is read', () => {
  const result = calculate(data, { bus_km: 10, device: { id: 7 }, tag: 'home' }, 0.28);

  near(result.total, 1.2);
  assert.deepStrictEqual(result.ignored, ['device', 'tag']);
  assert.throws(() => calculate(data, { bus_km: '10' }, 0.28), InvalidQuantityError);
});

test('an empty entry gives zero everywhere', () => {
  assert.deepStrictEqual(calculate(data, {}, 0.28), {
    total: 0,
    perActivity: {},
    perCategory: { Energy: 0, Transport: 0, Meals: 0 },
    ignored: [],
  });
});

test('spelling variants of one activity add up', () => {
  const { quantities } = normalizeEntry(data, { electricity_kwh: 2, 'Electricity kWh': 3 });
  assert.deepStrictEqual([...quantities], [['electricity_kwh', 5]]);

  near(calculate(data, { electricity_kwh: 2, 'Electricity kWh': 3 }, 0.2).total, 1);
});

test('null and undefined quantities count as zero', () => {
  const result = calculate(data, { electricity_kwh: null, bus_km: undefined }, 0.28);

  assert.deepStrictEqual(result.perActivity, { electricity_kwh: 0, bus_km: 0 });
  assert.strictEqual(result.total, 0);
});

test('unknown activities are ignored in lenient mode', () => {
  const result = calculate(data, { electricity_kwh: 1, unicorn_rides: 3 }, 0.5);

  assert.deepStrictEqual(result.ignored, ['unicorn_rides']);
  assert.strictEqual(result.total, 0.5);
});

test('unknown activities throw in strict mode', () => {
  assert.throws(
    () => calculate(data, { unicorn_rides: 3 }, 0.5, { strict: true }),
    (error: unknown) => error instanceof UnknownActivityError && error.activity === 'unicorn_rides',
  );
});

test('negative or non-finite quantities are rejected', () => {
  assert.throws(
    () => calculate(data, { bus_km: -1 }, 0.28),
    (error: unknown) => error instanceof InvalidQuantityError && error.field === 'bus_km',
  );
  assert.throws(() => calculate(data, { bus_km: Number.POSITIVE_INFINITY }, 0.28), InvalidQuantityError);
});

test('an invalid electricity factor is rejected', () => {
  assert.throws(
    () => calculate(data, { electricity_kwh: 1 }, -0.1),
    (error: unknown) => error instanceof InvalidQuantityError && error.field === 'effectiveElectricityFactor',
  );
});

test('calculateWithTableFactors charges electricity at the table factor', () => {
  near(calculateWithTableFactors(data, { electricity_kwh: 10 }).total, 2.33);
});
