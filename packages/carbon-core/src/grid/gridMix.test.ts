import test, { before } from 'node:test';
import assert from 'node:assert/strict';

import { UnknownRegionError } from '../errors.js';
import { loadReferenceData } from '../reference/referenceData.js';
import type { ReferenceData } from '../types.js';
import {
  DEFAULT_REGION,
  MAX_RENEWABLE_ADJUST,
  clampRenewableAdjust,
  getGridMix,
  getRegionMeta,
  impliedIntensity,
  listRegions,
  lookupRegionCode,
  resolve,
  resolveOrDefault,
} from './gridMix.js';

let data: ReferenceData;

before(async () => {
  data = await loadReferenceData();
});

function near(actual: number, expected: number, eps = 1e-9) {
  assert.ok(Math.abs(actual - expected) <= eps, `expected ${expected}, got ${actual}`);
}

test('clampRenewableAdjust keeps the slider within [0, 0.8]', () => {
  assert.strictEqual(clampRenewableAdjust(undefined), 0);
  assert.strictEqual(clampRenewableAdjust(null), 0);
  assert.strictEqual(clampRenewableAdjust(-0.3), 0);
  assert.strictEqual(clampRenewableAdjust(Number.NaN), 0);
  assert.strictEqual(clampRenewableAdjust(0.35), 0.35);
  assert.strictEqual(clampRenewableAdjust(1.5), MAX_RENEWABLE_ADJUST);
});

test('impliedIntensity sums share x source intensity', () => {
  near(impliedIntensity({ coal: 0.5, wind: 0.5 }), 0.455);
  near(impliedIntensity({ nuclear: 1 }), 0.012);
  assert.strictEqual(impliedIntensity({ unobtainium: 1 }), 0);
  assert.strictEqual(impliedIntensity({}), 0);
});

test('impliedIntensity of France', () => {
  const fr = data.regions.get('FR');
  assert.ok(fr);
  near(impliedIntensity(fr.gridMix), 0.04912);
});

test('implied intensity is non-negative for every region', () => {
  for (const region of data.regions.values()) {
    assert.ok(impliedIntensity(region.gridMix) >= 0, region.code);
  }
});

test('resolve returns the base factor when no slider is applied', () => {
  const fr = resolve(data, 'FR');

  assert.strictEqual(fr.regionCode, 'FR');
  assert.strictEqual(fr.basis, 'base');
  assert.strictEqual(fr.factor, 0.07);
  assert.strictEqual(fr.effectiveFactor, 0.07);
  assert.strictEqual(fr.renewableAdjust, 0);
  assert.strictEqual(fr.meta.source, 'Illustrative France');
});

test('resolve trims the region code', () => {
  assert.strictEqual(resolve(data, '  CN ').regionCode, 'CN');
});

test('resolve throws UnknownRegionError for unknown codes', () => {
  assert.throws(() => resolve(data, 'ZZ'), (error: unknown) => {
    assert.ok(error instanceof UnknownRegionError);
    assert.strictEqual(error.code, 'unknown_region');
    assert.strictEqual(error.message, 'Unknown region: ZZ');
    return true;
  });
});

test('resolve orders FR < EU-avg < CN', () => {
  const fr = resolve(data, 'FR').effectiveFactor;
  const eu = resolve(data, 'EU-avg').effectiveFactor;
  const cn = resolve(data, 'CN').effectiveFactor;

  assert.ok(fr < eu && eu < cn);
});

test('implied intensity orders FR < EU-avg < CN', () => {
  const implied = (code: string) => resolve(data, code, 0, { basis: 'implied' }).effectiveFactor;

  near(implied('FR'), 0.04912);
  near(implied('EU-avg'), 0.2348);
  near(implied('CN'), 0.5769);
  assert.ok(implied('FR') < implied('EU-avg') && implied('EU-avg') < implied('CN'));
});

test('the renewable slider scales the factor linearly', () => {
  near(resolve(data, 'EU-avg', 0.5).effectiveFactor, 0.14);
  near(resolve(data, 'EU-avg', 0.25).effectiveFactor, 0.28 * 0.75);
  near(resolve(data, 'EU-avg', 5).effectiveFactor, 0.28 * 0.2);
  assert.strictEqual(resolve(data, 'EU-avg', 5).renewableAdjust, 0.8);
});

test('a 0.3 slider is 0.7 x the unadjusted factor in every region', () => {
  for (const code of data.regions.keys()) {
    near(resolve(data, code, 0.3).effectiveFactor, resolve(data, code, 0).effectiveFactor * 0.7);
  }
});

test('the implied basis uses the grid mix', () => {
  const fr = resolve(data, 'FR', 0.5, { basis: 'implied' });

  assert.strictEqual(fr.basis, 'implied');
  near(fr.factor, 0.04912);
  near(fr.effectiveFactor, 0.02456);
  assert.strictEqual(fr.baseFactor, 0.07);
});

test('resolveOrDefault substitutes the default region', () => {
  const resolved = resolveOrDefault(data, 'ZZ');

  assert.strictEqual(resolved.regionCode, DEFAULT_REGION);
  assert.strictEqual(resolved.requestedRegion, 'ZZ');
  assert.strictEqual(resolved.fallbackUsed, true);
  assert.strictEqual(resolved.effectiveFactor, 0.28);
});

test('resolveOrDefault treats a missing code as the default region', () => {
  const resolved = resolveOrDefault(data, undefined);

  assert.strictEqual(resolved.regionCode, 'EU-avg');
  assert.strictEqual(resolved.fallbackUsed, false);
  assert.strictEqual(resolveOrDefault(data, '').regionCode, 'EU-avg');
});

test('resolveOrDefault keeps known regions', () => {
  const resolved = resolveOrDefault(data, 'NO', 0.5);

  assert.strictEqual(resolved.regionCode, 'NO');
  assert.strictEqual(resolved.fallbackUsed, false);
  near(resolved.effectiveFactor, 0.01);
});

test('resolveOrDefault warns only in debug mode', (t) => {
  const warn = t.mock.method(console, 'warn', () => {});

  resolveOrDefault(data, 'ZZ');
  assert.strictEqual(warn.mock.callCount(), 0);

  resolveOrDefault(data, 'ZZ', 0, { log: 'debug' });
  assert.strictEqual(warn.mock.callCount(), 1);
  assert.deepStrictEqual(warn.mock.calls[0].arguments, ["[gridMix] unknown region 'ZZ', falling back to EU-avg"]);
});

test('lookupRegionCode names the region that will be charged', () => {
  assert.deepStrictEqual(lookupRegionCode(data, ' FR '), { requestedRegion: 'FR', regionCode: 'FR', fallbackUsed: false });
  assert.deepStrictEqual(lookupRegionCode(data, 'ZZ'), { requestedRegion: 'ZZ', regionCode: 'EU-avg', fallbackUsed: true });
  assert.deepStrictEqual(lookupRegionCode(data, null), { requestedRegion: 'EU-avg', regionCode: 'EU-avg', fallbackUsed: false });
});

test('getGridMix returns shares summing to 1', () => {
  for (const { code } of listRegions(data)) {
    const total = Object.values(getGridMix(data, code)).reduce((acc, v) => acc + v, 0);
    near(total, 1);
  }
  assert.throws(() => getGridMix(data, 'ZZ'), UnknownRegionError);
});

test('getRegionMeta falls back to default metadata', () => {
  assert.deepStrictEqual(getRegionMeta(data, 'ZZ'), {
    source: 'Default factors',
    version: 'n/a',
    url: '',
    regionCode: 'ZZ',
  });
  assert.strictEqual(getRegionMeta(data, null).regionCode, 'default');
  assert.deepStrictEqual(getRegionMeta(data, 'FR'), {
    source: 'Illustrative France',
    version: '2024.1',
    url: '',
    regionCode: 'FR',
  });
});

test('listRegions is sorted by code', () => {
  const codes = listRegions(data).map((r) => r.code);
  const sorted = [...codes].sort((a, b) => a.localeCompare(b));

  assert.deepStrictEqual(codes, sorted);
  assert.strictEqual(codes.length, data.regions.size);
});
