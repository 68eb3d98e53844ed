import { InvalidHourError, InvalidProfileError, InvalidQuantityError } from "../errors.js";
import { HOURS_PER_DAY, type IntensityProfile, type Task } from "../types.js";

export const DAYS_PER_MONTH = 30;
export const DAYS_PER_YEAR = 365;
export const DEFAULT_COST_PER_TONNE_USD = 15;

export interface TaskEvaluation {
    name: string;
    kwh: number;
    hour: number;
    intensityAtCurrentHour: number;
    estimatedCO2: number;
    optimalHour: number;
    optimalIntensity: number;
    optimalCO2: number;
    savingsKg: number;
    // fraction in [0, 1]
    savingsPct: number;
}

export interface TaskComparison {
    rows: TaskEvaluation[];
    totalSavingsKg: number;
    bestOpportunity: TaskEvaluation | null;
}

export interface AnnualProjection {
    bestHour: number;
    currentIntensity: number;
    bestIntensity: number;
    dailyKg: number;
    monthlyKg: number;
    yearlyKg: number;
    yearlyCostUSD: number;
    savingsPct: number;
}

export function assertProfile(profile: IntensityProfile): void {
    if (profile.length !== HOURS_PER_DAY) {
        throw new InvalidProfileError(`expected ${HOURS_PER_DAY} values, got ${profile.length}`);
    }
    profile.forEach((v, hour) => {
        if (!Number.isFinite(v) || v < 0) {
            throw new InvalidProfileError(`hour ${hour} is not a finite value >= 0`);
        }
    });
}

export function assertHour(hour: number): void {
    if (!Number.isInteger(hour) || hour < 0 || hour >= HOURS_PER_DAY) {
        throw new InvalidHourError(hour);
    }
}

function assertKwh(field: string, kwh: number): void {
    if (!Number.isFinite(kwh) || kwh < 0) {
        throw new InvalidQuantityError(field, kwh);
    }
}

/** Lowest-intensity hour; ties go to the earliest hour. */
export function optimalHour(profile: IntensityProfile): number {
    assertProfile(profile);
    let best = 0;
    for (let hour = 1; hour < HOURS_PER_DAY; hour++) {
        if (profile[hour] < profile[best]) best = hour;
    }
    return best;
}

/**
 * The n cleanest hours, by intensity then hour index.
 * n is floored and kept within 1..24.
 */
export function topNLowHours(profile: IntensityProfile, n: number): number[] {
    assertProfile(profile);
    const count = Number.isFinite(n) ? Math.min(HOURS_PER_DAY, Math.max(1, Math.floor(n))) : 1;
    return profile
        .map((intensity, hour) => ({ intensity, hour }))
        .sort((a, b) => a.intensity - b.intensity || a.hour - b.hour)
        .slice(0, count)
        .map((entry) => entry.hour);
}

export function evaluate(profile: IntensityProfile, task: Task): TaskEvaluation {
    assertProfile(profile);
    assertKwh(`${task.name}.kwh`, task.kwh);
    assertHour(task.hour);

    const best = optimalHour(profile);
    const intensityAtCurrentHour = profile[task.hour];
    const optimalIntensity = profile[best];
    const estimatedCO2 = task.kwh * intensityAtCurrentHour;
    const optimalCO2 = task.kwh * optimalIntensity;
    const savingsKg = Math.max(0, estimatedCO2 - optimalCO2);

    return {
        name: task.name,
        kwh: task.kwh,
        hour: task.hour,
        intensityAtCurrentHour,
        estimatedCO2,
        optimalHour: best,
        optimalIntensity,
        optimalCO2,
        savingsKg,
        savingsPct: estimatedCO2 > 0 ? savingsKg / estimatedCO2 : 0,
    };
}

export function compare(profile: IntensityProfile, tasks: readonly Task[]): TaskComparison {
    const rows = tasks.map((task) => evaluate(profile, task));

    let totalSavingsKg = 0;
    let bestOpportunity: TaskEvaluation | null = null;
    for (const row of rows) {
        totalSavingsKg += row.savingsKg;
        if (!bestOpportunity || row.savingsKg > bestOpportunity.savingsKg) {
            bestOpportunity = row;
        }
    }

    return { rows, totalSavingsKg, bestOpportunity };
}

/**
 * Project the savings of moving a daily task to the best hour.
 * Flat 30-day month and 365-day year.
 */
export function annualize(
    profile: IntensityProfile,
    dailyKwh: number,
    currentHour: number,
    costPerTonneUSD: number = DEFAULT_COST_PER_TONNE_USD,
): AnnualProjection {
    assertKwh("dailyKwh", dailyKwh);
    assertKwh("costPerTonneUSD", costPerTonneUSD);

    const row = evaluate(profile, { name: "daily", kwh: dailyKwh, hour: currentHour });
    const dailyKg = dailyKwh * (row.intensityAtCurrentHour - row.optimalIntensity);
    const yearlyKg = dailyKg * DAYS_PER_YEAR;

    return {
        bestHour: row.optimalHour,
        currentIntensity: row.intensityAtCurrentHour,
        bestIntensity: row.optimalIntensity,
        dailyKg,
        monthlyKg: dailyKg * DAYS_PER_MONTH,
        yearlyKg,
        yearlyCostUSD: (yearlyKg / 1000) * costPerTonneUSD,
        savingsPct: row.savingsPct,
    };
}
