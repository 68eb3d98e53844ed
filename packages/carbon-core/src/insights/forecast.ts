const FORECAST_DAYS = 7;

/**
 * Flat projection: mean of the last (up to) 7 daily totals, repeated 7 times.
 * Negative or non-finite totals are dropped.
 */
export function forecastNext7(dailyTotals: readonly number[]): number[] {
    const values = dailyTotals.filter((v) => Number.isFinite(v) && v >= 0);
    const window = values.slice(-FORECAST_DAYS);
    const base = window.length ? window.reduce((acc, v) => acc + v, 0) / window.length : 0;
    return Array.from({ length: FORECAST_DAYS }, () => base);
}

export interface WeeklyGoalPlan {
    requiredPerDay: number;
    deltaVsCurrentAvg: number;
}

export function weeklyGoalPlan(currentWeekSum: number, remainingDays: number, targetWeekSum: number): WeeklyGoalPlan {
    const remain = Math.max(0, Math.min(FORECAST_DAYS, Math.trunc(remainingDays)));
    if (remain === 0) {
        return { requiredPerDay: 0, deltaVsCurrentAvg: 0 };
    }
    const needed = Math.max(0, targetWeekSum - currentWeekSum);
    const requiredPerDay = needed / remain;
    const elapsed = FORECAST_DAYS - remain;
    const currentAvg = elapsed > 0 ? currentWeekSum / elapsed : requiredPerDay;
    return { requiredPerDay, deltaVsCurrentAvg: requiredPerDay - currentAvg };
}
